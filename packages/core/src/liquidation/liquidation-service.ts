/**
 * Liquidation Service
 *
 * Seizes collateral against outstanding debt. Debt always ends at zero;
 * whatever the balance cannot cover is written off.
 */

import { logger as rootLogger, type Logger } from '@card-ledger/observability';
import type { LedgerContext } from '../context.js';
import { NoDebtError } from '../ledger/ledger-errors.js';
import { minAmount } from '../ledger/ledger-guards.js';
import type { CallerContext, LiquidationResult } from '../ledger/ledger-types.js';

export class LiquidationService {
  private readonly log: Logger;

  constructor(private readonly deps: LedgerContext) {
    this.log = (deps.logger ?? rootLogger).child({ module: 'liquidation' });
  }

  /**
   * @throws {NoDebtError} If the card owes nothing
   */
  liquidate(caller: CallerContext, index: number): LiquidationResult {
    this.deps.access.requireCapability(caller, 'ledger:operate');
    const card = this.deps.cards.getOrThrow(index);

    if (card.debt === 0n) {
      throw new NoDebtError(index);
    }

    const repaid = minAmount(card.nativeBalance, card.debt);
    const shortfall = card.debt - repaid;
    const updated = this.deps.cards.update(index, {
      nativeBalance: card.nativeBalance - repaid,
      debt: 0n,
    });

    this.deps.events.emit({
      type: 'liquidated',
      index,
      repaid,
      remainingBalance: updated.nativeBalance,
    });
    this.log.info({ index, repaid, shortfall, remainingBalance: updated.nativeBalance }, 'Card liquidated');

    return { repaid, remainingBalance: updated.nativeBalance };
  }
}
