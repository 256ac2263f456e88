/**
 * Settlement Service
 *
 * Two-phase escrow for merchant payouts:
 * 1. requestTransfer moves funds from the native balance into `reserved`
 * 2. confirmSettlement releases them, either settled (gone) or refunded (back to balance)
 */

import { logger as rootLogger, type Logger } from '@card-ledger/observability';
import type { Card } from '../cards/index.js';
import type { LedgerContext } from '../context.js';
import { InsufficientBalanceError, InsufficientReserveError } from '../ledger/ledger-errors.js';
import { assertPositiveAmount } from '../ledger/ledger-guards.js';
import type { CallerContext } from '../ledger/ledger-types.js';

export interface TransferRequestParams {
  index: number;
  amount: bigint;
  merchantId: string;
  payoutAccount: string;
}

export interface SettlementConfirmationParams {
  index: number;
  amount: bigint;
  merchantAddress: string;
  success: boolean;
}

export class SettlementService {
  private readonly log: Logger;

  constructor(private readonly deps: LedgerContext) {
    this.log = (deps.logger ?? rootLogger).child({ module: 'settlement' });
  }

  /**
   * Phase 1: earmark funds for a merchant payout
   *
   * @throws {InsufficientBalanceError} If the native balance is below amount
   */
  requestTransfer(caller: CallerContext, params: TransferRequestParams): Card {
    this.deps.access.requireCapability(caller, 'ledger:operate');
    const { index, amount, merchantId, payoutAccount } = params;
    const card = this.deps.cards.getOrThrow(index);
    assertPositiveAmount(amount);

    if (card.nativeBalance < amount) {
      throw new InsufficientBalanceError(index, 'native', card.nativeBalance, amount);
    }

    const updated = this.deps.cards.update(index, {
      nativeBalance: card.nativeBalance - amount,
      reserved: card.reserved + amount,
    });

    const timestamp = this.deps.clock.now();
    this.deps.events.emit({
      type: 'transfer.requested',
      index,
      pan: card.pan,
      amount,
      merchantId,
      payoutAccount,
      timestamp,
    });
    this.log.info({ index, amount, merchantId }, 'Merchant transfer reserved');

    return updated;
  }

  /**
   * Phase 2: release reserved funds
   *
   * Reserved is always debited. On failure the amount returns to the native balance.
   *
   * @throws {InsufficientReserveError} If less than amount is reserved
   */
  confirmSettlement(caller: CallerContext, params: SettlementConfirmationParams): Card {
    this.deps.access.requireCapability(caller, 'ledger:operate');
    const { index, amount, merchantAddress, success } = params;
    const card = this.deps.cards.getOrThrow(index);
    assertPositiveAmount(amount);

    if (card.reserved < amount) {
      throw new InsufficientReserveError(index, card.reserved, amount);
    }

    const updated = this.deps.cards.update(index, {
      reserved: card.reserved - amount,
      nativeBalance: success ? card.nativeBalance : card.nativeBalance + amount,
    });

    this.deps.events.emit({
      type: 'settlement.confirmed',
      index,
      amount,
      merchantAddress,
      success,
    });
    this.log.info({ index, amount, merchantAddress, success }, success ? 'Settlement completed' : 'Settlement refunded');

    return updated;
  }
}
