/**
 * Borrow Service
 *
 * Records a loan against a card's native balance, sized through the price oracle.
 * Borrowing moves no funds; it only books the obligation on the same card.
 */

import { logger as rootLogger, type Logger } from '@card-ledger/observability';
import type { LedgerContext } from '../context.js';
import type { PriceOracle } from '../interfaces.js';
import {
  InvalidPriceError,
  LeverageExceededError,
  UnconfiguredError,
} from '../ledger/ledger-errors.js';
import { assertPositiveAmount } from '../ledger/ledger-guards.js';
import type { CallerContext } from '../ledger/ledger-types.js';

// 1:1 nominal cap. The names suggest a collateral ratio; the values do not.
export const MAX_LEVERAGE = 100_000n;
export const LEVERAGE_SCALE = 100_000n;

// uint8 range of on-chain price feeds
export const MAX_PRICE_DECIMALS = 255;

export const REPAY_WINDOW_SECONDS = 30 * 24 * 60 * 60;

type BorrowDependencies = LedgerContext & {
  oracle?: PriceOracle | null;
};

export class BorrowService {
  private oracle: PriceOracle | null;
  private readonly log: Logger;

  constructor(private readonly deps: BorrowDependencies) {
    this.oracle = deps.oracle ?? null;
    this.log = (deps.logger ?? rootLogger).child({ module: 'borrow' });
  }

  get isConfigured(): boolean {
    return this.oracle !== null;
  }

  setPriceOracle(caller: CallerContext, oracle: PriceOracle | null): void {
    this.deps.access.requireCapability(caller, 'ledger:configure');
    this.oracle = oracle;
    this.log.info({ configured: oracle !== null }, 'Price oracle updated');
  }

  /**
   * Borrow against the card's native balance
   *
   * `usdAmount` uses 18-decimal fixed point; the result is in native units:
   * borrowed = usdAmount * 10^decimals / price
   *
   * @returns amount added to the card's debt
   * @throws {UnconfiguredError} If no price oracle is set
   * @throws {InvalidPriceError} If the oracle quotes price <= 0
   * @throws {LeverageExceededError} If the borrowed amount exceeds the leverage cap
   */
  borrow(caller: CallerContext, index: number, usdAmount: bigint): bigint {
    this.deps.access.requireCapability(caller, 'ledger:operate');
    const card = this.deps.cards.getOrThrow(index);
    assertPositiveAmount(usdAmount);

    if (!this.oracle) {
      throw new UnconfiguredError('Price oracle');
    }

    const { price, decimals } = this.oracle.latestPrice();
    if (price <= 0n) {
      throw new InvalidPriceError(`non-positive price ${price}`);
    }
    if (!Number.isInteger(decimals) || decimals < 0 || decimals > MAX_PRICE_DECIMALS) {
      throw new InvalidPriceError(`unusable decimals ${decimals}`);
    }

    const borrowed = (usdAmount * 10n ** BigInt(decimals)) / price;
    const capacity = (card.nativeBalance * MAX_LEVERAGE) / LEVERAGE_SCALE;
    if (capacity < borrowed) {
      throw new LeverageExceededError(index, capacity, borrowed);
    }

    const now = this.deps.clock.now();
    const updated = this.deps.cards.update(index, {
      debt: card.debt + borrowed,
      lastBorrowAt: now,
      repayDueAt: now + REPAY_WINDOW_SECONDS,
    });

    this.deps.events.emit({
      type: 'borrow',
      index,
      usdAmount,
      borrowed,
      debt: updated.debt,
      borrowedAt: updated.lastBorrowAt,
      repayDueAt: updated.repayDueAt,
    });
    this.log.info({ index, usdAmount, borrowed, debt: updated.debt }, 'Loan recorded');

    return borrowed;
  }
}
