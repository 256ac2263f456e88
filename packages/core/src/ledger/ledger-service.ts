/**
 * Card Ledger Service
 *
 * Card creation plus the balance operations: deposit, withdraw, spend and
 * verification-code rotation. Transfers to and from the outside run inside
 * the re-entrancy guard and always debit before paying out.
 */

import { CardRecordSchema } from '@card-ledger/types';
import { logger as rootLogger, type Logger } from '@card-ledger/observability';
import {
  deriveEntropySeed,
  deriveVerificationCode,
  generateCard,
  isLuhnValid,
  maskPan,
  type Card,
  type CardUpdate,
} from '../cards/index.js';
import type { LedgerContext } from '../context.js';
import type { AssetPorts } from '../interfaces.js';
import {
  InsufficientBalanceError,
  InvalidCardError,
  OutOfRangeError,
} from './ledger-errors.js';
import { assertPositiveAmount, requireTransfer } from './ledger-guards.js';
import { BALANCE_FIELD, type Asset, type CallerContext } from './ledger-types.js';

export const MAX_BATCH_SIZE = 1000;

const ROTATION_TAG = 'ROTATE_VERIFICATION_CODE';

type CardLedgerDependencies = LedgerContext & {
  assets: AssetPorts;
  engineAddress: string;
};

export function balanceOf(card: Card, asset: Asset): bigint {
  return card[BALANCE_FIELD[asset]];
}

export function balanceUpdate(asset: Asset, value: bigint): CardUpdate {
  return asset === 'native' ? { nativeBalance: value } : { tokenBalance: value };
}

export class CardLedgerService {
  private readonly log: Logger;

  constructor(private readonly deps: CardLedgerDependencies) {
    this.log = (deps.logger ?? rootLogger).child({ module: 'card-ledger' });
  }

  /**
   * Append a card record
   *
   * Business rules:
   * - Record must match the card schema and carry a Luhn-valid PAN
   * - Balances must start at zero; funds only enter through deposits
   *
   * @returns index assigned to the card
   * @throws {InvalidCardError} If the record is malformed or pre-funded
   */
  create(card: Card): number {
    const parsed = CardRecordSchema.safeParse(card);
    if (!parsed.success) {
      throw new InvalidCardError(
        parsed.error.issues.map((issue) => `${issue.path.join('.') || 'card'}: ${issue.message}`)
      );
    }

    const record = parsed.data;
    if (!isLuhnValid(record.pan)) {
      throw new InvalidCardError(['pan: Luhn check failed']);
    }
    if (
      record.nativeBalance !== 0n ||
      record.tokenBalance !== 0n ||
      record.reserved !== 0n ||
      record.debt !== 0n
    ) {
      throw new InvalidCardError(['balances: new cards must start with zero balances']);
    }

    const index = this.deps.cards.append(record);

    this.deps.events.emit({
      type: 'card.created',
      index,
      network: record.network,
      maskedPan: maskPan(record.pan),
    });
    this.log.info({ index, network: record.network }, 'Card created');

    return index;
  }

  /**
   * Generate a card from a raw seed and append it
   */
  issue(seed: bigint): number {
    return this.create(generateCard(seed, this.deps.cards.count()));
  }

  /**
   * Generate and append `count` cards seeded from batch-creation entropy
   *
   * Each seed mixes the clock, the loop index and the engine identity, so a
   * batch cannot be replayed even though each record is reproducible from its seed.
   *
   * @throws {OutOfRangeError} If count is outside 1-1000
   */
  generateBatch(count: number): number[] {
    if (!Number.isInteger(count) || count < 1 || count > MAX_BATCH_SIZE) {
      throw new OutOfRangeError('Batch size', count, `expected 1-${MAX_BATCH_SIZE}`);
    }

    const createdAt = this.deps.clock.now();
    const indexes: number[] = [];
    for (let i = 0; i < count; i++) {
      const seed = deriveEntropySeed(createdAt, i, this.deps.engineAddress);
      indexes.push(this.issue(seed));
    }
    return indexes;
  }

  getCard(index: number): Card {
    return this.deps.cards.getOrThrow(index);
  }

  count(): number {
    return this.deps.cards.count();
  }

  depositNative(caller: CallerContext, index: number, amount: bigint): Card {
    return this.deposit(caller, index, amount, 'native');
  }

  depositToken(caller: CallerContext, index: number, amount: bigint): Card {
    return this.deposit(caller, index, amount, 'token');
  }

  withdrawNative(caller: CallerContext, index: number, amount: bigint): Card {
    return this.withdraw(caller, index, amount, 'native');
  }

  withdrawToken(caller: CallerContext, index: number, amount: bigint): Card {
    return this.withdraw(caller, index, amount, 'token');
  }

  /**
   * Debit a card for a merchant purchase
   *
   * @throws {UnauthorizedError} Without the ledger:operate capability
   * @throws {InsufficientBalanceError} If the asset balance is below amount
   */
  spend(
    caller: CallerContext,
    index: number,
    amount: bigint,
    merchantTag: string,
    asset: Asset = 'native'
  ): Card {
    this.deps.access.requireCapability(caller, 'ledger:operate');
    const card = this.deps.cards.getOrThrow(index);
    assertPositiveAmount(amount);

    const balance = balanceOf(card, asset);
    if (balance < amount) {
      throw new InsufficientBalanceError(index, asset, balance, amount);
    }

    const updated = this.deps.cards.update(index, balanceUpdate(asset, balance - amount));

    this.deps.events.emit({ type: 'spend.executed', index, amount, merchantTag, asset });
    this.log.info({ index, amount, merchantTag, asset }, 'Spend executed');

    return updated;
  }

  /**
   * Replace the verification code with one derived from fresh entropy
   * @returns the new 6-digit code
   */
  rotateVerificationCode(caller: CallerContext, index: number): string {
    this.deps.access.requireCapability(caller, 'ledger:operate');
    this.deps.cards.getOrThrow(index);

    const seed = deriveEntropySeed(this.deps.clock.now(), index, ROTATION_TAG);
    const verificationCode = deriveVerificationCode(seed);
    this.deps.cards.update(index, { verificationCode });

    this.deps.events.emit({ type: 'verification.rotated', index });
    this.log.info({ index }, 'Verification code rotated');

    return verificationCode;
  }

  private deposit(caller: CallerContext, index: number, amount: bigint, asset: Asset): Card {
    return this.deps.guard.run(`deposit_${asset}`, () => {
      this.deps.cards.getOrThrow(index);
      assertPositiveAmount(amount);

      requireTransfer(`deposit_${asset}`, () =>
        this.deps.assets[asset].transferIn(caller.actor, amount)
      );

      const card = this.deps.cards.getOrThrow(index);
      const updated = this.deps.cards.update(
        index,
        balanceUpdate(asset, balanceOf(card, asset) + amount)
      );

      this.deps.events.emit({ type: 'deposit', index, asset, amount, from: caller.actor });
      this.log.info({ index, asset, amount }, 'Deposit credited');

      return updated;
    });
  }

  /**
   * Debit first, then pay out; a failed payout restores the debit
   */
  private withdraw(caller: CallerContext, index: number, amount: bigint, asset: Asset): Card {
    this.deps.access.requireCapability(caller, 'ledger:operate');

    return this.deps.guard.run(`withdraw_${asset}`, () => {
      const card = this.deps.cards.getOrThrow(index);
      assertPositiveAmount(amount);

      const balance = balanceOf(card, asset);
      if (balance < amount) {
        throw new InsufficientBalanceError(index, asset, balance, amount);
      }

      this.deps.cards.update(index, balanceUpdate(asset, balance - amount));

      try {
        requireTransfer(`withdraw_${asset}`, () =>
          this.deps.assets[asset].transferOut(caller.actor, amount)
        );
      } catch (error) {
        const latest = this.deps.cards.getOrThrow(index);
        this.deps.cards.update(index, balanceUpdate(asset, balanceOf(latest, asset) + amount));
        this.log.warn({ index, asset, amount, err: error }, 'Withdrawal transfer failed');
        throw error;
      }

      this.deps.events.emit({ type: 'withdrawal', index, asset, amount, to: caller.actor });
      this.log.info({ index, asset, amount }, 'Withdrawal sent');

      return this.deps.cards.getOrThrow(index);
    });
  }
}
