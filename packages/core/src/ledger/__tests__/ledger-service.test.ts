/**
 * Card Ledger Service Unit Tests
 *
 * Runs against in-memory asset ports - no external systems
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { generateCard } from '../../cards/index.js';
import { createTestEngine, type TestEngine } from '../../testing/index.js';
import {
  InsufficientBalanceError,
  InvalidAmountError,
  InvalidCardError,
  OutOfRangeError,
  ReentrantCallError,
  TransferFailedError,
  UnauthorizedError,
} from '../ledger-errors.js';
import type { LedgerEvent } from '../ledger-events.js';

describe('CardLedgerService', () => {
  let t: TestEngine;
  let events: LedgerEvent[];

  beforeEach(() => {
    t = createTestEngine();
    events = [];
    t.engine.events.on((event) => {
      events.push(event);
    });
  });

  const eventTypes = () => events.map((event) => event.type);

  describe('create', () => {
    it('appends cards and emits a creation notification', () => {
      const card = generateCard(2n, 0);

      const index = t.engine.ledger.create(card);

      expect(index).toBe(0);
      expect(t.engine.ledger.count()).toBe(1);
      expect(t.engine.ledger.getCard(0).pan).toBe(card.pan);
      expect(events).toHaveLength(1);
      expect(events[0]).toMatchObject({
        type: 'card.created',
        index: 0,
        network: 'visa',
        maskedPan: `************${card.pan.slice(-4)}`,
      });
    });

    it('rejects a PAN that fails the Luhn check', () => {
      const card = generateCard(2n, 0);
      const lastDigit = Number(card.pan.slice(-1));
      const corrupted = { ...card, pan: card.pan.slice(0, -1) + String((lastDigit + 1) % 10) };

      expect(() => t.engine.ledger.create(corrupted)).toThrow(InvalidCardError);
      expect(t.engine.ledger.count()).toBe(0);
      expect(events).toHaveLength(0);
    });

    it('rejects malformed identity fields', () => {
      const card = { ...generateCard(2n, 0), cvv: '12a' };

      expect(() => t.engine.ledger.create(card)).toThrow('cvv: CVV must be 3 digits');
    });

    it('rejects records that arrive with funds', () => {
      const card = { ...generateCard(2n, 0), nativeBalance: 5n };

      expect(() => t.engine.ledger.create(card)).toThrow(InvalidCardError);
      expect(t.engine.ledger.count()).toBe(0);
    });

    it('issues a card from a raw seed at the next index', () => {
      t.engine.ledger.issue(3n);
      const index = t.engine.ledger.issue(4n);

      expect(index).toBe(1);
      expect(t.engine.ledger.getCard(1)).toEqual(generateCard(4n, 1));
    });
  });

  describe('generateBatch', () => {
    it('appends exactly 1000 records at the upper bound', () => {
      const indexes = t.engine.ledger.generateBatch(1000);

      expect(indexes).toHaveLength(1000);
      expect(indexes[0]).toBe(0);
      expect(indexes[999]).toBe(999);
      expect(t.engine.ledger.count()).toBe(1000);
    });

    it('rejects batches above 1000 without appending anything', () => {
      expect(() => t.engine.ledger.generateBatch(1001)).toThrow(OutOfRangeError);
      expect(() => t.engine.ledger.generateBatch(1001)).toThrow('Batch size 1001 is out of range: expected 1-1000');
      expect(t.engine.ledger.count()).toBe(0);
    });

    it('rejects empty batches', () => {
      expect(() => t.engine.ledger.generateBatch(0)).toThrow(OutOfRangeError);
    });

    it('seeds batches from the clock, so later batches differ', () => {
      t.engine.ledger.generateBatch(3);
      t.clock.advance(1);
      t.engine.ledger.generateBatch(3);

      expect(t.engine.ledger.getCard(3).pan).not.toBe(t.engine.ledger.getCard(0).pan);
    });
  });

  describe('deposits', () => {
    beforeEach(() => {
      t.engine.ledger.issue(2n);
      events = [];
    });

    it('credits the native balance after pulling funds in', () => {
      const card = t.engine.ledger.depositNative(t.depositor, 0, 100n);

      expect(card.nativeBalance).toBe(100n);
      expect(t.native.balanceOf(t.depositor.actor)).toBe(999_900n);
      expect(t.native.balanceOf('engine.test')).toBe(100n);
      expect(events).toHaveLength(1);
      expect(events[0]).toMatchObject({
        type: 'deposit',
        index: 0,
        asset: 'native',
        amount: 100n,
        from: 'depositor.test',
      });
    });

    it('credits the token balance through the token port', () => {
      const card = t.engine.ledger.depositToken(t.depositor, 0, 25n);

      expect(card.tokenBalance).toBe(25n);
      expect(card.nativeBalance).toBe(0n);
      expect(t.token.balanceOf(t.depositor.actor)).toBe(999_975n);
    });

    it('rejects zero amounts', () => {
      expect(() => t.engine.ledger.depositNative(t.depositor, 0, 0n)).toThrow(InvalidAmountError);
    });

    it('fails TransferFailed when the incoming transfer is refused', () => {
      const broke = { actor: 'broke.test' };

      expect(() => t.engine.ledger.depositNative(broke, 0, 10n)).toThrow(TransferFailedError);
      expect(t.engine.ledger.getCard(0).nativeBalance).toBe(0n);
      expect(events).toHaveLength(0);
    });

    it('fails OutOfRange for unknown cards', () => {
      expect(() => t.engine.ledger.depositNative(t.depositor, 5, 10n)).toThrow(OutOfRangeError);
      expect(t.native.balanceOf(t.depositor.actor)).toBe(1_000_000n);
    });
  });

  describe('withdrawals', () => {
    beforeEach(() => {
      t.engine.ledger.issue(2n);
      t.engine.ledger.depositNative(t.depositor, 0, 100n);
      t.engine.ledger.depositToken(t.depositor, 0, 30n);
      events = [];
    });

    it('leaves the balance unchanged after a deposit and withdrawal of the same amount', () => {
      t.engine.ledger.depositNative(t.depositor, 0, 40n);
      const card = t.engine.ledger.withdrawNative(t.operator, 0, 40n);

      expect(card.nativeBalance).toBe(100n);
      expect(t.native.balanceOf(t.operator.actor)).toBe(40n);
      expect(eventTypes()).toEqual(['deposit', 'withdrawal']);
    });

    it('withdraws tokens to the caller', () => {
      const card = t.engine.ledger.withdrawToken(t.operator, 0, 30n);

      expect(card.tokenBalance).toBe(0n);
      expect(t.token.balanceOf(t.operator.actor)).toBe(30n);
    });

    it('fails InsufficientBalance when withdrawing more than the balance', () => {
      expect(() => t.engine.ledger.withdrawNative(t.operator, 0, 101n)).toThrow(InsufficientBalanceError);
      expect(() => t.engine.ledger.withdrawNative(t.operator, 0, 101n)).toThrow(
        'Card 0 has insufficient native balance: available 100, requested 101'
      );
      expect(t.engine.ledger.getCard(0).nativeBalance).toBe(100n);
    });

    it('fails Unauthorized without the operate capability', () => {
      expect(() => t.engine.ledger.withdrawNative(t.depositor, 0, 10n)).toThrow(UnauthorizedError);
      expect(t.engine.ledger.getCard(0).nativeBalance).toBe(100n);
      expect(events).toHaveLength(0);
    });

    it('restores the balance when the outgoing transfer fails', () => {
      t.native.failTransfers = true;

      expect(() => t.engine.ledger.withdrawNative(t.operator, 0, 60n)).toThrow(TransferFailedError);
      expect(t.engine.ledger.getCard(0).nativeBalance).toBe(100n);
      expect(events).toHaveLength(0);
    });

    it('debits before paying out and rejects re-entrant withdrawals', () => {
      let nested: unknown;
      let observedBalance: bigint | undefined;
      t.native.onTransferOut = () => {
        observedBalance = t.engine.ledger.getCard(0).nativeBalance;
        try {
          t.engine.ledger.withdrawNative(t.operator, 0, 10n);
        } catch (error) {
          nested = error;
        }
      };

      const card = t.engine.ledger.withdrawNative(t.operator, 0, 40n);

      expect(observedBalance).toBe(60n);
      expect(nested).toBeInstanceOf(ReentrantCallError);
      expect(card.nativeBalance).toBe(60n);
      expect(t.native.balanceOf(t.operator.actor)).toBe(40n);
    });

    it('releases the guard after a failed withdrawal', () => {
      expect(() => t.engine.ledger.withdrawNative(t.operator, 0, 500n)).toThrow(InsufficientBalanceError);

      expect(t.engine.ledger.withdrawNative(t.operator, 0, 10n).nativeBalance).toBe(90n);
    });
  });

  describe('spend', () => {
    beforeEach(() => {
      t.engine.ledger.issue(2n);
      t.engine.ledger.depositNative(t.depositor, 0, 100n);
      t.engine.ledger.depositToken(t.depositor, 0, 20n);
      events = [];
    });

    it('debits the native balance and tags the merchant', () => {
      const card = t.engine.ledger.spend(t.operator, 0, 35n, 'coffee-shop');

      expect(card.nativeBalance).toBe(65n);
      expect(events[0]).toMatchObject({
        type: 'spend.executed',
        index: 0,
        amount: 35n,
        merchantTag: 'coffee-shop',
        asset: 'native',
      });
    });

    it('debits the token balance when asked to', () => {
      const card = t.engine.ledger.spend(t.operator, 0, 20n, 'bookshop', 'token');

      expect(card.tokenBalance).toBe(0n);
      expect(card.nativeBalance).toBe(100n);
    });

    it('fails InsufficientBalance above the balance', () => {
      expect(() => t.engine.ledger.spend(t.operator, 0, 21n, 'bookshop', 'token')).toThrow(
        InsufficientBalanceError
      );
      expect(events).toHaveLength(0);
    });

    it('fails Unauthorized without the operate capability', () => {
      expect(() => t.engine.ledger.spend(t.depositor, 0, 1n, 'bookshop')).toThrow(UnauthorizedError);
      expect(t.engine.ledger.getCard(0).nativeBalance).toBe(100n);
    });
  });

  describe('rotateVerificationCode', () => {
    beforeEach(() => {
      t.engine.ledger.issue(2n);
      events = [];
    });

    it('replaces only the verification code', () => {
      const before = t.engine.ledger.getCard(0);

      const code = t.engine.ledger.rotateVerificationCode(t.operator, 0);

      const after = t.engine.ledger.getCard(0);
      expect(code).toMatch(/^[0-9]{6}$/);
      expect(after.verificationCode).toBe(code);
      expect({ ...after, verificationCode: before.verificationCode }).toEqual(before);
      expect(events).toEqual([expect.objectContaining({ type: 'verification.rotated', index: 0 })]);
    });

    it('fails Unauthorized without the operate capability', () => {
      const before = t.engine.ledger.getCard(0).verificationCode;

      expect(() => t.engine.ledger.rotateVerificationCode(t.depositor, 0)).toThrow(UnauthorizedError);
      expect(t.engine.ledger.getCard(0).verificationCode).toBe(before);
    });

    it('fails OutOfRange for unknown cards', () => {
      expect(() => t.engine.ledger.rotateVerificationCode(t.operator, 1)).toThrow(OutOfRangeError);
    });
  });
});
