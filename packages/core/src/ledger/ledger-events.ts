/**
 * Ledger event emitter
 *
 * One notification per successful operation, never on failure.
 * Handlers run synchronously in registration order; a failing handler is
 * logged and never affects the operation or the remaining handlers.
 */

import { logger as rootLogger, type Logger } from '@card-ledger/observability';
import type { CardNetwork } from '../cards/index.js';
import { systemClock } from '../clock.js';
import type { Clock } from '../interfaces.js';
import type { Asset, SwapDirection } from './ledger-types.js';

export type LedgerEventPayload =
  | {
      type: 'card.created';
      index: number;
      network: CardNetwork;
      maskedPan: string;
    }
  | {
      type: 'deposit';
      index: number;
      asset: Asset;
      amount: bigint;
      from: string;
    }
  | {
      type: 'withdrawal';
      index: number;
      asset: Asset;
      amount: bigint;
      to: string;
    }
  | {
      type: 'borrow';
      index: number;
      usdAmount: bigint;
      borrowed: bigint;
      debt: bigint;
      borrowedAt: number;
      repayDueAt: number;
    }
  | {
      type: 'transfer.requested';
      index: number;
      pan: string;
      amount: bigint;
      merchantId: string;
      payoutAccount: string;
      timestamp: number;
    }
  | {
      type: 'settlement.confirmed';
      index: number;
      amount: bigint;
      merchantAddress: string;
      success: boolean;
    }
  | {
      type: 'swap.executed';
      index: number;
      direction: SwapDirection;
      amountIn: bigint;
      amountOut: bigint;
    }
  | {
      type: 'spend.executed';
      index: number;
      amount: bigint;
      merchantTag: string;
      asset: Asset;
    }
  | {
      type: 'liquidated';
      index: number;
      repaid: bigint;
      remainingBalance: bigint;
    }
  | {
      type: 'verification.rotated';
      index: number;
    }
  | {
      type: 'ownership.transferred';
      previousOwner: string;
      newOwner: string;
    };

export type LedgerEventType = LedgerEventPayload['type'];

export type LedgerEvent = LedgerEventPayload & { emittedAt: Date };

export type LedgerEventHandler = (event: LedgerEvent) => void | Promise<void>;

/**
 * What services need from an emitter
 */
export interface LedgerEvents {
  emit(event: LedgerEventPayload): void;
}

export class LedgerEventEmitter implements LedgerEvents {
  private handlers: LedgerEventHandler[] = [];
  private readonly log: Logger;

  constructor(
    logger: Logger = rootLogger,
    private readonly clock: Clock = systemClock
  ) {
    this.log = logger.child({ module: 'ledger-events' });
  }

  /**
   * Register a handler
   * @returns function that removes the handler again
   */
  on(handler: LedgerEventHandler): () => void {
    this.handlers.push(handler);
    return () => {
      this.handlers = this.handlers.filter((h) => h !== handler);
    };
  }

  emit(event: LedgerEventPayload): void {
    const fullEvent: LedgerEvent = {
      ...event,
      emittedAt: new Date(this.clock.now() * 1000),
    };

    for (const handler of [...this.handlers]) {
      try {
        const result = handler(fullEvent);
        if (result instanceof Promise) {
          result.catch((err: unknown) => this.reportFailure(event.type, err));
        }
      } catch (err) {
        this.reportFailure(event.type, err);
      }
    }
  }

  /**
   * Clear all event handlers
   * Useful for testing to prevent handler accumulation
   */
  clearHandlers(): void {
    this.handlers = [];
  }

  private reportFailure(eventType: LedgerEventType, err: unknown): void {
    this.log.error({ err, eventType }, 'Ledger event handler failed');
  }
}
