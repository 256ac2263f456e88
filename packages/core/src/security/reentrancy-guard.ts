import { ReentrantCallError } from '../ledger/ledger-errors.js';

/**
 * Single-flag re-entrancy barrier
 *
 * Wraps operations that call out to another system mid-operation.
 * A nested guarded call fails with Reentrant; the flag is always released.
 */
export class ReentrancyGuard {
  private entered = false;

  get locked(): boolean {
    return this.entered;
  }

  run<T>(operation: string, fn: () => T): T {
    if (this.entered) {
      throw new ReentrantCallError(operation);
    }

    this.entered = true;
    try {
      return fn();
    } finally {
      this.entered = false;
    }
  }
}
