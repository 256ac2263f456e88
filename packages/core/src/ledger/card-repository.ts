/**
 * Card Repository
 *
 * Append-only, index-addressed store of card records.
 * Records are copied on the way in and out; nothing outside holds a live reference.
 */

import type { Card, CardUpdate, FinancialField } from '../cards/index.js';
import { OutOfRangeError } from './ledger-errors.js';

const AMOUNT_FIELDS: FinancialField[] = ['nativeBalance', 'tokenBalance', 'reserved', 'debt'];

export class CardRepository {
  private readonly records: Card[] = [];

  /**
   * Append a record
   * @returns index assigned to the record
   */
  append(card: Card): number {
    this.records.push({ ...card });
    return this.records.length - 1;
  }

  count(): number {
    return this.records.length;
  }

  findByIndex(index: number): Card | null {
    const record = this.records[index];
    return record ? { ...record } : null;
  }

  /**
   * Find a record or fail with OutOfRange
   */
  getOrThrow(index: number): Card {
    const record = Number.isInteger(index) && index >= 0 ? this.findByIndex(index) : null;
    if (!record) {
      throw new OutOfRangeError('Card index', index, `store holds ${this.records.length} cards`);
    }
    return record;
  }

  /**
   * Overwrite mutable fields of a record
   * Amount fields must stay non-negative.
   */
  update(index: number, changes: CardUpdate): Card {
    const current = this.getOrThrow(index);
    for (const field of AMOUNT_FIELDS) {
      const value = changes[field];
      if (typeof value === 'bigint' && value < 0n) {
        throw new RangeError(`Card ${index} ${field} cannot become negative`);
      }
    }

    const next: Card = { ...current, ...changes };
    this.records[index] = next;
    return { ...next };
  }
}
