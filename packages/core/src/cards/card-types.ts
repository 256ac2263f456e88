/**
 * Card Domain Types
 */

import type { CardFinancials, CardIdentity, CardRecord } from '@card-ledger/types';

export type { CardNetwork } from '@card-ledger/types';

/**
 * A ledger entry: synthetic card identity plus its balances
 */
export type Card = CardRecord;

export type FinancialField = keyof CardFinancials;

/**
 * Fields the ledger may rewrite after creation
 * Identity fields stay fixed, apart from the verification code
 */
export type CardUpdate = Partial<CardFinancials & Pick<CardIdentity, 'verificationCode'>>;

export const EMPTY_FINANCIALS: CardFinancials = {
  nativeBalance: 0n,
  tokenBalance: 0n,
  reserved: 0n,
  debt: 0n,
  lastBorrowAt: 0,
  repayDueAt: 0,
};
