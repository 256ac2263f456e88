/**
 * Card record schemas
 * Used to validate records handed to the ledger from outside the generator
 */

import { z } from 'zod';

export const CARD_NETWORKS = ['visa', 'mastercard'] as const;

const digits = (length: number, label: string) =>
  z.string().regex(new RegExp(`^\\d{${length}}$`), `${label} must be ${length} digits`);

const amount = z.bigint().nonnegative('Amounts cannot be negative');

const timestamp = z.number().int().nonnegative();

/**
 * Identity portion of a card
 * - pan: 13-19 digits, last digit is the Luhn check digit
 * - expiry: "MM/YYYY"
 * - expiryTimestamp: bounded (uint32) seconds, may wrap for far-future years
 */
export const CardIdentitySchema = z.object({
  pan: z.string().regex(/^\d{13,19}$/, 'PAN must be 13-19 digits'),
  expiry: z.string().regex(/^(0[1-9]|1[0-2])\/\d{4}$/, 'Expiry must be MM/YYYY'),
  expiryTimestamp: timestamp.max(0xffffffff),
  cvv: digits(3, 'CVV'),
  network: z.enum(CARD_NETWORKS),
  country: z.string().length(2),
  issuer: z.string().min(1),
  binRange: z.string().min(1),
  cardholderName: z.string().trim().min(1).max(64),
  verificationCode: digits(6, 'Verification code'),
});

export const CardFinancialsSchema = z.object({
  nativeBalance: amount,
  tokenBalance: amount,
  reserved: amount,
  debt: amount,
  lastBorrowAt: timestamp,
  repayDueAt: timestamp,
});

export const CardRecordSchema = CardIdentitySchema.merge(CardFinancialsSchema);

export type CardNetwork = (typeof CARD_NETWORKS)[number];
export type CardIdentity = z.infer<typeof CardIdentitySchema>;
export type CardFinancials = z.infer<typeof CardFinancialsSchema>;
export type CardRecord = z.infer<typeof CardRecordSchema>;
