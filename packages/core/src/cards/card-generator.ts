/**
 * Card Generator
 *
 * Deterministic synthetic card identities. Every digit comes from
 * SHA-256(seed, domain tag, position), so identical (seed, index) pairs
 * always yield identical records and adjacent digits are uncorrelated.
 */

import { createHash } from 'node:crypto';
import { NETWORK_PROFILES, networkForSeed, type NetworkProfile } from './card-networks.js';
import { luhnCheckDigit } from './luhn.js';
import { EMPTY_FINANCIALS, type Card } from './card-types.js';

export const EXPIRY_BASE_YEAR = 2026;
export const EXPIRY_YEAR_WINDOW = 5;

const SECONDS_PER_YEAR = 365 * 24 * 60 * 60;
const SECONDS_PER_MONTH = 30 * 24 * 60 * 60;
const TIMESTAMP_MODULUS = 2 ** 32;

const CVV_LENGTH = 3;
const VERIFICATION_CODE_LENGTH = 6;

const FIRST_NAMES = ['AVERY', 'JORDAN', 'MORGAN', 'RILEY', 'CASEY', 'QUINN', 'ROWAN', 'SAGE', 'EMERSON', 'PARKER'];
const LAST_NAMES = ['ABBOTT', 'BRENNAN', 'CALLOWAY', 'DRAKE', 'ELLISON', 'FAIRBANK', 'GARRISON', 'HOLLOWAY', 'IVERSON', 'JANSEN'];

export const DomainTag = {
  pan: 'PAN',
  cvv: 'CVV',
  expiryMonth: 'EXPIRY_MONTH',
  expiryYear: 'EXPIRY_YEAR',
  verificationCode: 'VERIFICATION_CODE',
  holderFirst: 'HOLDER_FIRST',
  holderLast: 'HOLDER_LAST',
} as const;

function toWord(value: bigint): Buffer {
  return Buffer.from(BigInt.asUintN(256, value).toString(16).padStart(64, '0'), 'hex');
}

/**
 * hash(seed, tag[, position]) as an unsigned 256-bit integer
 */
export function hashToBigInt(seed: bigint, tag: string, position?: bigint | number): bigint {
  const hash = createHash('sha256').update(toWord(seed)).update(tag, 'utf8');
  if (position !== undefined) {
    hash.update(toWord(BigInt(position)));
  }
  return BigInt(`0x${hash.digest('hex')}`);
}

export function hashDigit(seed: bigint, tag: string, position: number): number {
  return Number(hashToBigInt(seed, tag, position) % 10n);
}

export function deriveDigits(seed: bigint, tag: string, length: number, offset = 0): string {
  let digits = '';
  for (let i = 0; i < length; i++) {
    digits += String(hashDigit(seed, tag, offset + i));
  }
  return digits;
}

/**
 * Fold arbitrary runtime entropy (time, counters, identities) into a seed
 */
export function deriveEntropySeed(...parts: Array<string | number | bigint>): bigint {
  const digest = createHash('sha256').update(parts.map(String).join('|'), 'utf8').digest('hex');
  return BigInt(`0x${digest}`);
}

export function derivePan(seed: bigint, profile: NetworkProfile): string {
  const coreLength = profile.panLength - profile.prefix.length - 1;
  const payload = profile.prefix + deriveDigits(seed, DomainTag.pan, coreLength);
  return payload + String(luhnCheckDigit(payload));
}

export function deriveVerificationCode(seed: bigint): string {
  return deriveDigits(seed, DomainTag.verificationCode, VERIFICATION_CODE_LENGTH);
}

/**
 * Reduce an expiry to a uint32 timestamp
 *
 * Wraps modulo 2^32, so years past 2105 land before the issuance date.
 * Nothing orders cards by expiry, so the wrap is kept.
 */
export function toBoundedExpiryTimestamp(year: number, month: number): number {
  const seconds = (year - 1970) * SECONDS_PER_YEAR + (month - 1) * SECONDS_PER_MONTH;
  return ((seconds % TIMESTAMP_MODULUS) + TIMESTAMP_MODULUS) % TIMESTAMP_MODULUS;
}

export function formatExpiry(month: number, year: number): string {
  return `${String(month).padStart(2, '0')}/${year}`;
}

export function maskPan(pan: string): string {
  return `${'*'.repeat(Math.max(pan.length - 4, 0))}${pan.slice(-4)}`;
}

function pick(list: readonly string[], value: bigint): string {
  return list[Number(value % BigInt(list.length))] ?? '';
}

/**
 * Generate one card record with zeroed balances
 *
 * @param seed - raw seed; reduced to 256 bits, parity picks the network
 * @param index - ledger index the record is destined for
 */
export function generateCard(seed: bigint, index: number): Card {
  if (!Number.isSafeInteger(index) || index < 0) {
    throw new RangeError(`Card index must be a non-negative integer, got ${index}`);
  }

  const word = BigInt.asUintN(256, seed);
  const network = networkForSeed(word);
  const profile = NETWORK_PROFILES[network];

  const month = Number(hashToBigInt(word, DomainTag.expiryMonth) % 12n) + 1;
  const year = EXPIRY_BASE_YEAR + Number(hashToBigInt(word, DomainTag.expiryYear) % BigInt(EXPIRY_YEAR_WINDOW));

  const firstName = pick(FIRST_NAMES, hashToBigInt(word, DomainTag.holderFirst, index));
  const lastName = pick(LAST_NAMES, hashToBigInt(word, DomainTag.holderLast, index));

  return {
    pan: derivePan(word, profile),
    expiry: formatExpiry(month, year),
    expiryTimestamp: toBoundedExpiryTimestamp(year, month),
    cvv: deriveDigits(word, DomainTag.cvv, CVV_LENGTH),
    network,
    country: profile.country,
    issuer: profile.issuer,
    binRange: profile.binRange,
    cardholderName: `${firstName} ${lastName}`,
    verificationCode: deriveVerificationCode(word),
    ...EMPTY_FINANCIALS,
  };
}
