/**
 * Cards Domain
 *
 * Public exports for synthetic card identity generation
 */

export {
  generateCard,
  derivePan,
  deriveDigits,
  deriveVerificationCode,
  deriveEntropySeed,
  hashDigit,
  hashToBigInt,
  formatExpiry,
  maskPan,
  toBoundedExpiryTimestamp,
  DomainTag,
  EXPIRY_BASE_YEAR,
  EXPIRY_YEAR_WINDOW,
} from './card-generator.js';
export { luhnCheckDigit, isLuhnValid } from './luhn.js';
export { NETWORK_PROFILES, networkForSeed } from './card-networks.js';
export type { NetworkProfile } from './card-networks.js';
export { EMPTY_FINANCIALS } from './card-types.js';
export type { Card, CardNetwork, CardUpdate, FinancialField } from './card-types.js';
