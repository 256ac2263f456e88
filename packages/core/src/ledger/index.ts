/**
 * Ledger Domain
 *
 * Public exports for the card store and balance operations
 */

// Repository layer
export { CardRepository } from './card-repository.js';

// Service layer
export { CardLedgerService, MAX_BATCH_SIZE, balanceOf, balanceUpdate } from './ledger-service.js';

// Events
export { LedgerEventEmitter } from './ledger-events.js';
export type {
  LedgerEvent,
  LedgerEventHandler,
  LedgerEventPayload,
  LedgerEventType,
  LedgerEvents,
} from './ledger-events.js';

// Domain types
export { BALANCE_FIELD } from './ledger-types.js';
export type {
  Asset,
  CallerContext,
  LiquidationResult,
  SwapDirection,
  SwapResult,
} from './ledger-types.js';

// Domain errors
export {
  LedgerError,
  UnauthorizedError,
  OutOfRangeError,
  InsufficientBalanceError,
  InsufficientReserveError,
  UnconfiguredError,
  InvalidPriceError,
  LeverageExceededError,
  NoDebtError,
  InvalidAmountError,
  InvalidCardError,
  TransferFailedError,
  ReentrantCallError,
} from './ledger-errors.js';
export type { LedgerErrorCode, LedgerErrorCategory } from './ledger-errors.js';
