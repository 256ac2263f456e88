/**
 * @card-ledger/core - Ledger engine for synthetic payment cards
 *
 * Card identity generation, balance operations, collateralized borrowing,
 * merchant settlement escrow, liquidation and swaps.
 */

export * from './cards/index.js';
export * from './ledger/index.js';
export * from './borrow/index.js';
export * from './settlement/index.js';
export * from './liquidation/index.js';
export * from './swap/index.js';
export * from './security/index.js';
export { createCardLedgerEngine } from './engine.js';
export type { CardLedgerEngine, CardLedgerEngineOptions } from './engine.js';
export { loadLedgerConfig } from './config.js';
export { systemClock } from './clock.js';
export type { LedgerContext } from './context.js';
export type {
  AssetPort,
  AssetPorts,
  Clock,
  ExactInputSingleParams,
  PriceOracle,
  PriceQuote,
  SwapRouter,
} from './interfaces.js';
