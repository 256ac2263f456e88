/**
 * @card-ledger/observability
 *
 * Structured logging for the card ledger, built on Pino.
 * Card secrets never reach the log stream in clear text.
 */

export { createLogger, logger, maskCardNumbers } from './logger.js';
export type { Logger } from './logger.js';
