/**
 * @card-ledger/types
 *
 * Shared zod schemas and inferred types for the card ledger packages.
 */

export * from './card.schema.js';
export * from './config.schema.js';
