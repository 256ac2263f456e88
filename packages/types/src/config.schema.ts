/**
 * Engine configuration schema
 * Parsed from environment variables by the core config loader
 */

import { z } from 'zod';

const identifier = (label: string) =>
  z.string().trim().min(1, `${label} must not be empty`);

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

/**
 * Raw environment shape
 * - LEDGER_ENGINE_ADDRESS: engine identity, mixed into batch entropy and used as swap recipient
 * - LEDGER_OWNER_ADDRESS: actor that initially holds every capability
 * - NATIVE_ASSET_ADDRESS / TOKEN_ASSET_ADDRESS: asset identifiers handed to the swap router
 * - SWAP_FEE_TIER: pool fee tier in hundredths of a basis point (default 3000)
 */
export const LedgerEnvSchema = z.object({
  LEDGER_ENGINE_ADDRESS: identifier('LEDGER_ENGINE_ADDRESS').default('engine.local'),
  LEDGER_OWNER_ADDRESS: identifier('LEDGER_OWNER_ADDRESS').default('owner.local'),
  NATIVE_ASSET_ADDRESS: identifier('NATIVE_ASSET_ADDRESS').default('asset.native'),
  TOKEN_ASSET_ADDRESS: identifier('TOKEN_ASSET_ADDRESS').default('asset.token'),
  SWAP_FEE_TIER: z.coerce
    .number()
    .int('SWAP_FEE_TIER must be a whole number')
    .min(1, 'SWAP_FEE_TIER must be positive')
    .max(1_000_000, 'SWAP_FEE_TIER cannot exceed 1000000')
    .default(3000),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export const LedgerConfigSchema = LedgerEnvSchema.transform((env) => ({
  engineAddress: env.LEDGER_ENGINE_ADDRESS,
  ownerAddress: env.LEDGER_OWNER_ADDRESS,
  nativeAssetAddress: env.NATIVE_ASSET_ADDRESS,
  tokenAssetAddress: env.TOKEN_ASSET_ADDRESS,
  swapFeeTier: env.SWAP_FEE_TIER,
  logLevel: env.LOG_LEVEL,
}));

export type LedgerConfig = z.output<typeof LedgerConfigSchema>;
