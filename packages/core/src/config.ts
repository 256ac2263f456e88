import { LedgerConfigSchema, type LedgerConfig } from '@card-ledger/types';

/**
 * Load engine configuration from the environment
 *
 * @throws {Error} Listing every invalid variable
 */
export function loadLedgerConfig(env: NodeJS.ProcessEnv = process.env): LedgerConfig {
  const result = LedgerConfigSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid ledger configuration: ${issues.join('; ')}`);
  }
  return result.data;
}
