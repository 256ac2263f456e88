/**
 * Ledger Domain Types
 */

export type Asset = 'native' | 'token';

export type SwapDirection = 'native-to-token' | 'token-to-native';

/**
 * Explicit caller identity, passed into every operation
 * The actor is also the counterparty of deposits and withdrawals
 */
export interface CallerContext {
  actor: string;
}

export const BALANCE_FIELD = {
  native: 'nativeBalance',
  token: 'tokenBalance',
} as const satisfies Record<Asset, 'nativeBalance' | 'tokenBalance'>;

export interface LiquidationResult {
  repaid: bigint;
  remainingBalance: bigint;
}

export interface SwapResult {
  amountIn: bigint;
  amountOut: bigint;
}
