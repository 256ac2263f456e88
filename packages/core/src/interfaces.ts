/**
 * External collaborators the engine calls but does not implement.
 * Every call is synchronous; a port reports failure by returning false or throwing.
 */

/**
 * Fungible asset transfer interface, one instance per asset
 */
export interface AssetPort {
  transferIn(from: string, amount: bigint): boolean;
  transferOut(to: string, amount: bigint): boolean;
  approve(spender: string, amount: bigint): boolean;
}

export interface PriceQuote {
  /** Signed; zero or negative quotes are rejected */
  price: bigint;
  decimals: number;
}

export interface PriceOracle {
  latestPrice(): PriceQuote;
}

export interface ExactInputSingleParams {
  tokenIn: string;
  tokenOut: string;
  fee: number;
  recipient: string;
  deadline: number;
  amountIn: bigint;
  amountOutMinimum: bigint;
}

export interface SwapRouter {
  /** Router identity the input asset is approved for */
  readonly address: string;
  exactInputSingle(params: ExactInputSingleParams): bigint;
}

/**
 * Source of the current time in unix seconds
 */
export interface Clock {
  now(): number;
}

export type AssetPorts = {
  native: AssetPort;
  token: AssetPort;
};
