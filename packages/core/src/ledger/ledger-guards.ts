import { InvalidAmountError, TransferFailedError } from './ledger-errors.js';

export function assertPositiveAmount(amount: bigint): void {
  if (amount <= 0n) {
    throw new InvalidAmountError(amount);
  }
}

export function minAmount(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

/**
 * Run an external transfer, turning `false` or a thrown error into TransferFailed
 */
export function requireTransfer(operation: string, transfer: () => boolean): void {
  let ok: boolean;
  try {
    ok = transfer();
  } catch (error) {
    throw new TransferFailedError(operation, { cause: error });
  }
  if (!ok) {
    throw new TransferFailedError(operation);
  }
}
