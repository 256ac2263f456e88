/**
 * Ledger Domain Errors
 *
 * One class per failure kind. `category` separates deployment problems
 * (configuration) from bad requests, so callers know what to fix.
 */

export type LedgerErrorCode =
  | 'Unauthorized'
  | 'OutOfRange'
  | 'InsufficientBalance'
  | 'InsufficientReserve'
  | 'Unconfigured'
  | 'InvalidPrice'
  | 'LeverageExceeded'
  | 'NoDebt'
  | 'InvalidAmount'
  | 'InvalidCard'
  | 'TransferFailed'
  | 'Reentrant';

export type LedgerErrorCategory =
  | 'authorization'
  | 'request'
  | 'configuration'
  | 'integration'
  | 'concurrency';

export class LedgerError extends Error {
  constructor(
    readonly code: LedgerErrorCode,
    readonly category: LedgerErrorCategory,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UnauthorizedError extends LedgerError {
  constructor(actor: string, requirement: string) {
    super('Unauthorized', 'authorization', `Actor "${actor}" lacks ${requirement}`);
  }
}

export class OutOfRangeError extends LedgerError {
  constructor(subject: string, value: number, bounds: string) {
    super('OutOfRange', 'request', `${subject} ${value} is out of range: ${bounds}`);
  }
}

export class InsufficientBalanceError extends LedgerError {
  constructor(index: number, asset: string, available: bigint, requested: bigint) {
    super(
      'InsufficientBalance',
      'request',
      `Card ${index} has insufficient ${asset} balance: available ${available}, requested ${requested}`
    );
  }
}

export class InsufficientReserveError extends LedgerError {
  constructor(index: number, available: bigint, requested: bigint) {
    super(
      'InsufficientReserve',
      'request',
      `Card ${index} has insufficient reserved funds: available ${available}, requested ${requested}`
    );
  }
}

export class UnconfiguredError extends LedgerError {
  constructor(dependency: string) {
    super('Unconfigured', 'configuration', `${dependency} is not configured`);
  }
}

export class InvalidPriceError extends LedgerError {
  constructor(reason: string) {
    super('InvalidPrice', 'configuration', `Price oracle returned an invalid quote: ${reason}`);
  }
}

export class LeverageExceededError extends LedgerError {
  constructor(index: number, capacity: bigint, requested: bigint) {
    super(
      'LeverageExceeded',
      'request',
      `Card ${index} can borrow at most ${capacity}, requested ${requested}`
    );
  }
}

export class NoDebtError extends LedgerError {
  constructor(index: number) {
    super('NoDebt', 'request', `Card ${index} has no outstanding debt`);
  }
}

export class InvalidAmountError extends LedgerError {
  constructor(amount: bigint) {
    super('InvalidAmount', 'request', `Amount must be greater than zero, got ${amount}`);
  }
}

export class InvalidCardError extends LedgerError {
  constructor(issues: string[]) {
    super('InvalidCard', 'request', `Invalid card record: ${issues.join('; ')}`);
  }
}

export class TransferFailedError extends LedgerError {
  constructor(operation: string, options?: ErrorOptions) {
    super('TransferFailed', 'integration', `External transfer failed during ${operation}`, options);
  }
}

export class ReentrantCallError extends LedgerError {
  constructor(operation: string) {
    super('Reentrant', 'concurrency', `Re-entrant call rejected: ${operation}`);
  }
}
