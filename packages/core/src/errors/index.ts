/**
 * Base class for all domain errors.
 *
 * The domain layer never throws: fallible operations return
 * `Result<T, DomainError>` and callers branch on `code`.
 */
export abstract class DomainError extends Error {
  abstract readonly code: string;
  readonly context: Record<string, unknown> | undefined;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
  }

  toJSON() {
    return {
      code: this.code,
      context: this.context,
      message: this.message,
      name: this.name,
    };
  }
}

/**
 * Raised when an amount is zero, negative or not a finite decimal.
 */
export class InvalidAmountError extends DomainError {
  readonly code = 'INVALID_AMOUNT';

  constructor(value: string, reason: string) {
    super(`Invalid amount "${value}": ${reason}`, { value, reason });
  }
}

/**
 * Raised when a client or transaction identifier is not an integer in range.
 */
export class InvalidIdentifierError extends DomainError {
  readonly code = 'INVALID_IDENTIFIER';

  constructor(kind: 'client' | 'tx', value: number, max: number) {
    super(`Invalid ${kind} id ${String(value)}: expected an integer between 0 and ${String(max)}`, {
      kind,
      value,
    });
  }
}

/**
 * Raised when a deposit or withdrawal row has no amount.
 */
export class MissingAmountError extends DomainError {
  readonly code = 'MISSING_AMOUNT';

  constructor(transactionType: string) {
    super(`Missing amount for transaction type '${transactionType}'`, { transactionType });
  }
}
