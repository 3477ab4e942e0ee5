import { DomainError, type ClientId, type TransactionId, type TransactionType } from '@clearledger/core';

/**
 * Reportable, non-fatal failures of a single transaction.
 * The engine leaves every balance untouched when it returns one of these.
 */
export abstract class ProcessingError extends DomainError {
  constructor(
    message: string,
    readonly transactionType: TransactionType,
    readonly client: ClientId,
    readonly tx: TransactionId
  ) {
    super(message, { type: transactionType, client, tx });
  }
}

export class AccountLockedError extends ProcessingError {
  readonly code = 'ACCOUNT_LOCKED';

  constructor(transactionType: TransactionType, client: ClientId, tx: TransactionId) {
    super(`Account ${String(client)} is locked, ${transactionType} ${String(tx)} rejected`, transactionType, client, tx);
  }
}

export class DuplicateTransactionError extends ProcessingError {
  readonly code = 'DUPLICATE_TRANSACTION';

  constructor(transactionType: TransactionType, client: ClientId, tx: TransactionId) {
    super(`Transaction ${String(tx)} was already recorded`, transactionType, client, tx);
  }
}

export class InsufficientFundsError extends ProcessingError {
  readonly code = 'INSUFFICIENT_FUNDS';

  constructor(
    client: ClientId,
    tx: TransactionId,
    readonly requested: string,
    readonly available: string
  ) {
    super(
      `Insufficient funds for withdrawal ${String(tx)}: requested ${requested}, available ${available}`,
      'withdrawal',
      client,
      tx
    );
  }
}

export type ProcessingErrorCode = (AccountLockedError | DuplicateTransactionError | InsufficientFundsError)['code'];

export type ProcessingErrorTypes = AccountLockedError | DuplicateTransactionError | InsufficientFundsError;
