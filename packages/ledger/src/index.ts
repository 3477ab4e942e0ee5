export {
  AccountEngine,
  createProcessingReport,
  tallyTransactionResult,
  type AccountSummary,
  type IgnoredReason,
  type ProcessingReport,
  type TransactionOutcome,
  type TransactionResult,
} from './account-engine.js';
export { ClientAccount, type AccountSnapshot } from './client-account.js';
export { Ledger, type DepositRecord } from './ledger.js';
export {
  AccountLockedError,
  DuplicateTransactionError,
  InsufficientFundsError,
  ProcessingError,
  type ProcessingErrorCode,
  type ProcessingErrorTypes,
} from './processing-errors.js';
