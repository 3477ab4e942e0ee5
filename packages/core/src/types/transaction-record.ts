import type { ClientId, TransactionId } from '../domain/identifiers.js';
import type { PositiveAmount } from '../value-objects/positive-amount.js';

export const TRANSACTION_TYPES = ['deposit', 'withdrawal', 'dispute', 'resolve', 'chargeback'] as const;
export type TransactionType = (typeof TRANSACTION_TYPES)[number];

interface TransactionRecordBase {
  client: ClientId;
  tx: TransactionId;
}

export interface DepositTransaction extends TransactionRecordBase {
  type: 'deposit';
  amount: PositiveAmount;
}

export interface WithdrawalTransaction extends TransactionRecordBase {
  type: 'withdrawal';
  amount: PositiveAmount;
}

export interface DisputeTransaction extends TransactionRecordBase {
  type: 'dispute';
}

export interface ResolveTransaction extends TransactionRecordBase {
  type: 'resolve';
}

export interface ChargebackTransaction extends TransactionRecordBase {
  type: 'chargeback';
}

/**
 * One entry of the incoming transaction log.
 * Only deposits and withdrawals carry an amount.
 */
export type TransactionRecord =
  | DepositTransaction
  | WithdrawalTransaction
  | DisputeTransaction
  | ResolveTransaction
  | ChargebackTransaction;

/** Dispute, resolve, chargeback: they reference a prior deposit by `tx` */
export type DisputeFamilyRecord = DisputeTransaction | ResolveTransaction | ChargebackTransaction;
