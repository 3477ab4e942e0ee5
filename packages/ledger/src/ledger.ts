import type { ClientId, PositiveAmount, TransactionId } from '@clearledger/core';
import { err, ok, type Result } from 'neverthrow';

import { DuplicateTransactionError } from './processing-errors.js';

export interface DepositRecord {
  readonly client: ClientId;
  readonly amount: PositiveAmount;
  readonly disputed: boolean;
}

/**
 * Every deposit seen during a run, keyed by transaction id, with its dispute flag.
 * Dispute, resolve and chargeback can only ever reference an entry of this ledger.
 */
export class Ledger {
  private readonly deposits = new Map<TransactionId, DepositRecord>();

  get size(): number {
    return this.deposits.size;
  }

  has(tx: TransactionId): boolean {
    return this.deposits.has(tx);
  }

  lookup(tx: TransactionId): DepositRecord | undefined {
    return this.deposits.get(tx);
  }

  /**
   * Record a new, undisputed deposit. An existing entry is never overwritten.
   */
  recordDeposit(tx: TransactionId, client: ClientId, amount: PositiveAmount): Result<void, DuplicateTransactionError> {
    if (this.deposits.has(tx)) {
      return err(new DuplicateTransactionError('deposit', client, tx));
    }

    this.deposits.set(tx, { client, amount, disputed: false });
    return ok(undefined);
  }

  markDisputed(tx: TransactionId): void {
    this.setDisputed(tx, true);
  }

  markResolved(tx: TransactionId): void {
    this.setDisputed(tx, false);
  }

  // Absent ids are left alone; the engine checks existence before calling
  private setDisputed(tx: TransactionId, disputed: boolean): void {
    const deposit = this.deposits.get(tx);
    if (deposit) {
      this.deposits.set(tx, { ...deposit, disputed });
    }
  }
}
