import {
  ClientId,
  formatDecimal,
  type DepositTransaction,
  type DisputeFamilyRecord,
  type TransactionRecord,
  type WithdrawalTransaction,
} from '@clearledger/core';
import { err, ok, type Result } from 'neverthrow';

import { ClientAccount, type AccountSnapshot } from './client-account.js';
import { Ledger, type DepositRecord } from './ledger.js';
import {
  AccountLockedError,
  InsufficientFundsError,
  type ProcessingErrorCode,
  type ProcessingErrorTypes,
} from './processing-errors.js';

/**
 * Why a dispute, resolve or chargeback was dropped without touching any balance.
 */
export type IgnoredReason = 'DEPOSIT_NOT_FOUND' | 'CLIENT_MISMATCH' | 'ALREADY_DISPUTED' | 'NOT_DISPUTED';

export type TransactionOutcome = { status: 'applied' } | { status: 'ignored'; reason: IgnoredReason };

export type TransactionResult = Result<TransactionOutcome, ProcessingErrorTypes>;

export interface ProcessingReport {
  applied: number;
  ignored: number;
  rejected: number;
  rejectedByCode: Partial<Record<ProcessingErrorCode, number>>;
}

export type AccountSummary = AccountSnapshot;

const APPLIED: TransactionOutcome = { status: 'applied' };

export function createProcessingReport(): ProcessingReport {
  return { applied: 0, ignored: 0, rejected: 0, rejectedByCode: {} };
}

/**
 * Add one transaction result to a running report.
 */
export function tallyTransactionResult(report: ProcessingReport, result: TransactionResult): void {
  if (result.isErr()) {
    const code = result.error.code;
    report.rejected++;
    report.rejectedByCode[code] = (report.rejectedByCode[code] ?? 0) + 1;
    return;
  }

  if (result.value.status === 'applied') {
    report.applied++;
  } else {
    report.ignored++;
  }
}

/**
 * Applies transaction records, strictly one at a time and in the order given,
 * to per-client accounts.
 *
 * - Deposits and withdrawals that break a rule are rejected with a ProcessingError.
 * - Disputes, resolves and chargebacks that reference an unknown deposit, another
 *   client's deposit or a deposit in the wrong dispute state are ignored: the result
 *   is ok with status `ignored`.
 * - A locked account rejects every transaction with AccountLockedError.
 *
 * Accounts are created on first sight of a client id, even when the transaction
 * that introduced them is rejected or ignored.
 */
export class AccountEngine {
  private readonly accounts = new Map<ClientId, ClientAccount>();

  constructor(private readonly ledger: Ledger = new Ledger()) {}

  apply(record: TransactionRecord): TransactionResult {
    const account = this.getOrCreateAccount(record.client);

    if (account.locked) {
      return err(new AccountLockedError(record.type, record.client, record.tx));
    }

    switch (record.type) {
      case 'deposit':
        return this.deposit(account, record);
      case 'withdrawal':
        return this.withdraw(account, record);
      case 'dispute':
        return this.dispute(account, record);
      case 'resolve':
        return this.resolve(account, record);
      case 'chargeback':
        return this.chargeback(account, record);
    }
  }

  applyAll(records: Iterable<TransactionRecord>): ProcessingReport {
    const report = createProcessingReport();
    for (const record of records) {
      tallyTransactionResult(report, this.apply(record));
    }
    return report;
  }

  getAccount(client: ClientId): AccountSnapshot | undefined {
    return this.accounts.get(client)?.snapshot();
  }

  get accountCount(): number {
    return this.accounts.size;
  }

  /**
   * One entry per client seen so far, ordered by client id.
   */
  summary(): AccountSummary[] {
    return [...this.accounts.values()]
      .map((account) => account.snapshot())
      .sort((a, b) => ClientId.compare(a.client, b.client));
  }

  private getOrCreateAccount(client: ClientId): ClientAccount {
    let account = this.accounts.get(client);
    if (!account) {
      account = new ClientAccount(client);
      this.accounts.set(client, account);
    }
    return account;
  }

  private deposit(account: ClientAccount, record: DepositTransaction): TransactionResult {
    const recorded = this.ledger.recordDeposit(record.tx, record.client, record.amount);
    if (recorded.isErr()) {
      return err(recorded.error);
    }

    account.deposit(record.amount);
    return ok(APPLIED);
  }

  private withdraw(account: ClientAccount, record: WithdrawalTransaction): TransactionResult {
    if (!account.hasAvailable(record.amount)) {
      return err(
        new InsufficientFundsError(
          record.client,
          record.tx,
          record.amount.toString(),
          formatDecimal(account.available)
        )
      );
    }

    account.withdraw(record.amount);
    return ok(APPLIED);
  }

  private dispute(account: ClientAccount, record: DisputeFamilyRecord): TransactionResult {
    const found = this.findDeposit(record);
    if (found.isErr()) {
      return ok(ignored(found.error));
    }
    if (found.value.disputed) {
      return ok(ignored('ALREADY_DISPUTED'));
    }

    account.hold(found.value.amount);
    this.ledger.markDisputed(record.tx);
    return ok(APPLIED);
  }

  private resolve(account: ClientAccount, record: DisputeFamilyRecord): TransactionResult {
    const found = this.findDeposit(record);
    if (found.isErr()) {
      return ok(ignored(found.error));
    }
    if (!found.value.disputed) {
      return ok(ignored('NOT_DISPUTED'));
    }

    account.release(found.value.amount);
    this.ledger.markResolved(record.tx);
    return ok(APPLIED);
  }

  // The ledger entry keeps its disputed flag: the account is locked from here on
  private chargeback(account: ClientAccount, record: DisputeFamilyRecord): TransactionResult {
    const found = this.findDeposit(record);
    if (found.isErr()) {
      return ok(ignored(found.error));
    }
    if (!found.value.disputed) {
      return ok(ignored('NOT_DISPUTED'));
    }

    account.chargeback(found.value.amount);
    return ok(APPLIED);
  }

  private findDeposit(record: DisputeFamilyRecord): Result<DepositRecord, IgnoredReason> {
    const deposit = this.ledger.lookup(record.tx);
    if (!deposit) {
      return err('DEPOSIT_NOT_FOUND');
    }
    if (deposit.client !== record.client) {
      return err('CLIENT_MISMATCH');
    }
    return ok(deposit);
  }
}

function ignored(reason: IgnoredReason): TransactionOutcome {
  return { status: 'ignored', reason };
}
