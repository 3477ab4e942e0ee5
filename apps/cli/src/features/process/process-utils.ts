import { formatDecimal } from '@clearledger/core';
import type { AccountSummary, ProcessingReport } from '@clearledger/ledger';

import { ExitCodes, type ExitCode } from '../shared/exit-codes.js';

import type { ProcessResult } from './process-handler.js';
import { TransactionSourceError } from './transaction-csv-reader.js';

export const SUMMARY_CSV_HEADERS = ['client', 'available', 'held', 'total', 'locked'] as const;

/**
 * Account summary with every balance rendered as a fixed-point string.
 */
export interface AccountSummaryView {
  client: number;
  available: string;
  held: string;
  total: string;
  locked: boolean;
}

/**
 * Process command result data for JSON output.
 */
export interface ProcessCommandResult {
  accounts: AccountSummaryView[];
  stats: ProcessingReport & {
    recordedDeposits: number;
    skippedRows: number;
  };
}

export function toAccountSummaryView(account: AccountSummary): AccountSummaryView {
  return {
    client: account.client,
    available: formatDecimal(account.available),
    held: formatDecimal(account.held),
    total: formatDecimal(account.total),
    locked: account.locked,
  };
}

/**
 * Convert account summaries to CSV, header row first, no trailing newline.
 */
export function convertToCSV(accounts: AccountSummary[]): string {
  const rows = accounts.map((account) => {
    const view = toAccountSummaryView(account);
    return [String(view.client), view.available, view.held, view.total, String(view.locked)].join(',');
  });

  return [SUMMARY_CSV_HEADERS.join(','), ...rows].join('\n');
}

export function toProcessCommandResult(result: ProcessResult): ProcessCommandResult {
  return {
    accounts: result.accounts.map(toAccountSummaryView),
    stats: {
      ...result.report,
      recordedDeposits: result.recordedDeposits,
      skippedRows: result.skippedRows,
    },
  };
}

export function exitCodeForProcessError(error: Error): ExitCode {
  if (!(error instanceof TransactionSourceError)) {
    return ExitCodes.GENERAL_ERROR;
  }

  switch (error.reason) {
    case 'NOT_FOUND':
      return ExitCodes.NOT_FOUND;
    case 'MALFORMED':
      return ExitCodes.VALIDATION_ERROR;
    case 'READ_FAILED':
      return ExitCodes.GENERAL_ERROR;
  }
}
