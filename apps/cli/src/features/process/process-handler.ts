import type { TransactionRecord } from '@clearledger/core';
import {
  AccountEngine,
  Ledger,
  createProcessingReport,
  tallyTransactionResult,
  type AccountSummary,
  type ProcessingReport,
  type TransactionResult,
} from '@clearledger/ledger';
import { getLogger } from '@clearledger/logger';
import { err, ok, type Result } from 'neverthrow';

import {
  openTransactionFile,
  readTransactionRecords,
  toTransactionSourceError,
  type TransactionSourceError,
} from './transaction-csv-reader.js';

const logger = getLogger('ProcessHandler');

export interface ProcessParams {
  filePath: string;
}

export interface ProcessResult {
  accounts: AccountSummary[];
  report: ProcessingReport;
  /** Deposits held in the ledger at the end of the run */
  recordedDeposits: number;
  /** Input rows dropped before reaching the engine */
  skippedRows: number;
}

/**
 * Streams one transaction file through a fresh ledger and account engine.
 * A handler instance serves a single run.
 */
export class ProcessHandler {
  private readonly ledger = new Ledger();
  private readonly engine = new AccountEngine(this.ledger);

  async execute(params: ProcessParams): Promise<Result<ProcessResult, TransactionSourceError>> {
    const input = await openTransactionFile(params.filePath);
    if (input.isErr()) {
      return err(input.error);
    }

    const report = createProcessingReport();
    let skippedRows = 0;

    try {
      const records = readTransactionRecords(input.value, {
        onSkippedRow: () => {
          skippedRows++;
        },
      });

      for await (const record of records) {
        const result = this.engine.apply(record);
        tallyTransactionResult(report, result);
        this.logResult(record, result);
      }
    } catch (error) {
      input.value.destroy();
      return err(toTransactionSourceError(error, params.filePath));
    }

    logger.info(
      {
        applied: report.applied,
        ignored: report.ignored,
        rejected: report.rejected,
        skippedRows,
        accounts: this.engine.accountCount,
      },
      'Processing complete'
    );

    return ok({
      accounts: this.engine.summary(),
      report,
      recordedDeposits: this.ledger.size,
      skippedRows,
    });
  }

  private logResult(record: TransactionRecord, result: TransactionResult): void {
    const context = { type: record.type, client: record.client, tx: record.tx };

    if (result.isErr()) {
      logger.warn({ code: result.error.code, ...context }, result.error.message);
      return;
    }

    if (result.value.status === 'ignored') {
      logger.debug({ reason: result.value.reason, ...context }, 'Transaction ignored');
    }
  }
}
