import { constants, createReadStream, promises as fs } from 'node:fs';
import type { Readable } from 'node:stream';

import { TransactionRowSchema, toTransactionRecord, type TransactionRecord } from '@clearledger/core';
import { getLogger } from '@clearledger/logger';
import { CsvError, parse } from 'csv-parse';
import { err, ok, type Result } from 'neverthrow';

const logger = getLogger('TransactionCsvReader');

const REQUIRED_COLUMNS = ['type', 'client', 'tx'] as const;

export type TransactionSourceFailure = 'NOT_FOUND' | 'MALFORMED' | 'READ_FAILED';

/**
 * The transaction file itself could not be read. Aborts the run, unlike a bad row.
 */
export class TransactionSourceError extends Error {
  constructor(
    message: string,
    readonly reason: TransactionSourceFailure,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TransactionSourceError';
  }
}

export interface SkippedRow {
  /** 1-based index of the data row, header excluded */
  record: number;
  reason: string;
}

export interface ReadTransactionsOptions {
  onSkippedRow?: ((row: SkippedRow) => void) | undefined;
}

/**
 * Open a transaction file for streaming.
 */
export async function openTransactionFile(filePath: string): Promise<Result<Readable, TransactionSourceError>> {
  try {
    await fs.access(filePath, constants.R_OK);
  } catch (error) {
    return err(new TransactionSourceError(`Transaction file not found: ${filePath}`, 'NOT_FOUND', { cause: error }));
  }

  return ok(createReadStream(filePath, { encoding: 'utf8' }));
}

/**
 * Stream transaction records out of a CSV source.
 *
 * Rows that fail validation are reported through `onSkippedRow`, logged and skipped.
 * Structural problems (unterminated quotes, a header without the required columns,
 * a failing input stream) reject the iteration.
 */
export async function* readTransactionRecords(
  input: Readable,
  options: ReadTransactionsOptions = {}
): AsyncGenerator<TransactionRecord, void, undefined> {
  const parser = parse({
    bom: true,
    columns: validateHeader,
    relax_column_count: true,
    skip_empty_lines: true,
    trim: true,
  });

  input.once('error', (error) => parser.destroy(error));
  const rows: AsyncIterable<unknown> = input.pipe(parser);

  let recordNumber = 0;
  for await (const row of rows) {
    recordNumber++;

    const record = parseRow(row);
    if (record.isErr()) {
      logger.warn({ record: recordNumber, reason: record.error }, 'Skipping invalid transaction row');
      options.onSkippedRow?.({ record: recordNumber, reason: record.error });
      continue;
    }

    yield record.value;
  }
}

/**
 * Wrap whatever a read failed with into a TransactionSourceError.
 */
export function toTransactionSourceError(error: unknown, filePath: string): TransactionSourceError {
  if (error instanceof TransactionSourceError) {
    return error;
  }
  if (error instanceof CsvError) {
    return new TransactionSourceError(`Malformed CSV in ${filePath}: ${error.message}`, 'MALFORMED', { cause: error });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new TransactionSourceError(`Failed to read ${filePath}: ${message}`, 'READ_FAILED', { cause: error });
}

function validateHeader(header: string[]): string[] {
  const missing = REQUIRED_COLUMNS.filter((column) => !header.includes(column));
  if (missing.length > 0) {
    throw new TransactionSourceError(`Missing required column(s): ${missing.join(', ')}`, 'MALFORMED');
  }
  return header;
}

function parseRow(row: unknown): Result<TransactionRecord, string> {
  const validation = TransactionRowSchema.safeParse(row);
  if (!validation.success) {
    return err(validation.error.issues.map((issue) => issue.message).join('; '));
  }

  return toTransactionRecord(validation.data).mapErr((error) => error.message);
}
