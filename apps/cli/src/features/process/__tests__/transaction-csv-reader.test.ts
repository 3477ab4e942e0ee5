import { Readable } from 'node:stream';

import type { TransactionRecord } from '@clearledger/core';
import { describe, expect, it } from 'vitest';

import {
  TransactionSourceError,
  readTransactionRecords,
  toTransactionSourceError,
  type SkippedRow,
} from '../transaction-csv-reader.js';

async function collect(csv: string, skipped: SkippedRow[] = []): Promise<TransactionRecord[]> {
  const records: TransactionRecord[] = [];
  for await (const record of readTransactionRecords(Readable.from([csv]), {
    onSkippedRow: (row) => skipped.push(row),
  })) {
    records.push(record);
  }
  return records;
}

function describeRecord(record: TransactionRecord): string {
  const amount = record.type === 'deposit' || record.type === 'withdrawal' ? ` ${record.amount.toString()}` : '';
  return `${record.type} ${String(record.client)} ${String(record.tx)}${amount}`;
}

describe('readTransactionRecords', () => {
  it('should read every transaction type with surrounding whitespace', async () => {
    const csv = [
      'type, client, tx, amount',
      'deposit, 1, 1, 1.5',
      'withdrawal, 1, 2, 0.5',
      'dispute, 1, 1,',
      'resolve, 1, 1',
      'chargeback, 1, 1, ',
    ].join('\n');

    const records = await collect(csv);

    expect(records.map(describeRecord)).toEqual([
      'deposit 1 1 1.5',
      'withdrawal 1 2 0.5',
      'dispute 1 1',
      'resolve 1 1',
      'chargeback 1 1',
    ]);
  });

  it('should ignore an amount given on a dispute row', async () => {
    const records = await collect('type,client,tx,amount\ndispute,4,9,12.5\n');

    expect(records).toEqual([{ type: 'dispute', client: 4, tx: 9 }]);
  });

  it('should skip invalid rows and keep reading', async () => {
    const skipped: SkippedRow[] = [];
    const csv = [
      'type,client,tx,amount',
      'transfer,1,1,1',
      'deposit,x,2,1',
      'deposit,1,3,-1',
      'withdrawal,1,4,',
      'deposit,70000,5,1',
      'deposit,1,6,2',
    ].join('\n');

    const records = await collect(csv, skipped);

    expect(records.map(describeRecord)).toEqual(['deposit 1 6 2']);
    expect(skipped).toEqual([
      { record: 1, reason: 'type must be one of: deposit, withdrawal, dispute, resolve, chargeback' },
      { record: 2, reason: 'client must be a non-negative integer' },
      { record: 3, reason: 'Invalid amount "-1": amount must not be negative' },
      { record: 4, reason: "Missing amount for transaction type 'withdrawal'" },
      { record: 5, reason: 'Invalid client id 70000: expected an integer between 0 and 65535' },
    ]);
  });

  it('should skip blank lines', async () => {
    const records = await collect('type,client,tx,amount\n\ndeposit,2,1,3\n\n');

    expect(records.map(describeRecord)).toEqual(['deposit 2 1 3']);
  });

  it('should strip a byte order mark', async () => {
    const records = await collect('\uFEFFtype,client,tx,amount\ndeposit,7,1,3\n');

    expect(records.map(describeRecord)).toEqual(['deposit 7 1 3']);
  });

  it('should reject a header without the required columns', async () => {
    await expect(collect('kind,client,tx,amount\ndeposit,1,1,1\n')).rejects.toThrow(
      'Missing required column(s): type'
    );
  });

  it('should reject an unterminated quote', async () => {
    await expect(collect('type,client,tx,amount\ndeposit,1,1,"1.0\n')).rejects.toMatchObject({
      code: 'CSV_QUOTE_NOT_CLOSED',
    });
  });

  it('should reject when the input stream fails', async () => {
    const input = new Readable({
      read() {
        this.destroy(new Error('disk gone'));
      },
    });

    const iterate = async () => {
      for await (const _record of readTransactionRecords(input)) {
        // drain
      }
    };

    await expect(iterate()).rejects.toThrow('disk gone');
  });
});

describe('toTransactionSourceError', () => {
  it('should pass a TransactionSourceError through', () => {
    const error = new TransactionSourceError('Missing required column(s): tx', 'MALFORMED');

    expect(toTransactionSourceError(error, 'input.csv')).toBe(error);
  });

  it('should wrap any other failure as READ_FAILED', () => {
    const error = toTransactionSourceError(new Error('EISDIR: illegal operation on a directory'), 'input.csv');

    expect(error.reason).toBe('READ_FAILED');
    expect(error.message).toBe('Failed to read input.csv: EISDIR: illegal operation on a directory');
  });
});
