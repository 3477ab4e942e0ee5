import { describe, expect, it } from 'vitest';

import { Ledger } from '../ledger.js';
import { DuplicateTransactionError } from '../processing-errors.js';

import { amount, clientId, txId } from './test-utils.js';

describe('Ledger', () => {
  it('should record an undisputed deposit', () => {
    const ledger = new Ledger();

    const result = ledger.recordDeposit(txId(1), clientId(1), amount('10'));

    expect(result.isOk()).toBe(true);
    expect(ledger.has(txId(1))).toBe(true);
    expect(ledger.size).toBe(1);

    const record = ledger.lookup(txId(1));
    expect(record?.client).toBe(1);
    expect(record?.amount.toString()).toBe('10');
    expect(record?.disputed).toBe(false);
  });

  it('should return undefined for unknown transactions', () => {
    const ledger = new Ledger();
    expect(ledger.lookup(txId(42))).toBeUndefined();
    expect(ledger.has(txId(42))).toBe(false);
  });

  it('should refuse to overwrite an existing deposit', () => {
    const ledger = new Ledger();
    ledger.recordDeposit(txId(1), clientId(1), amount('10'));

    const result = ledger.recordDeposit(txId(1), clientId(2), amount('99'));

    expect(result.isErr()).toBe(true);
    const error = result._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(DuplicateTransactionError);
    expect(error.code).toBe('DUPLICATE_TRANSACTION');
    expect(error.message).toBe('Transaction 1 was already recorded');
    expect(ledger.lookup(txId(1))?.amount.toString()).toBe('10');
    expect(ledger.lookup(txId(1))?.client).toBe(1);
  });

  it('should toggle the disputed flag', () => {
    const ledger = new Ledger();
    ledger.recordDeposit(txId(7), clientId(3), amount('2.5'));

    ledger.markDisputed(txId(7));
    expect(ledger.lookup(txId(7))?.disputed).toBe(true);

    ledger.markResolved(txId(7));
    expect(ledger.lookup(txId(7))?.disputed).toBe(false);
  });

  it('should not create entries when marking unknown transactions', () => {
    const ledger = new Ledger();

    ledger.markDisputed(txId(5));
    ledger.markResolved(txId(5));

    expect(ledger.has(txId(5))).toBe(false);
    expect(ledger.size).toBe(0);
  });

  it('should hand out records that do not change after later updates', () => {
    const ledger = new Ledger();
    ledger.recordDeposit(txId(1), clientId(1), amount('1'));
    const before = ledger.lookup(txId(1));

    ledger.markDisputed(txId(1));

    expect(before?.disputed).toBe(false);
    expect(ledger.lookup(txId(1))?.disputed).toBe(true);
  });
});
