import { describe, expect, it } from 'vitest';

import { ProcessCommandOptionsSchema, TransactionFileArgumentSchema } from '../schemas.js';

describe('ProcessCommandOptionsSchema', () => {
  it('should accept the json and verbose flags', () => {
    expect(ProcessCommandOptionsSchema.parse({ json: true, verbose: true })).toEqual({ json: true, verbose: true });
  });

  it('should accept no flags', () => {
    expect(ProcessCommandOptionsSchema.parse({})).toEqual({});
  });

  it('should reject a non-boolean flag', () => {
    expect(ProcessCommandOptionsSchema.safeParse({ json: 'yes' }).success).toBe(false);
  });
});

describe('TransactionFileArgumentSchema', () => {
  it('should trim the path', () => {
    expect(TransactionFileArgumentSchema.parse('  transactions.csv ')).toBe('transactions.csv');
  });

  it('should reject a blank path', () => {
    const result = TransactionFileArgumentSchema.safeParse('   ');

    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.message).toBe('A transaction file is required');
  });

  it('should reject a missing path', () => {
    const result = TransactionFileArgumentSchema.safeParse(undefined);

    expect(result.error?.issues[0]?.message).toBe('A transaction file is required');
  });
});
