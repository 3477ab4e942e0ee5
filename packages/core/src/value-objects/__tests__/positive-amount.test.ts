import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import { InvalidAmountError } from '../../errors/index.js';
import { PositiveAmount } from '../positive-amount.js';

describe('PositiveAmount', () => {
  describe('create', () => {
    it('should accept a positive decimal string', () => {
      const result = PositiveAmount.create('1.1');

      expect(result.isOk()).toBe(true);
      expect(result._unsafeUnwrap().value.equals(new Decimal('1.1'))).toBe(true);
    });

    it('should accept numbers and Decimal instances', () => {
      expect(PositiveAmount.create(5)._unsafeUnwrap().toString()).toBe('5');
      expect(PositiveAmount.create(new Decimal('0.0001'))._unsafeUnwrap().toString()).toBe('0.0001');
    });

    it('should keep up to four decimal places', () => {
      const amount = PositiveAmount.create('4.5678')._unsafeUnwrap();
      expect(amount.toString()).toBe('4.5678');
    });

    it('should reject more than four decimal places instead of rounding', () => {
      const error = PositiveAmount.create('0.1234567890123456789012345678901')._unsafeUnwrapErr();
      expect(error.message).toBe(
        'Invalid amount "0.1234567890123456789012345678901": amount must have at most 4 decimal places'
      );
      expect(PositiveAmount.create('0.00001').isErr()).toBe(true);
    });

    it('should accept trailing zeros beyond four decimal places', () => {
      expect(PositiveAmount.create('1.250000')._unsafeUnwrap().toString()).toBe('1.25');
    });

    it('should reject amounts of 10^15 and above', () => {
      expect(PositiveAmount.create('999999999999999.9999')._unsafeUnwrap().toString()).toBe('999999999999999.9999');

      const error = PositiveAmount.create('1000000000000000')._unsafeUnwrapErr();
      expect(error.message).toBe('Invalid amount "1000000000000000": amount must be less than 1000000000000000');
    });

    it('should reject exponent, hex, octal and binary notation', () => {
      expect(PositiveAmount.create('0x10')._unsafeUnwrapErr().message).toBe(
        'Invalid amount "0x10": Value must be a plain decimal number'
      );
      expect(PositiveAmount.create('1e3').isErr()).toBe(true);
      expect(PositiveAmount.create('0o17').isErr()).toBe(true);
      expect(PositiveAmount.create('0b101').isErr()).toBe(true);
    });

    it('should reject zero', () => {
      const result = PositiveAmount.create('0.0');

      expect(result.isErr()).toBe(true);
      const error = result._unsafeUnwrapErr();
      expect(error).toBeInstanceOf(InvalidAmountError);
      expect(error.code).toBe('INVALID_AMOUNT');
      expect(error.message).toBe('Invalid amount "0.0": amount must not be zero');
    });

    it('should reject negative values', () => {
      const error = PositiveAmount.create('-5.0')._unsafeUnwrapErr();
      expect(error.message).toBe('Invalid amount "-5.0": amount must not be negative');
    });

    it('should reject values that are not decimals', () => {
      expect(PositiveAmount.create('abc').isErr()).toBe(true);
      expect(PositiveAmount.create('').isErr()).toBe(true);
      expect(PositiveAmount.create('Infinity').isErr()).toBe(true);
      expect(PositiveAmount.create(Number.NaN).isErr()).toBe(true);
    });
  });

  it('should compare by value', () => {
    const a = PositiveAmount.create('2.50')._unsafeUnwrap();
    const b = PositiveAmount.create('2.5')._unsafeUnwrap();
    const c = PositiveAmount.create('2.51')._unsafeUnwrap();

    expect(a.equals(b)).toBe(true);
    expect(a.equals(c)).toBe(false);
  });

  it('should serialize to a fixed-point string', () => {
    const amount = PositiveAmount.create('10.25')._unsafeUnwrap();
    expect(JSON.stringify({ amount })).toBe('{"amount":"10.25"}');
  });
});
