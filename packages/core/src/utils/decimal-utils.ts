import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

// 28 significant digits: balances built from PositiveAmounts stay exact below 10^24; no operation here divides
Decimal.set({
  precision: 28,
  rounding: Decimal.ROUND_HALF_UP,
  toExpNeg: -29,
  toExpPos: 29,
});

export const ZERO = new Decimal(0);

/** Plain decimal notation: optional sign, digits, optional fraction. No exponent, hex, octal or binary. */
export const DECIMAL_STRING_PATTERN = /^[+-]?\d+(\.\d+)?$/;

/**
 * Parse a string, number or Decimal into a finite Decimal
 */
export function tryParseDecimal(value: string | number | Decimal): Result<Decimal, Error> {
  if (value instanceof Decimal) {
    return value.isFinite() ? ok(value) : err(new Error('Value must be finite'));
  }

  if (typeof value === 'string') {
    if (value.trim() === '') {
      return err(new Error('Value must not be empty'));
    }
    if (!DECIMAL_STRING_PATTERN.test(value)) {
      return err(new Error('Value must be a plain decimal number'));
    }
  }

  try {
    const decimal = new Decimal(value);
    if (!decimal.isFinite()) {
      return err(new Error('Value must be finite'));
    }
    return ok(decimal);
  } catch (error) {
    return err(error instanceof Error ? error : new Error(String(error)));
  }
}

/**
 * Fixed-point string without exponent and without rounding, e.g. `1.5`, `-0.0001`, `12`
 */
export function formatDecimal(decimal: Decimal): string {
  return decimal.toFixed();
}
