import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { InvalidAmountError } from '../errors/index.js';
import { formatDecimal, tryParseDecimal } from '../utils/decimal-utils.js';

export const MAX_AMOUNT_SCALE = 4;
export const MAX_AMOUNT = new Decimal('1e15');

/**
 * A decimal amount strictly greater than zero, below 10^15, with at most four
 * decimal places. Amounts outside these bounds are rejected, never rounded.
 *
 * The only way to obtain one is `PositiveAmount.create`, so every deposit and
 * withdrawal that reaches the engine already carries a valid amount.
 */
export class PositiveAmount {
  static create(value: string | number | Decimal): Result<PositiveAmount, InvalidAmountError> {
    const parsed = tryParseDecimal(value);
    if (parsed.isErr()) {
      return err(new InvalidAmountError(String(value), parsed.error.message));
    }

    const decimal = parsed.value;
    if (decimal.isZero()) {
      return err(new InvalidAmountError(String(value), 'amount must not be zero'));
    }
    if (decimal.isNegative()) {
      return err(new InvalidAmountError(String(value), 'amount must not be negative'));
    }
    if (decimal.decimalPlaces() > MAX_AMOUNT_SCALE) {
      return err(
        new InvalidAmountError(String(value), `amount must have at most ${String(MAX_AMOUNT_SCALE)} decimal places`)
      );
    }
    if (decimal.gte(MAX_AMOUNT)) {
      return err(new InvalidAmountError(String(value), `amount must be less than ${formatDecimal(MAX_AMOUNT)}`));
    }

    return ok(new PositiveAmount(decimal));
  }

  private constructor(private readonly _value: Decimal) {}

  get value(): Decimal {
    return this._value;
  }

  equals(other: PositiveAmount): boolean {
    return this._value.equals(other._value);
  }

  toString(): string {
    return formatDecimal(this._value);
  }

  toJSON(): string {
    return this.toString();
  }
}
