import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

import { ClientId, TransactionId } from '../domain/identifiers.js';
import { MissingAmountError, type DomainError } from '../errors/index.js';
import { TRANSACTION_TYPES, type TransactionRecord } from '../types/transaction-record.js';
import { DECIMAL_STRING_PATTERN } from '../utils/decimal-utils.js';
import { PositiveAmount } from '../value-objects/positive-amount.js';

const IntegerStringSchema = (field: string) =>
  z
    .string({ required_error: `${field} is required` })
    .regex(/^\d+$/, { message: `${field} must be a non-negative integer` })
    .transform((val) => Number(val));

// A row as read from the transaction log, every cell still a string
export const TransactionRowSchema = z.object({
  type: z.enum(TRANSACTION_TYPES, {
    errorMap: () => ({ message: `type must be one of: ${TRANSACTION_TYPES.join(', ')}` }),
  }),
  client: IntegerStringSchema('client'),
  tx: IntegerStringSchema('tx'),
  amount: z
    .string()
    .optional()
    .transform((val) => (val === undefined || val === '' ? undefined : val))
    .refine((val) => val === undefined || DECIMAL_STRING_PATTERN.test(val), {
      message: 'amount must be a plain decimal number',
    }),
});

export type TransactionRow = z.infer<typeof TransactionRowSchema>;

/**
 * Convert a validated row into a typed transaction record.
 * Fails on ids out of range and on missing or non-positive amounts.
 */
export function toTransactionRecord(row: TransactionRow): Result<TransactionRecord, DomainError> {
  const clientResult = ClientId.create(row.client);
  if (clientResult.isErr()) {
    return err(clientResult.error);
  }

  const txResult = TransactionId.create(row.tx);
  if (txResult.isErr()) {
    return err(txResult.error);
  }

  const client = clientResult.value;
  const tx = txResult.value;

  switch (row.type) {
    case 'deposit':
    case 'withdrawal': {
      const amountResult = parseRowAmount(row.type, row.amount);
      if (amountResult.isErr()) {
        return err(amountResult.error);
      }
      const amount = amountResult.value;
      return row.type === 'deposit'
        ? ok({ type: 'deposit', client, tx, amount })
        : ok({ type: 'withdrawal', client, tx, amount });
    }
    case 'dispute':
      return ok({ type: 'dispute', client, tx });
    case 'resolve':
      return ok({ type: 'resolve', client, tx });
    case 'chargeback':
      return ok({ type: 'chargeback', client, tx });
  }
}

function parseRowAmount(type: string, amount: string | undefined): Result<PositiveAmount, DomainError> {
  if (amount === undefined) {
    return err(new MissingAmountError(type));
  }
  return PositiveAmount.create(amount);
}
