import { err, ok, type Result } from 'neverthrow';

import { InvalidIdentifierError } from '../errors/index.js';

export type ClientId = number & { readonly __brand: 'ClientId' };
export type TransactionId = number & { readonly __brand: 'TransactionId' };

const MAX_CLIENT_ID = 0xffff;
const MAX_TRANSACTION_ID = 0xffffffff;

function isIdInRange(value: number, max: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= max;
}

// Branding is only applied after the range check
export const ClientId = {
  MAX: MAX_CLIENT_ID,
  create: (value: number): Result<ClientId, InvalidIdentifierError> =>
    isIdInRange(value, MAX_CLIENT_ID)
      ? ok(value as ClientId)
      : err(new InvalidIdentifierError('client', value, MAX_CLIENT_ID)),
  compare: (a: ClientId, b: ClientId): number => a - b,
};

export const TransactionId = {
  MAX: MAX_TRANSACTION_ID,
  create: (value: number): Result<TransactionId, InvalidIdentifierError> =>
    isIdInRange(value, MAX_TRANSACTION_ID)
      ? ok(value as TransactionId)
      : err(new InvalidIdentifierError('tx', value, MAX_TRANSACTION_ID)),
  compare: (a: TransactionId, b: TransactionId): number => a - b,
};
