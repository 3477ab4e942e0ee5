import { describe, expect, it } from 'vitest';

import { InvalidIdentifierError } from '../../errors/index.js';
import { ClientId, TransactionId } from '../identifiers.js';

describe('ClientId', () => {
  it('should accept integers from 0 to 65535', () => {
    expect(ClientId.create(0)._unsafeUnwrap()).toBe(0);
    expect(ClientId.create(65535)._unsafeUnwrap()).toBe(65535);
  });

  it('should reject negative, fractional and out of range values', () => {
    for (const value of [-1, 1.5, 65536, Number.NaN]) {
      const result = ClientId.create(value);
      expect(result.isErr()).toBe(true);
      expect(result._unsafeUnwrapErr()).toBeInstanceOf(InvalidIdentifierError);
    }
  });

  it('should describe the accepted range in the error', () => {
    const error = ClientId.create(70000)._unsafeUnwrapErr();
    expect(error.message).toBe('Invalid client id 70000: expected an integer between 0 and 65535');
    expect(error.code).toBe('INVALID_IDENTIFIER');
  });

  it('should order ids numerically', () => {
    const ids = [3, 1, 2].map((value) => ClientId.create(value)._unsafeUnwrap());
    expect([...ids].sort(ClientId.compare)).toEqual([1, 2, 3]);
  });
});

describe('TransactionId', () => {
  it('should accept the full unsigned 32-bit range', () => {
    expect(TransactionId.create(0).isOk()).toBe(true);
    expect(TransactionId.create(4294967295).isOk()).toBe(true);
  });

  it('should reject values above the range', () => {
    const error = TransactionId.create(4294967296)._unsafeUnwrapErr();
    expect(error.message).toBe('Invalid tx id 4294967296: expected an integer between 0 and 4294967295');
  });
});
