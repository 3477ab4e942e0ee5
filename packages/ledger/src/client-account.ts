import { ZERO, type ClientId, type PositiveAmount } from '@clearledger/core';
import type { Decimal } from 'decimal.js';

export interface AccountSnapshot {
  client: ClientId;
  available: Decimal;
  held: Decimal;
  total: Decimal;
  locked: boolean;
}

/**
 * Balances of one client. `total` is always `available + held` and is never stored.
 *
 * The methods here apply a transition unconditionally; precondition checks
 * (lock state, funds, ledger lookups) belong to the AccountEngine.
 */
export class ClientAccount {
  private _available: Decimal = ZERO;
  private _held: Decimal = ZERO;
  private _locked = false;

  constructor(readonly client: ClientId) {}

  get available(): Decimal {
    return this._available;
  }

  get held(): Decimal {
    return this._held;
  }

  get total(): Decimal {
    return this._available.plus(this._held);
  }

  get locked(): boolean {
    return this._locked;
  }

  hasAvailable(amount: PositiveAmount): boolean {
    return this._available.greaterThanOrEqualTo(amount.value);
  }

  deposit(amount: PositiveAmount): void {
    this._available = this._available.plus(amount.value);
  }

  withdraw(amount: PositiveAmount): void {
    this._available = this._available.minus(amount.value);
  }

  /** Move a disputed amount from available to held */
  hold(amount: PositiveAmount): void {
    this._available = this._available.minus(amount.value);
    this._held = this._held.plus(amount.value);
  }

  /** Return a held amount to available */
  release(amount: PositiveAmount): void {
    this._held = this._held.minus(amount.value);
    this._available = this._available.plus(amount.value);
  }

  /** Remove a held amount for good and freeze the account */
  chargeback(amount: PositiveAmount): void {
    this._held = this._held.minus(amount.value);
    this._locked = true;
  }

  snapshot(): AccountSnapshot {
    return {
      client: this.client,
      available: this._available,
      held: this._held,
      total: this.total,
      locked: this._locked,
    };
  }
}
