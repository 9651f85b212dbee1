/**
 * Payment primitive
 *
 * The engine only needs to inspect a payment's value and split an exact
 * amount out of it. Change stays in the presented instrument.
 */

import { custodyError } from "../errors.js";

export interface PaymentInstrument {
  readonly value: bigint;
  split(amount: bigint): PaymentInstrument;
}

/**
 * In-process fungible balance
 */
export class Coin implements PaymentInstrument {
  private balance: bigint;

  constructor(value: bigint) {
    if (value < 0n) {
      throw custodyError("INVALID_AMOUNT", { context: { value: value.toString() } });
    }
    this.balance = value;
  }

  get value(): bigint {
    return this.balance;
  }

  split(amount: bigint): Coin {
    if (amount < 0n) {
      throw custodyError("INVALID_AMOUNT", { context: { amount: amount.toString() } });
    }
    if (amount > this.balance) {
      throw custodyError("INSUFFICIENT_PAYMENT", {
        context: { requested: amount.toString(), available: this.balance.toString() },
      });
    }
    this.balance -= amount;
    return new Coin(amount);
  }

  join(other: Coin): this {
    this.balance += other.balance;
    other.balance = 0n;
    return this;
  }
}
