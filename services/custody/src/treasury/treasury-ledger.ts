/**
 * Treasury Ledger
 *
 * Collection proceeds. The balance only grows through completed mints and
 * only shrinks through fully approved withdrawals.
 */

import { custodyLogger as logger } from "@mintvault/shared";
import { custodyError } from "../errors.js";
import { Coin } from "../mint/payment.js";

const treasuryLogger = logger.child({ component: "treasury-ledger" });

export interface TreasuryAccount {
  treasuryBalance: bigint;
}

// ============================================
// TREASURY LEDGER
// ============================================

export class TreasuryLedger {
  constructor(private readonly account: TreasuryAccount) {}

  get balance(): bigint {
    return this.account.treasuryBalance;
  }

  covers(amount: bigint): boolean {
    return amount <= this.account.treasuryBalance;
  }

  deposit(amount: bigint): bigint {
    if (amount <= 0n) {
      throw custodyError("INVALID_AMOUNT", { context: { amount: amount.toString() } });
    }
    this.account.treasuryBalance += amount;

    treasuryLogger.debug({
      amount: amount.toString(),
      newBalance: this.account.treasuryBalance.toString(),
    }, "Treasury deposit");

    return this.account.treasuryBalance;
  }

  /**
   * Move funds out as a new coin
   */
  disburse(amount: bigint): Coin {
    if (amount <= 0n) {
      throw custodyError("INVALID_AMOUNT", { context: { amount: amount.toString() } });
    }
    if (!this.covers(amount)) {
      throw custodyError("INSUFFICIENT_TREASURY", {
        context: {
          requested: amount.toString(),
          available: this.account.treasuryBalance.toString(),
        },
      });
    }
    this.account.treasuryBalance -= amount;

    treasuryLogger.debug({
      amount: amount.toString(),
      newBalance: this.account.treasuryBalance.toString(),
    }, "Treasury disbursement");

    return new Coin(amount);
  }
}
