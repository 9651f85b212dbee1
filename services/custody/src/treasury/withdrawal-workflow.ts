/**
 * Withdrawal Workflow with Time-lock and Multisig
 *
 * - One pending request per requester; a second request is an error, never
 *   a merge or overwrite
 * - Execution waits out the collection's time-lock
 * - Approvals accumulate under an operation id (the presented capability's id)
 *   and funds move once the threshold is reached
 * - Executing consumes the pending request whether or not funds move
 */

import { WITHDRAWAL, custodyLogger as logger, type Address } from "@mintvault/shared";
import { custodyError } from "../errors.js";
import type { Coin } from "../mint/payment.js";
import type { TreasuryLedger } from "./treasury-ledger.js";
import type { PendingWithdrawal, WithdrawalRequestReceipt } from "./types.js";

const withdrawalLogger = logger.child({ component: "withdrawal-workflow" });

export interface WithdrawalTables {
  pendingWithdrawals: Map<Address, PendingWithdrawal>;
  approvals: Map<string, Set<Address>>;
  withdrawalTimeLock: number;
}

export type WithdrawalExecution =
  | {
      status: "awaiting_approvals";
      amount: bigint;
      approvals: number;
      threshold: number;
    }
  | {
      status: "disbursed";
      amount: bigint;
      approvals: number;
      threshold: number;
      payout: Coin;
    };

// ============================================
// WITHDRAWAL WORKFLOW
// ============================================

export class WithdrawalWorkflow {
  constructor(
    private readonly tables: WithdrawalTables,
    private readonly treasury: TreasuryLedger,
    private readonly threshold: number = WITHDRAWAL.multisigThreshold
  ) {}

  /**
   * Record a withdrawal request. Only the current balance is checked;
   * other outstanding requests are not reserved against it.
   */
  request(requester: Address, amount: bigint, now: number): WithdrawalRequestReceipt {
    if (amount <= 0n) {
      throw custodyError("INVALID_AMOUNT", { context: { amount: amount.toString() } });
    }
    if (!this.treasury.covers(amount)) {
      throw custodyError("INSUFFICIENT_TREASURY", {
        context: {
          requested: amount.toString(),
          available: this.treasury.balance.toString(),
        },
      });
    }
    const existing = this.tables.pendingWithdrawals.get(requester);
    if (existing) {
      throw custodyError("DUPLICATE_WITHDRAWAL", {
        context: {
          requester,
          pendingAmount: existing.amount.toString(),
          requestedAt: existing.requestedAt,
        },
      });
    }

    this.tables.pendingWithdrawals.set(requester, { amount, requestedAt: now });

    const executableAt = now + this.tables.withdrawalTimeLock;

    withdrawalLogger.info({
      requester,
      amount: amount.toString(),
      executableAt,
    }, "Withdrawal requested");

    return { requester, amount, requestedAt: now, executableAt };
  }

  /**
   * Execute the requester's pending withdrawal
   */
  execute(requester: Address, operationId: string, now: number): WithdrawalExecution {
    const pending = this.tables.pendingWithdrawals.get(requester);
    if (!pending) {
      throw custodyError("NO_PENDING_WITHDRAWAL", { context: { requester } });
    }

    const executableAt = pending.requestedAt + this.tables.withdrawalTimeLock;
    if (now < executableAt) {
      throw custodyError("TIMELOCK_ACTIVE", {
        context: {
          requester,
          executableAt,
          remainingMs: executableAt - now,
        },
      });
    }

    // The request is consumed before the threshold is looked at
    this.tables.pendingWithdrawals.delete(requester);

    const approvals = this.approve(operationId, requester);

    if (approvals < this.threshold) {
      withdrawalLogger.info({
        requester,
        operationId,
        approvals,
        threshold: this.threshold,
      }, "Withdrawal approval recorded, threshold not met");

      return {
        status: "awaiting_approvals",
        amount: pending.amount,
        approvals,
        threshold: this.threshold,
      };
    }

    const payout = this.treasury.disburse(pending.amount);

    withdrawalLogger.info({
      requester,
      operationId,
      amount: pending.amount.toString(),
      approvals,
      remainingBalance: this.treasury.balance.toString(),
    }, "Withdrawal executed");

    return {
      status: "disbursed",
      amount: pending.amount,
      approvals,
      threshold: this.threshold,
      payout,
    };
  }

  approvalCount(operationId: string): number {
    return this.tables.approvals.get(operationId)?.size ?? 0;
  }

  // ============================================
  // PRIVATE METHODS
  // ============================================

  /**
   * Idempotent per approver
   */
  private approve(operationId: string, approver: Address): number {
    let approvers = this.tables.approvals.get(operationId);
    if (!approvers) {
      approvers = new Set();
      this.tables.approvals.set(operationId, approvers);
    }
    approvers.add(approver);
    return approvers.size;
  }
}
