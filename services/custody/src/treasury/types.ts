/**
 * Treasury Types
 *
 * Withdrawal lifecycle per requester:
 *   idle → requested → (time-lock elapsed) → executed
 * Executing always consumes the request; funds move only once the
 * operation's approvals reach the multisig threshold.
 */

import type { Address } from "@mintvault/shared";
import type { Coin } from "../mint/payment.js";

// ============================================
// WITHDRAWAL REQUEST
// ============================================

/**
 * At most one per requester. There is no cancel path.
 */
export interface PendingWithdrawal {
  amount: bigint;
  requestedAt: number;
}

export interface WithdrawalRequestReceipt {
  requester: Address;
  amount: bigint;
  requestedAt: number;
  executableAt: number;
}

// ============================================
// EXECUTION
// ============================================

export interface ApprovalProgress {
  operationId: string;
  approvals: number;
  threshold: number;
}

export type ExecuteWithdrawalResult =
  | (ApprovalProgress & {
      status: "awaiting_approvals";
      requester: Address;
      amount: bigint;
    })
  | (ApprovalProgress & {
      status: "disbursed";
      requester: Address;
      amount: bigint;
      payout: Coin;
      remainingBalance: bigint;
    });
