/**
 * Treasury Module Exports
 *
 * Provides the collection treasury with:
 * - Mint deposits and disbursements
 * - Per-requester withdrawal requests behind a time-lock
 * - Multisig approval accumulation
 */

// Types
export * from "./types.js";

// Treasury ledger
export * from "./treasury-ledger.js";

// Withdrawal workflow
export * from "./withdrawal-workflow.js";
