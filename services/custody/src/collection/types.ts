/**
 * Collection Types
 *
 * CollectionState is plain data (maps, sets, bigints) so a call can work on
 * a structured clone and commit it in one assignment.
 */

import type { Address, ItemAttributes, ItemMetadataInput } from "@mintvault/shared";
import type { CapabilityRecord, CapabilityState, RoleMask } from "../access/types.js";
import type { PendingWithdrawal } from "../treasury/types.js";

// ============================================
// CALL CONTEXT
// ============================================

/**
 * Supplied by the host for every call: the authenticated sender and the
 * clock oracle's reading. The engine never reads a wall clock.
 */
export interface CallContext {
  sender: string;
  now: number;
}

// ============================================
// COLLECTION STATE
// ============================================

export interface CollectionState {
  id: string;
  name: string;
  symbol: string;
  description: string;
  creator: Address;
  royaltyPercent: number;

  // Minting
  mintPrice: bigint;
  mintingStart: number;
  mintingEnd: number;
  revealTime: number;
  maxSupply: number;
  currentSupply: number;

  // Treasury
  treasuryBalance: bigint;
  withdrawalTimeLock: number;

  // Flags
  paused: boolean;
  upgradable: boolean;
  version: number;

  capability: CapabilityRecord;

  // Tables
  roles: Map<Address, RoleMask>;
  whitelist: Map<Address, number>;
  pendingWithdrawals: Map<Address, PendingWithdrawal>;
  /** operation id → approvers */
  approvals: Map<string, Set<Address>>;

  createdAt: number;
}

/**
 * Read-only view handed to callers
 */
export interface CollectionSnapshot {
  id: string;
  name: string;
  symbol: string;
  description: string;
  creator: Address;
  royaltyPercent: number;
  mintPrice: bigint;
  mintingStart: number;
  mintingEnd: number;
  revealTime: number;
  maxSupply: number;
  currentSupply: number;
  treasuryBalance: bigint;
  withdrawalTimeLock: number;
  paused: boolean;
  upgradable: boolean;
  version: number;
  reentrancyLocked: boolean;
  capability: CapabilityRecord;
  roles: Array<{ address: Address; mask: RoleMask }>;
  whitelist: Array<{ address: Address; expiresAt: number }>;
  pendingWithdrawals: Array<{ requester: Address; amount: bigint; requestedAt: number }>;
  approvals: Array<{ operationId: string; approvers: Address[] }>;
  createdAt: number;
}

/**
 * Capability record plus its lifecycle state at the queried instant
 */
export interface CapabilityStatus extends CapabilityRecord {
  state: CapabilityState;
}

// ============================================
// COLLECTIBLE ITEM
// ============================================

export interface CollectibleItem {
  readonly id: string;
  readonly collectionId: string;
  name: string;
  description: string;
  url: string;
  readonly creator: Address;
  owner: Address;
  revealed: boolean;
  revealTime: number;
  attributes: ItemAttributes;
}

export type MintMetadata = ItemMetadataInput;

// ============================================
// CREATION
// ============================================

export interface CreateCollectionParams {
  name: string;
  symbol: string;
  description: string;
  royaltyPercent: number;
  mintPrice: bigint;
  mintingStart: number;
  mintingEnd: number;
  revealTime: number;
  maxSupply: number;
  upgradable: boolean;
  /** Defaults to now + configured capability lifetime */
  adminCapExpiry?: number;
  /** Defaults to the configured time-lock */
  withdrawalTimeLock?: number;
}

// ============================================
// UPDATES
// ============================================

export type CollectionField = "price" | "minting_end" | "paused" | "withdrawal_time_lock";

export type CollectionUpdate =
  | { field: "price"; value: bigint }
  | { field: "minting_end"; value: number }
  | { field: "paused"; value: boolean }
  | { field: "withdrawal_time_lock"; value: number };

// ============================================
// MINT PHASE
// ============================================

export type MintPhase = "not_started" | "open" | "ended" | "sold_out" | "paused";
