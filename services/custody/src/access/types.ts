/**
 * Access Control Types
 */

import type { Address, ROLE } from "@mintvault/shared";

// ============================================
// ROLES
// ============================================

export type RoleName = keyof typeof ROLE;

/** A single permission bit */
export type Role = (typeof ROLE)[RoleName];

/**
 * Every legal registry value: a non-zero combination of ADMIN, MINTER, WITHDRAWER
 */
export type RoleMask = 1 | 2 | 3 | 4 | 5 | 6 | 7;

// ============================================
// ADMIN CAPABILITY
// ============================================

/**
 * Authoritative capability record. Lives in collection state; only the engine
 * reads or writes it.
 */
export interface CapabilityRecord {
  id: string;
  collectionId: string;
  owner: Address;
  expiresAt: number;
}

/**
 * Possession token handed to the holder. It only names the capability: the
 * engine accepts tokens it issued and reads holder and expiry from the record.
 */
export interface AdminCapability {
  readonly id: string;
  readonly collectionId: string;
}

/**
 * - active:  now <= expiry, more than 30 days left
 * - warning: now <= expiry, 30 days or less left (informational)
 * - expired: expiry < now <= expiry + 7 days (renewable)
 * - dead:    past the grace window, never renewable again
 */
export type CapabilityState = "active" | "warning" | "expired" | "dead";

// ============================================
// ALLOW-LIST
// ============================================

/**
 * What a batch call actually changed, not what it was given
 */
export interface WhitelistBatchResult {
  count: number;
  addresses: Address[];
}
