/**
 * Admin Capability Lifecycle
 *
 * Validity is a pure function of (record, now). Admin operations need an
 * unexpired capability; renewal is the inverse and only works inside the
 * 7-day grace window after expiry.
 *
 * Holders present an AdminCapability token. Only tokens created by
 * issueCapability resolve to a record; copies and hand-built objects do not.
 */

import { CAPABILITY, custodyLogger as logger, type Address } from "@mintvault/shared";
import { custodyError } from "../errors.js";
import { parseAddress } from "../validation.js";
import type { AdminCapability, CapabilityRecord, CapabilityState } from "./types.js";

const capabilityLogger = logger.child({ component: "capability" });

const issuedTokens = new WeakSet<AdminCapability>();

export function createCapabilityRecord(
  id: string,
  collectionId: string,
  owner: Address,
  expiresAt: number
): CapabilityRecord {
  return { id, collectionId, owner, expiresAt };
}

// ============================================
// TOKENS
// ============================================

export function issueCapability(record: CapabilityRecord): AdminCapability {
  const token = Object.freeze({ id: record.id, collectionId: record.collectionId });
  issuedTokens.add(token);
  return token;
}

/**
 * The presented token must be one we issued, for this record
 */
export function resolveCapability(token: AdminCapability, record: CapabilityRecord): CapabilityRecord {
  if (
    !issuedTokens.has(token) ||
    token.id !== record.id ||
    token.collectionId !== record.collectionId
  ) {
    throw custodyError("CAPABILITY_MISMATCH", {
      context: { capabilityId: token.id, collectionId: record.collectionId },
    });
  }
  return record;
}

// ============================================
// STATE
// ============================================

export function getCapabilityState(record: CapabilityRecord, now: number): CapabilityState {
  if (now <= record.expiresAt) {
    return record.expiresAt - now <= CAPABILITY.warningWindowMs ? "warning" : "active";
  }
  return now <= record.expiresAt + CAPABILITY.gracePeriodMs ? "expired" : "dead";
}

/**
 * Strict: valid up to and including the expiry instant
 */
export function isCapabilityValid(record: CapabilityRecord, now: number): boolean {
  return now <= record.expiresAt;
}

export function isNearExpiry(record: CapabilityRecord, now: number): boolean {
  return getCapabilityState(record, now) === "warning";
}

// ============================================
// AUTHORIZATION
// ============================================

/**
 * Validity is not checked; see assertCapability.
 */
export function assertCapabilityHeld(record: CapabilityRecord, holder: Address): void {
  if (record.owner !== holder) {
    throw custodyError("NOT_CAPABILITY_HOLDER", {
      context: { capabilityId: record.id, holder },
    });
  }
}

export function assertCapability(record: CapabilityRecord, holder: Address, now: number): void {
  assertCapabilityHeld(record, holder);
  if (!isCapabilityValid(record, now)) {
    throw custodyError("CAPABILITY_EXPIRED", {
      context: {
        capabilityId: record.id,
        expiresAt: record.expiresAt,
        state: getCapabilityState(record, now),
      },
    });
  }
}

// ============================================
// RENEWAL
// ============================================

/**
 * Validate a renewal and return the new expiry. The record itself is not
 * touched; the caller commits the value.
 */
export function planRenewal(record: CapabilityRecord, newExpiry: number, now: number): number {
  const state = getCapabilityState(record, now);
  if (state !== "expired") {
    throw custodyError("NOT_IN_GRACE_PERIOD", {
      context: {
        capabilityId: record.id,
        state,
        expiresAt: record.expiresAt,
        graceEndsAt: record.expiresAt + CAPABILITY.gracePeriodMs,
      },
    });
  }
  if (!Number.isInteger(newExpiry) || newExpiry <= now) {
    throw custodyError("INVALID_EXPIRY", { context: { newExpiry, now } });
  }
  return newExpiry;
}

// ============================================
// TRANSFER
// ============================================

/**
 * Hand the capability to another address. Only the current holder may do so.
 */
export function transferCapability(
  record: CapabilityRecord,
  from: string,
  to: string
): CapabilityRecord {
  const sender = parseAddress(from);
  const recipient = parseAddress(to);

  assertCapabilityHeld(record, sender);
  record.owner = recipient;

  capabilityLogger.debug({
    capabilityId: record.id,
    collectionId: record.collectionId,
    from: sender,
    to: recipient,
  }, "Capability holder changed");

  return record;
}
