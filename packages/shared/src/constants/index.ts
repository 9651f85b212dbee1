/**
 * mintvault Constants
 * Protocol limits for collection custody
 */

// ============================================
// TIME
// ============================================
export const TIME = {
  SECOND_MS: 1_000,
  MINUTE_MS: 60_000,
  HOUR_MS: 3_600_000,
  DAY_MS: 86_400_000,
} as const;

// ============================================
// ROLES
// ============================================

/**
 * Permission bits. A registry entry is any non-zero OR of these.
 */
export const ROLE = {
  ADMIN: 1,
  MINTER: 2,
  WITHDRAWER: 4,
} as const;

export const ALL_ROLES = ROLE.ADMIN | ROLE.MINTER | ROLE.WITHDRAWER;

// ============================================
// ADMIN CAPABILITY
// ============================================
export const CAPABILITY = {
  defaultLifetimeMs: 365 * TIME.DAY_MS,
  // Renewal is only possible inside this window after expiry
  gracePeriodMs: 7 * TIME.DAY_MS,
  // Near-expiry notices start this long before expiry
  warningWindowMs: 30 * TIME.DAY_MS,
} as const;

// ============================================
// MINTING
// ============================================
export const MINTING = {
  // Reveal may trail the end of the minting window by at most this much
  revealGraceMs: 24 * TIME.HOUR_MS,
  minRoyaltyPercent: 1,
  maxRoyaltyPercent: 20,
} as const;

// ============================================
// TREASURY
// ============================================
export const WITHDRAWAL = {
  defaultTimeLockMs: 24 * TIME.HOUR_MS,
  multisigThreshold: 2,
} as const;

// ============================================
// ALLOW-LIST
// ============================================
export const WHITELIST = {
  maxBatchSize: 1000,
} as const;

// ============================================
// FIELD LIMITS
// ============================================
export const FIELD_LIMITS = {
  nameMaxLength: 128,
  symbolMaxLength: 16,
  descriptionMaxLength: 2000,
  urlMaxLength: 512,
  attributeKeyMaxLength: 30,
  attributeValueMaxLength: 50,
  maxAttributes: 32,
} as const;

export const ALLOWED_URL_PREFIXES = ["https://", "ipfs://", "ar://"] as const;
