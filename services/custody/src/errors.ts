/**
 * Custody Errors
 *
 * Every rejected call surfaces a CustodyError with a stable code. Codes are
 * grouped by kind so callers can decide whether to fix input, acquire a role,
 * wait, or give up.
 */

export type CustodyErrorKind =
  | "validation"
  | "authorization"
  | "timing"
  | "state"
  | "resource";

export type CustodyErrorCode =
  // validation
  | "INVALID_NAME"
  | "INVALID_SYMBOL"
  | "INVALID_DESCRIPTION"
  | "INVALID_URL"
  | "INVALID_ATTRIBUTE"
  | "INVALID_ADDRESS"
  | "INVALID_FIELD"
  | "INVALID_FIELD_VALUE"
  | "INVALID_ROLE_MASK"
  | "INVALID_TIME_WINDOW"
  | "INVALID_REVEAL_TIME"
  | "INVALID_ROYALTY"
  | "INVALID_PRICE"
  | "INVALID_SUPPLY"
  | "INVALID_EXPIRY"
  | "INVALID_AMOUNT"
  | "BATCH_TOO_LARGE"
  // authorization
  | "MISSING_ROLE"
  | "CAPABILITY_MISMATCH"
  | "NOT_CAPABILITY_HOLDER"
  | "CAPABILITY_EXPIRED"
  | "NOT_WHITELISTED"
  | "ITEM_MISMATCH"
  | "NOT_ITEM_OWNER"
  // timing
  | "MINT_NOT_STARTED"
  | "MINT_ENDED"
  | "TIMELOCK_ACTIVE"
  | "NOT_IN_GRACE_PERIOD"
  | "REVEAL_NOT_READY"
  // state
  | "COLLECTION_PAUSED"
  | "SOLD_OUT"
  | "DUPLICATE_WITHDRAWAL"
  | "NO_PENDING_WITHDRAWAL"
  | "REENTRANT_CALL"
  | "NOT_UPGRADABLE"
  | "ALREADY_REVEALED"
  // resource
  | "INSUFFICIENT_PAYMENT"
  | "INSUFFICIENT_TREASURY";

export interface CustodyErrorDetail {
  kind: CustodyErrorKind;
  message: string;
}

// ============================================
// REGISTRY
// ============================================

/**
 * Keep codes stable once published; hosts key retry logic on them.
 */
export const CUSTODY_ERRORS: Record<CustodyErrorCode, CustodyErrorDetail> = {
  INVALID_NAME: { kind: "validation", message: "Name is empty or too long" },
  INVALID_SYMBOL: { kind: "validation", message: "Symbol must be 1-16 uppercase alphanumeric characters" },
  INVALID_DESCRIPTION: { kind: "validation", message: "Description is too long" },
  INVALID_URL: { kind: "validation", message: "URL is too long or has an unsupported scheme" },
  INVALID_ATTRIBUTE: { kind: "validation", message: "Attribute key or value exceeds its length limit" },
  INVALID_ADDRESS: { kind: "validation", message: "Malformed address" },
  INVALID_FIELD: { kind: "validation", message: "Unknown collection field" },
  INVALID_FIELD_VALUE: { kind: "validation", message: "Value is not valid for this field" },
  INVALID_ROLE_MASK: { kind: "validation", message: "Role mask must be a non-zero combination of ADMIN, MINTER, WITHDRAWER" },
  INVALID_TIME_WINDOW: { kind: "validation", message: "Minting start must be before minting end" },
  INVALID_REVEAL_TIME: { kind: "validation", message: "Reveal time must lie between minting start and minting end plus grace" },
  INVALID_ROYALTY: { kind: "validation", message: "Royalty must be between 1 and 20 percent" },
  INVALID_PRICE: { kind: "validation", message: "Mint price must be greater than zero" },
  INVALID_SUPPLY: { kind: "validation", message: "Max supply must be greater than zero" },
  INVALID_EXPIRY: { kind: "validation", message: "Expiry must be in the future" },
  INVALID_AMOUNT: { kind: "validation", message: "Amount must be greater than zero" },
  BATCH_TOO_LARGE: { kind: "validation", message: "Batch exceeds the maximum size" },

  MISSING_ROLE: { kind: "authorization", message: "Caller lacks the required role" },
  CAPABILITY_MISMATCH: { kind: "authorization", message: "Capability belongs to a different collection" },
  NOT_CAPABILITY_HOLDER: { kind: "authorization", message: "Caller does not hold the capability" },
  CAPABILITY_EXPIRED: { kind: "authorization", message: "Capability has expired" },
  NOT_WHITELISTED: { kind: "authorization", message: "Caller is not on the allow-list" },
  ITEM_MISMATCH: { kind: "authorization", message: "Item belongs to a different collection" },
  NOT_ITEM_OWNER: { kind: "authorization", message: "Caller does not own the item" },

  MINT_NOT_STARTED: { kind: "timing", message: "Minting has not started" },
  MINT_ENDED: { kind: "timing", message: "Minting has ended" },
  TIMELOCK_ACTIVE: { kind: "timing", message: "Withdrawal time-lock has not elapsed" },
  NOT_IN_GRACE_PERIOD: { kind: "timing", message: "Capability can only be renewed during its grace period" },
  REVEAL_NOT_READY: { kind: "timing", message: "Reveal time has not been reached" },

  COLLECTION_PAUSED: { kind: "state", message: "Collection is paused" },
  SOLD_OUT: { kind: "state", message: "Max supply reached" },
  DUPLICATE_WITHDRAWAL: { kind: "state", message: "A withdrawal request is already pending for this requester" },
  NO_PENDING_WITHDRAWAL: { kind: "state", message: "No pending withdrawal for this requester" },
  REENTRANT_CALL: { kind: "state", message: "Collection is already processing a call" },
  NOT_UPGRADABLE: { kind: "state", message: "Collection is not upgradable" },
  ALREADY_REVEALED: { kind: "state", message: "Item is already revealed" },

  INSUFFICIENT_PAYMENT: { kind: "resource", message: "Payment does not cover the mint price" },
  INSUFFICIENT_TREASURY: { kind: "resource", message: "Treasury balance does not cover the amount" },
};

// ============================================
// ERROR CLASS
// ============================================

export class CustodyError<C extends CustodyErrorCode = CustodyErrorCode> extends Error {
  public readonly kind: CustodyErrorKind;

  constructor(
    public readonly code: C,
    message: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "CustodyError";
    this.kind = CUSTODY_ERRORS[code].kind;
  }
}

export interface CustodyErrorOverrides {
  message?: string;
  context?: Record<string, unknown>;
}

/**
 * Build an error from the registry, optionally overriding the message and
 * attaching context.
 */
export function custodyError<C extends CustodyErrorCode>(
  code: C,
  overrides?: CustodyErrorOverrides
): CustodyError<C> {
  return new CustodyError(
    code,
    overrides?.message ?? CUSTODY_ERRORS[code].message,
    overrides?.context
  );
}

export function isCustodyError(value: unknown, code?: CustodyErrorCode): value is CustodyError {
  if (!(value instanceof CustodyError)) {
    return false;
  }
  return code === undefined || value.code === code;
}
