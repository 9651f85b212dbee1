/**
 * Collection Event Types
 *
 * Every event carries the collection id and the clock value of the call that
 * produced it. Amounts are bigint.
 */

import type { Address } from "@mintvault/shared";
import type { RoleName } from "../access/types.js";

interface EventBase {
  collectionId: string;
  timestamp: number;
}

export interface CollectionCreatedEvent extends EventBase {
  type: "collection_created";
  creator: Address;
  name: string;
  symbol: string;
  maxSupply: number;
  mintPrice: bigint;
  capabilityId: string;
}

export interface ItemMintedEvent extends EventBase {
  type: "item_minted";
  itemId: string;
  minter: Address;
  price: bigint;
  supply: number;
}

export interface ItemRevealedEvent extends EventBase {
  type: "item_revealed";
  itemId: string;
  revealedBy: Address;
}

export interface ItemAttributesUpdatedEvent extends EventBase {
  type: "item_attributes_updated";
  itemId: string;
  keys: string[];
}

export interface FundsWithdrawnEvent extends EventBase {
  type: "funds_withdrawn";
  recipient: Address;
  amount: bigint;
  remainingBalance: bigint;
}

export interface CollectionUpdatedEvent extends EventBase {
  type: "collection_updated";
  field: string;
  value: string;
  version: number;
  updatedBy: Address;
}

export interface WhitelistBatchUpdatedEvent extends EventBase {
  type: "whitelist_batch_updated";
  action: "added" | "removed";
  count: number;
  addresses: Address[];
}

export interface AdminCapExpiryWarningEvent extends EventBase {
  type: "admin_cap_expiry_warning";
  capabilityId: string;
  expiresAt: number;
  remainingMs: number;
}

export interface CapabilityExtendedEvent extends EventBase {
  type: "capability_extended";
  capabilityId: string;
  previousExpiry: number;
  newExpiry: number;
}

export interface WithdrawalRequestedEvent extends EventBase {
  type: "withdrawal_requested";
  requester: Address;
  amount: bigint;
  executableAt: number;
}

export interface MultisigApprovalAddedEvent extends EventBase {
  type: "multisig_approval_added";
  operationId: string;
  approver: Address;
  approvals: number;
  threshold: number;
}

export interface RoleUpdatedEvent extends EventBase {
  type: "role_updated";
  user: Address;
  /** null when the user's roles were revoked */
  roles: RoleName[] | null;
  updatedBy: Address;
}

export type CollectionEvent =
  | CollectionCreatedEvent
  | ItemMintedEvent
  | ItemRevealedEvent
  | ItemAttributesUpdatedEvent
  | FundsWithdrawnEvent
  | CollectionUpdatedEvent
  | WhitelistBatchUpdatedEvent
  | AdminCapExpiryWarningEvent
  | CapabilityExtendedEvent
  | WithdrawalRequestedEvent
  | MultisigApprovalAddedEvent
  | RoleUpdatedEvent;

export type CollectionEventType = CollectionEvent["type"];

export type CollectionEventOf<T extends CollectionEventType> = Extract<CollectionEvent, { type: T }>;

/**
 * Append-only destination for events
 */
export interface EventSink {
  append(event: CollectionEvent): void;
}
