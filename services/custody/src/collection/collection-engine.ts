/**
 * Collection Engine
 *
 * One instance per collection. Every state-changing entry point runs under
 * the collection's reentrancy guard against a staged copy of the state:
 *
 *   acquire guard → stage state → run operation → swap on success
 *   → release guard → append buffered events
 *
 * A rejected call leaves the committed state, the guard and the event sink
 * exactly as they were.
 */

import {
  ALL_ROLES,
  ROLE,
  MINTING,
  collectionNameSchema,
  collectionSymbolSchema,
  custodyLogger as logger,
  descriptionSchema,
  audit,
  logError,
  logSecurityEvent,
  type Address,
} from "@mintvault/shared";
import { AllowListGate } from "../access/allowlist-gate.js";
import {
  assertCapability,
  assertCapabilityHeld,
  createCapabilityRecord,
  getCapabilityState,
  isNearExpiry,
  issueCapability,
  planRenewal,
  resolveCapability,
  transferCapability as transferHolder,
} from "../access/capability.js";
import { ReentrancyGuard } from "../access/reentrancy-guard.js";
import { RoleRegistry, describeRoles, parseRoleMask } from "../access/role-registry.js";
import type {
  AdminCapability,
  CapabilityRecord,
  Role,
  RoleMask,
  RoleName,
  WhitelistBatchResult,
} from "../access/types.js";
import { resolveCustodyConfig, type CustodyConfig } from "../config.js";
import { custodyError, isCustodyError } from "../errors.js";
import type { CollectionEvent, EventSink } from "../events/types.js";
import { MintController, getMintPhase as phaseOf } from "../mint/mint-controller.js";
import type { PaymentInstrument } from "../mint/payment.js";
import { TreasuryLedger } from "../treasury/treasury-ledger.js";
import type {
  ExecuteWithdrawalResult,
  PendingWithdrawal,
  WithdrawalRequestReceipt,
} from "../treasury/types.js";
import { WithdrawalWorkflow } from "../treasury/withdrawal-workflow.js";
import { parseAddress, parseTimestamp, validateField } from "../validation.js";
import { UuidAllocator, type ObjectAllocator } from "./allocator.js";
import { createItem, mergeAttributes, validateItemMetadata } from "./items.js";
import type {
  CallContext,
  CapabilityStatus,
  CollectibleItem,
  CollectionSnapshot,
  CollectionState,
  CreateCollectionParams,
  MintMetadata,
  MintPhase,
} from "./types.js";
import { stageState, type StateTable } from "./staging.js";
import { applyCollectionUpdate, parseCollectionUpdate } from "./updates.js";

const engineLogger = logger.child({ component: "collection-engine" });

// ============================================
// TYPES
// ============================================

export interface CollectionEngineDeps {
  /** Defaults to a sink that drops events */
  events?: EventSink;
  allocator?: ObjectAllocator;
  config?: Partial<CustodyConfig>;
}

export interface CreatedCollection {
  engine: CollectionEngine;
  capability: AdminCapability;
}

export interface RoleAssignment {
  mask: RoleMask;
  roles: RoleName[];
}

/**
 * What an operation body sees: the staged state plus the resolved caller
 */
interface CallScope {
  readonly state: CollectionState;
  readonly sender: Address;
  readonly now: number;
  emit(event: CollectionEvent): void;
  /** Runs after the staged state has been committed */
  onCommit(effect: () => void): void;
}

interface StagedResult<T> {
  result: T;
  events: CollectionEvent[];
}

const NO_TABLES: readonly StateTable[] = [];

const discardEvents: EventSink = {
  append: () => undefined,
};

function readContext(ctx: CallContext): { sender: Address; now: number } {
  return {
    sender: parseAddress(ctx.sender),
    now: parseTimestamp(ctx.now, "INVALID_FIELD_VALUE", "now"),
  };
}

// ============================================
// COLLECTION ENGINE
// ============================================

export class CollectionEngine {
  private readonly guard = new ReentrancyGuard();

  private constructor(
    private state: CollectionState,
    private readonly events: EventSink,
    private readonly allocator: ObjectAllocator
  ) {}

  // ============================================
  // CREATION
  // ============================================

  static create(
    params: CreateCollectionParams,
    ctx: CallContext,
    deps: CollectionEngineDeps = {}
  ): CreatedCollection {
    const config = resolveCustodyConfig(deps.config);
    const events = deps.events ?? discardEvents;
    const allocator = deps.allocator ?? new UuidAllocator();

    const { sender: creator, now } = readContext(ctx);

    const name = validateField(collectionNameSchema, params.name, "INVALID_NAME", "name");
    const symbol = validateField(collectionSymbolSchema, params.symbol, "INVALID_SYMBOL", "symbol");
    const description = validateField(
      descriptionSchema,
      params.description,
      "INVALID_DESCRIPTION",
      "description"
    );

    if (
      !Number.isInteger(params.royaltyPercent) ||
      params.royaltyPercent < MINTING.minRoyaltyPercent ||
      params.royaltyPercent > MINTING.maxRoyaltyPercent
    ) {
      throw custodyError("INVALID_ROYALTY", { context: { royaltyPercent: params.royaltyPercent } });
    }
    if (params.mintPrice <= 0n) {
      throw custodyError("INVALID_PRICE", { context: { mintPrice: params.mintPrice.toString() } });
    }
    if (!Number.isInteger(params.maxSupply) || params.maxSupply <= 0) {
      throw custodyError("INVALID_SUPPLY", { context: { maxSupply: params.maxSupply } });
    }

    const mintingStart = parseTimestamp(params.mintingStart, "INVALID_TIME_WINDOW", "mintingStart");
    const mintingEnd = parseTimestamp(params.mintingEnd, "INVALID_TIME_WINDOW", "mintingEnd");
    if (mintingStart >= mintingEnd) {
      throw custodyError("INVALID_TIME_WINDOW", { context: { mintingStart, mintingEnd } });
    }

    const revealTime = parseTimestamp(params.revealTime, "INVALID_REVEAL_TIME", "revealTime");
    if (revealTime < mintingStart || revealTime > mintingEnd + MINTING.revealGraceMs) {
      throw custodyError("INVALID_REVEAL_TIME", {
        context: { revealTime, mintingStart, latest: mintingEnd + MINTING.revealGraceMs },
      });
    }

    const capabilityExpiry = params.adminCapExpiry ?? now + config.defaultCapabilityLifetimeMs;
    if (!Number.isInteger(capabilityExpiry) || capabilityExpiry <= now) {
      throw custodyError("INVALID_EXPIRY", { context: { expiresAt: capabilityExpiry, now } });
    }

    const withdrawalTimeLock = params.withdrawalTimeLock ?? config.defaultWithdrawalTimeLockMs;
    if (!Number.isInteger(withdrawalTimeLock) || withdrawalTimeLock < 0) {
      throw custodyError("INVALID_FIELD_VALUE", {
        context: { field: "withdrawalTimeLock", value: withdrawalTimeLock },
      });
    }

    const collectionId = allocator.allocate("collection");
    const record = createCapabilityRecord(
      allocator.allocate("capability"),
      collectionId,
      creator,
      capabilityExpiry
    );

    const state: CollectionState = {
      id: collectionId,
      name,
      symbol,
      description,
      creator,
      royaltyPercent: params.royaltyPercent,
      mintPrice: params.mintPrice,
      mintingStart,
      mintingEnd,
      revealTime,
      maxSupply: params.maxSupply,
      currentSupply: 0,
      treasuryBalance: 0n,
      withdrawalTimeLock,
      paused: false,
      upgradable: params.upgradable,
      version: 1,
      capability: record,
      roles: new Map<Address, RoleMask>([[creator, parseRoleMask(ALL_ROLES)]]),
      whitelist: new Map(),
      pendingWithdrawals: new Map(),
      approvals: new Map(),
      createdAt: now,
    };

    const engine = new CollectionEngine(state, events, allocator);

    engineLogger.info({
      collectionId,
      creator,
      name,
      symbol,
      maxSupply: params.maxSupply,
      mintPrice: params.mintPrice.toString(),
      capabilityExpiry,
    }, "Collection created");

    events.append({
      type: "collection_created",
      collectionId,
      timestamp: now,
      creator,
      name,
      symbol,
      maxSupply: params.maxSupply,
      mintPrice: params.mintPrice,
      capabilityId: record.id,
    });

    return { engine, capability: issueCapability(record) };
  }

  get id(): string {
    return this.state.id;
  }

  // ============================================
  // MINTING
  // ============================================

  mint(payment: PaymentInstrument, metadata: MintMetadata, ctx: CallContext): CollectibleItem {
    return this.guarded("mint", ctx, NO_TABLES, (scope) => {
      const { state, sender, now } = scope;
      const treasury = new TreasuryLedger(state);
      const controller = new MintController(
        state,
        new RoleRegistry(state.roles),
        new AllowListGate(state.whitelist),
        treasury
      );

      controller.authorize(sender, payment, now);
      const validated = validateItemMetadata(metadata);

      const supply = controller.settle(sender, payment);
      const item = createItem(this.allocator.allocate("item"), state, sender, validated);

      scope.emit({
        type: "item_minted",
        collectionId: state.id,
        timestamp: now,
        itemId: item.id,
        minter: sender,
        price: state.mintPrice,
        supply,
      });

      engineLogger.info({
        collectionId: state.id,
        itemId: item.id,
        minter: sender,
        supply,
        treasuryBalance: treasury.balance.toString(),
      }, "Item minted");

      return item;
    });
  }

  /**
   * Anyone may reveal once the item's reveal time has passed
   */
  reveal(item: CollectibleItem, ctx: CallContext): CollectibleItem {
    const { sender, now } = readContext(ctx);
    this.assertItemInCollection(item);

    if (item.revealed) {
      throw custodyError("ALREADY_REVEALED", { context: { itemId: item.id } });
    }
    if (now < item.revealTime) {
      throw custodyError("REVEAL_NOT_READY", {
        context: { itemId: item.id, revealTime: item.revealTime, now },
      });
    }

    item.revealed = true;

    this.events.append({
      type: "item_revealed",
      collectionId: this.state.id,
      timestamp: now,
      itemId: item.id,
      revealedBy: sender,
    });

    return item;
  }

  /**
   * Merge attributes into an item. Owner only.
   */
  setItemAttributes(
    item: CollectibleItem,
    attributes: Record<string, string>,
    ctx: CallContext
  ): CollectibleItem {
    const { sender, now } = readContext(ctx);
    this.assertItemInCollection(item);

    if (item.owner !== sender) {
      throw custodyError("NOT_ITEM_OWNER", { context: { itemId: item.id, sender } });
    }

    item.attributes = mergeAttributes(item, attributes);

    this.events.append({
      type: "item_attributes_updated",
      collectionId: this.state.id,
      timestamp: now,
      itemId: item.id,
      keys: Object.keys(attributes),
    });

    return item;
  }

  // ============================================
  // ADMINISTRATION
  // ============================================

  /**
   * Set one collection field from its raw (string) value
   */
  updateCollection(
    capability: AdminCapability,
    field: string,
    raw: string,
    ctx: CallContext
  ): CollectionSnapshot {
    this.guarded("update_collection", ctx, NO_TABLES, (scope) => {
      const { state, sender, now } = scope;
      const record = this.authorizeAdmin(scope, capability, ROLE.ADMIN);

      if (!state.upgradable) {
        throw custodyError("NOT_UPGRADABLE", { context: { field } });
      }

      const update = parseCollectionUpdate(field, raw);
      const value = applyCollectionUpdate(state, update);
      state.version += 1;

      scope.emit({
        type: "collection_updated",
        collectionId: state.id,
        timestamp: now,
        field: update.field,
        value,
        version: state.version,
        updatedBy: sender,
      });

      scope.onCommit(() =>
        audit({
          action: "update_collection",
          entityType: "collection",
          entityId: state.id,
          actor: sender,
          details: { field: update.field, value, version: state.version },
        })
      );

      this.warnIfNearExpiry(scope, record);
    });
    return this.getSnapshot();
  }

  updateRole(
    capability: AdminCapability,
    user: string,
    mask: number,
    ctx: CallContext
  ): RoleAssignment {
    return this.guarded("update_role", ctx, ["roles"], (scope) => {
      const { state, sender, now } = scope;
      const record = this.authorizeAdmin(scope, capability, ROLE.ADMIN);

      const address = parseAddress(user);
      const granted = new RoleRegistry(state.roles).grant(address, mask);
      const roles = describeRoles(granted);

      scope.emit({
        type: "role_updated",
        collectionId: state.id,
        timestamp: now,
        user: address,
        roles,
        updatedBy: sender,
      });

      scope.onCommit(() =>
        audit({
          action: "update_role",
          entityType: "collection",
          entityId: state.id,
          actor: sender,
          details: { user: address, roles },
        })
      );

      this.warnIfNearExpiry(scope, record);
      return { mask: granted, roles };
    });
  }

  /**
   * Remove every role held by the user. Returns false if there were none.
   */
  revokeRole(capability: AdminCapability, user: string, ctx: CallContext): boolean {
    return this.guarded("revoke_role", ctx, ["roles"], (scope) => {
      const { state, sender, now } = scope;
      const record = this.authorizeAdmin(scope, capability, ROLE.ADMIN);

      const address = parseAddress(user);
      const revoked = new RoleRegistry(state.roles).revoke(address);

      if (revoked) {
        scope.emit({
          type: "role_updated",
          collectionId: state.id,
          timestamp: now,
          user: address,
          roles: null,
          updatedBy: sender,
        });

        scope.onCommit(() =>
          audit({
            action: "revoke_role",
            entityType: "collection",
            entityId: state.id,
            actor: sender,
            details: { user: address },
          })
        );
      }

      this.warnIfNearExpiry(scope, record);
      return revoked;
    });
  }

  addToWhitelist(
    capability: AdminCapability,
    addresses: readonly string[],
    expiresAt: number,
    ctx: CallContext
  ): WhitelistBatchResult {
    return this.guarded("add_to_whitelist", ctx, ["whitelist"], (scope) => {
      const { state, now } = scope;
      const record = this.authorizeAdmin(scope, capability, ROLE.ADMIN);

      const result = new AllowListGate(state.whitelist).addBatch(addresses, expiresAt, now);

      scope.emit({
        type: "whitelist_batch_updated",
        collectionId: state.id,
        timestamp: now,
        action: "added",
        count: result.count,
        addresses: result.addresses,
      });

      this.warnIfNearExpiry(scope, record);
      return result;
    });
  }

  removeFromWhitelist(
    capability: AdminCapability,
    addresses: readonly string[],
    ctx: CallContext
  ): WhitelistBatchResult {
    return this.guarded("remove_from_whitelist", ctx, ["whitelist"], (scope) => {
      const { state, now } = scope;
      const record = this.authorizeAdmin(scope, capability, ROLE.ADMIN);

      const result = new AllowListGate(state.whitelist).removeBatch(addresses);

      scope.emit({
        type: "whitelist_batch_updated",
        collectionId: state.id,
        timestamp: now,
        action: "removed",
        count: result.count,
        addresses: result.addresses,
      });

      this.warnIfNearExpiry(scope, record);
      return result;
    });
  }

  // ============================================
  // TREASURY
  // ============================================

  requestWithdrawal(
    capability: AdminCapability,
    amount: bigint,
    ctx: CallContext
  ): WithdrawalRequestReceipt {
    return this.guarded("request_withdrawal", ctx, ["pendingWithdrawals"], (scope) => {
      const { state, sender, now } = scope;
      const record = this.authorizeAdmin(scope, capability, ROLE.WITHDRAWER);

      const receipt = this.workflow(state).request(sender, amount, now);

      scope.emit({
        type: "withdrawal_requested",
        collectionId: state.id,
        timestamp: now,
        requester: sender,
        amount,
        executableAt: receipt.executableAt,
      });

      this.warnIfNearExpiry(scope, record);
      return receipt;
    });
  }

  /**
   * Consumes the caller's pending request and records their approval under
   * the capability's id. Funds move only once the threshold is reached.
   */
  executeWithdrawal(capability: AdminCapability, ctx: CallContext): ExecuteWithdrawalResult {
    const writes: readonly StateTable[] = ["pendingWithdrawals", "approvals"];
    return this.guarded("execute_withdrawal", ctx, writes, (scope): ExecuteWithdrawalResult => {
      const { state, sender, now } = scope;
      const record = this.authorizeAdmin(scope, capability, ROLE.WITHDRAWER);

      const operationId = record.id;
      const execution = this.workflow(state).execute(sender, operationId, now);

      scope.emit({
        type: "multisig_approval_added",
        collectionId: state.id,
        timestamp: now,
        operationId,
        approver: sender,
        approvals: execution.approvals,
        threshold: execution.threshold,
      });

      this.warnIfNearExpiry(scope, record);

      if (execution.status === "awaiting_approvals") {
        return {
          status: "awaiting_approvals",
          operationId,
          requester: sender,
          amount: execution.amount,
          approvals: execution.approvals,
          threshold: execution.threshold,
        };
      }

      scope.emit({
        type: "funds_withdrawn",
        collectionId: state.id,
        timestamp: now,
        recipient: sender,
        amount: execution.amount,
        remainingBalance: state.treasuryBalance,
      });

      scope.onCommit(() =>
        logSecurityEvent("info", "funds_withdrawn", {
          collectionId: state.id,
          recipient: sender,
          amount: execution.amount.toString(),
          remainingBalance: state.treasuryBalance.toString(),
        }, "Treasury funds withdrawn")
      );

      return {
        status: "disbursed",
        operationId,
        requester: sender,
        amount: execution.amount,
        approvals: execution.approvals,
        threshold: execution.threshold,
        payout: execution.payout,
        remainingBalance: state.treasuryBalance,
      };
    });
  }

  // ============================================
  // CAPABILITY
  // ============================================

  /**
   * Renew an expired capability during its grace window
   */
  extendCapability(
    capability: AdminCapability,
    newExpiry: number,
    ctx: CallContext
  ): CapabilityRecord {
    this.guarded("extend_capability", ctx, NO_TABLES, (scope) => {
      const { state, sender, now } = scope;
      new RoleRegistry(state.roles).require(sender, ROLE.ADMIN);
      const record = resolveCapability(capability, state.capability);
      assertCapabilityHeld(record, sender);

      const previousExpiry = record.expiresAt;
      record.expiresAt = planRenewal(record, newExpiry, now);

      scope.emit({
        type: "capability_extended",
        collectionId: state.id,
        timestamp: now,
        capabilityId: record.id,
        previousExpiry,
        newExpiry: record.expiresAt,
      });

      scope.onCommit(() =>
        logSecurityEvent("info", "capability_extended", {
          collectionId: state.id,
          capabilityId: record.id,
          previousExpiry,
          newExpiry: record.expiresAt,
        }, "Admin capability renewed")
      );

      this.warnIfNearExpiry(scope, record);
    });
    return this.getCapability();
  }

  /**
   * Hand the capability to another address. The current holder must still
   * be presenting it for this collection.
   */
  transferCapability(capability: AdminCapability, to: string, ctx: CallContext): CapabilityRecord {
    this.guarded("transfer_capability", ctx, NO_TABLES, (scope) => {
      const { state, sender, now } = scope;
      const record = transferHolder(resolveCapability(capability, state.capability), sender, to);

      scope.onCommit(() =>
        audit({
          action: "transfer_capability",
          entityType: "capability",
          entityId: record.id,
          actor: sender,
          details: { collectionId: state.id, to: record.owner, at: now },
        })
      );
    });
    return this.getCapability();
  }

  /**
   * Emergency pause. Bypasses the upgradable flag.
   */
  triggerFailSafe(capability: AdminCapability, ctx: CallContext): CollectionSnapshot {
    this.guarded("trigger_fail_safe", ctx, NO_TABLES, (scope) => {
      const { state, sender, now } = scope;
      const record = this.authorizeAdmin(scope, capability, ROLE.ADMIN);

      state.paused = true;
      state.version += 1;

      scope.emit({
        type: "collection_updated",
        collectionId: state.id,
        timestamp: now,
        field: "paused",
        value: "true",
        version: state.version,
        updatedBy: sender,
      });

      scope.onCommit(() =>
        logSecurityEvent("warn", "fail_safe_triggered", {
          collectionId: state.id,
          triggeredBy: sender,
          version: state.version,
        }, "Fail-safe triggered, collection paused")
      );

      this.warnIfNearExpiry(scope, record);
    });
    return this.getSnapshot();
  }

  // ============================================
  // QUERIES
  // ============================================

  getSnapshot(): CollectionSnapshot {
    const state = this.state;
    return {
      id: state.id,
      name: state.name,
      symbol: state.symbol,
      description: state.description,
      creator: state.creator,
      royaltyPercent: state.royaltyPercent,
      mintPrice: state.mintPrice,
      mintingStart: state.mintingStart,
      mintingEnd: state.mintingEnd,
      revealTime: state.revealTime,
      maxSupply: state.maxSupply,
      currentSupply: state.currentSupply,
      treasuryBalance: state.treasuryBalance,
      withdrawalTimeLock: state.withdrawalTimeLock,
      paused: state.paused,
      upgradable: state.upgradable,
      version: state.version,
      reentrancyLocked: this.guard.held,
      capability: { ...state.capability },
      roles: [...state.roles].map(([address, mask]) => ({ address, mask })),
      whitelist: [...state.whitelist].map(([address, expiresAt]) => ({ address, expiresAt })),
      pendingWithdrawals: [...state.pendingWithdrawals].map(([requester, pending]) => ({
        requester,
        amount: pending.amount,
        requestedAt: pending.requestedAt,
      })),
      approvals: [...state.approvals].map(([operationId, approvers]) => ({
        operationId,
        approvers: [...approvers],
      })),
      createdAt: state.createdAt,
    };
  }

  getCapability(): CapabilityRecord {
    return { ...this.state.capability };
  }

  getCapabilityStatus(now: number): CapabilityStatus {
    return { ...this.state.capability, state: getCapabilityState(this.state.capability, now) };
  }

  getPrice(): bigint {
    return this.state.mintPrice;
  }

  getTreasuryBalance(): bigint {
    return this.state.treasuryBalance;
  }

  getMintPhase(now: number): MintPhase {
    return phaseOf(this.state, now);
  }

  isWhitelisted(address: string, now: number): boolean {
    return new AllowListGate(this.state.whitelist).isMember(parseAddress(address), now);
  }

  getRoles(address: string): RoleAssignment | undefined {
    const mask = new RoleRegistry(this.state.roles).rolesOf(parseAddress(address));
    return mask === undefined ? undefined : { mask, roles: describeRoles(mask) };
  }

  getPendingWithdrawal(address: string): PendingWithdrawal | undefined {
    const pending = this.state.pendingWithdrawals.get(parseAddress(address));
    return pending ? { ...pending } : undefined;
  }

  getApprovalCount(operationId: string): number {
    return this.state.approvals.get(operationId)?.size ?? 0;
  }

  // ============================================
  // PRIVATE METHODS
  // ============================================

  /**
   * Run an operation under the guard against a staged copy of the state.
   * Buffered events are appended once the guard is released, so subscribers
   * may call back into the engine.
   */
  private guarded<T>(
    operation: string,
    ctx: CallContext,
    writes: readonly StateTable[],
    body: (scope: CallScope) => T
  ): T {
    const { result, events } = this.guard.run(operation, () =>
      this.stage(operation, ctx, writes, body)
    );
    for (const event of events) {
      this.events.append(event);
    }
    return result;
  }

  private stage<T>(
    operation: string,
    ctx: CallContext,
    writes: readonly StateTable[],
    body: (scope: CallScope) => T
  ): StagedResult<T> {
    const events: CollectionEvent[] = [];
    const effects: Array<() => void> = [];

    try {
      const { sender, now } = readContext(ctx);
      const draft = stageState(this.state, writes);

      const result = body({
        state: draft,
        sender,
        now,
        emit: (event) => events.push(event),
        onCommit: (effect) => effects.push(effect),
      });

      this.state = draft;
      for (const effect of effects) {
        effect();
      }

      return { result, events };
    } catch (error) {
      this.logRejection(operation, ctx, error);
      throw error;
    }
  }

  /**
   * Role first, then the presented token against the staged record
   */
  private authorizeAdmin(scope: CallScope, capability: AdminCapability, role: Role): CapabilityRecord {
    new RoleRegistry(scope.state.roles).require(scope.sender, role);
    const record = resolveCapability(capability, scope.state.capability);
    assertCapability(record, scope.sender, scope.now);
    return record;
  }

  private warnIfNearExpiry(scope: CallScope, record: CapabilityRecord): void {
    if (!isNearExpiry(record, scope.now)) {
      return;
    }

    const remainingMs = record.expiresAt - scope.now;

    scope.emit({
      type: "admin_cap_expiry_warning",
      collectionId: scope.state.id,
      timestamp: scope.now,
      capabilityId: record.id,
      expiresAt: record.expiresAt,
      remainingMs,
    });

    scope.onCommit(() =>
      logSecurityEvent("warn", "admin_cap_expiry_warning", {
        collectionId: scope.state.id,
        capabilityId: record.id,
        holder: scope.sender,
        remainingMs,
      }, "Admin capability is close to expiry")
    );
  }

  private workflow(state: CollectionState): WithdrawalWorkflow {
    return new WithdrawalWorkflow(state, new TreasuryLedger(state));
  }

  private assertItemInCollection(item: CollectibleItem): void {
    if (item.collectionId !== this.state.id) {
      throw custodyError("ITEM_MISMATCH", {
        context: { itemId: item.id, collectionId: this.state.id },
      });
    }
  }

  private logRejection(operation: string, ctx: CallContext, error: unknown): void {
    if (isCustodyError(error)) {
      engineLogger.warn({
        collectionId: this.state.id,
        operation,
        sender: ctx.sender,
        code: error.code,
        kind: error.kind,
        context: error.context,
      }, "Call rejected");
      return;
    }

    logError(
      error instanceof Error ? error : new Error(String(error)),
      { component: "collection-engine", collectionId: this.state.id, operation },
      "Call failed"
    );
  }
}
