/**
 * Allow-list Gate
 *
 * Address → expiry map guarding mints. An empty table admits everyone;
 * once any entry exists, only present, unexpired entries pass.
 */

import { WHITELIST, custodyLogger as logger, type Address } from "@mintvault/shared";
import { custodyError } from "../errors.js";
import { parseAddress } from "../validation.js";
import type { WhitelistBatchResult } from "./types.js";

const allowlistLogger = logger.child({ component: "allowlist-gate" });

// ============================================
// ALLOW-LIST GATE
// ============================================

export class AllowListGate {
  constructor(private readonly entries: Map<Address, number>) {}

  /**
   * Expiry is inclusive: an entry expiring at `now` still passes
   */
  isMember(address: Address, now: number): boolean {
    if (this.entries.size === 0) {
      return true;
    }
    const expiresAt = this.entries.get(address);
    return expiresAt !== undefined && expiresAt >= now;
  }

  /**
   * Add addresses with a shared expiry. Already-present addresses keep their
   * existing entry and are not reported.
   */
  addBatch(addresses: readonly string[], expiresAt: number, now: number): WhitelistBatchResult {
    this.checkBatchSize(addresses);
    if (!Number.isInteger(expiresAt) || expiresAt <= now) {
      throw custodyError("INVALID_EXPIRY", { context: { expiresAt, now } });
    }

    const added: Address[] = [];
    for (const address of this.normalize(addresses)) {
      if (this.entries.has(address)) {
        continue;
      }
      this.entries.set(address, expiresAt);
      added.push(address);
    }

    allowlistLogger.debug({
      requested: addresses.length,
      added: added.length,
      expiresAt,
    }, "Allow-list batch added");

    return { count: added.length, addresses: added };
  }

  /**
   * Remove addresses. Absent addresses are not reported.
   */
  removeBatch(addresses: readonly string[]): WhitelistBatchResult {
    this.checkBatchSize(addresses);

    const removed: Address[] = [];
    for (const address of this.normalize(addresses)) {
      if (this.entries.delete(address)) {
        removed.push(address);
      }
    }

    allowlistLogger.debug({
      requested: addresses.length,
      removed: removed.length,
    }, "Allow-list batch removed");

    return { count: removed.length, addresses: removed };
  }

  get size(): number {
    return this.entries.size;
  }

  // ============================================
  // PRIVATE METHODS
  // ============================================

  private checkBatchSize(addresses: readonly string[]): void {
    if (addresses.length > WHITELIST.maxBatchSize) {
      throw custodyError("BATCH_TOO_LARGE", {
        context: { size: addresses.length, max: WHITELIST.maxBatchSize },
      });
    }
  }

  /**
   * Validate everything up front so a bad address rejects the whole batch
   */
  private normalize(addresses: readonly string[]): Address[] {
    return addresses.map((address) => parseAddress(address));
  }
}
