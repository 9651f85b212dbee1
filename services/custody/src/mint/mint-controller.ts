/**
 * Mint Controller
 *
 * Phase machine over the collection's minting fields:
 *   not_started → open → ended
 *                      ↘ sold_out
 * with paused as an independent override. A mint only goes through in the
 * open phase, from a MINTER on the allow-list, with a payment covering the
 * price.
 */

import { ROLE, custodyLogger as logger, type Address } from "@mintvault/shared";
import { custodyError } from "../errors.js";
import type { AllowListGate } from "../access/allowlist-gate.js";
import type { RoleRegistry } from "../access/role-registry.js";
import type { TreasuryLedger } from "../treasury/treasury-ledger.js";
import type { CollectionState, MintPhase } from "../collection/types.js";
import type { PaymentInstrument } from "./payment.js";

const mintLogger = logger.child({ component: "mint-controller" });

export type MintWindow = Pick<
  CollectionState,
  "paused" | "mintingStart" | "mintingEnd" | "currentSupply" | "maxSupply"
>;

/**
 * Both window bounds are inclusive
 */
export function getMintPhase(window: MintWindow, now: number): MintPhase {
  if (window.paused) return "paused";
  if (window.currentSupply >= window.maxSupply) return "sold_out";
  if (now < window.mintingStart) return "not_started";
  if (now > window.mintingEnd) return "ended";
  return "open";
}

// ============================================
// MINT CONTROLLER
// ============================================

export class MintController {
  constructor(
    private readonly state: CollectionState,
    private readonly roles: RoleRegistry,
    private readonly allowlist: AllowListGate,
    private readonly treasury: TreasuryLedger
  ) {}

  /**
   * Check every precondition without touching state or the payment
   */
  authorize(minter: Address, payment: PaymentInstrument, now: number): void {
    if (this.state.paused) {
      throw custodyError("COLLECTION_PAUSED");
    }
    if (now < this.state.mintingStart) {
      throw custodyError("MINT_NOT_STARTED", {
        context: { now, mintingStart: this.state.mintingStart },
      });
    }
    if (now > this.state.mintingEnd) {
      throw custodyError("MINT_ENDED", {
        context: { now, mintingEnd: this.state.mintingEnd },
      });
    }
    if (this.state.currentSupply >= this.state.maxSupply) {
      throw custodyError("SOLD_OUT", { context: { maxSupply: this.state.maxSupply } });
    }

    this.roles.require(minter, ROLE.MINTER);

    if (!this.allowlist.isMember(minter, now)) {
      throw custodyError("NOT_WHITELISTED", { context: { address: minter } });
    }

    if (payment.value < this.state.mintPrice) {
      throw custodyError("INSUFFICIENT_PAYMENT", {
        context: {
          price: this.state.mintPrice.toString(),
          provided: payment.value.toString(),
        },
      });
    }
  }

  /**
   * Take exactly the price into the treasury and count the new item.
   * Returns the new supply.
   */
  settle(minter: Address, payment: PaymentInstrument): number {
    const price = this.state.mintPrice;
    const taken = payment.split(price);
    if (taken.value !== price) {
      throw custodyError("INSUFFICIENT_PAYMENT", {
        context: { price: price.toString(), received: taken.value.toString() },
      });
    }

    this.treasury.deposit(price);
    this.state.currentSupply += 1;

    mintLogger.debug({
      minter,
      price: price.toString(),
      supply: this.state.currentSupply,
      maxSupply: this.state.maxSupply,
    }, "Mint settled");

    return this.state.currentSupply;
  }
}
