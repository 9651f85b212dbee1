/**
 * Mint Tests
 *
 * - Phase machine and inclusive window bounds
 * - Supply ceiling
 * - Role, allow-list and payment preconditions
 * - Exact price split into the treasury
 */

import { describe, it, expect, beforeEach } from "vitest";
import { Coin, getMintPhase, type MintWindow } from "../mint/index.js";
import type { CollectionEngine } from "../collection/collection-engine.js";
import type { AdminCapability } from "../access/types.js";
import type { EventLog } from "../events/event-log.js";
import {
  CREATOR,
  DEFAULT_PARAMS,
  METADATA,
  MINTER,
  OUTSIDER,
  PRICE,
  T0,
  ctx,
  expectCustodyError,
  setupCollection,
} from "./fixtures.js";

const END = DEFAULT_PARAMS.mintingEnd;

// ============================================
// COIN TESTS
// ============================================

describe("Coin", () => {
  it("should split an exact amount and keep the change", () => {
    const coin = new Coin(1_500n);
    const part = coin.split(1_000n);

    expect(part.value).toBe(1_000n);
    expect(coin.value).toBe(500n);
  });

  it("should refuse to split more than it holds", () => {
    expectCustodyError(() => new Coin(10n).split(11n), "INSUFFICIENT_PAYMENT");
  });

  it("should join another coin and empty it", () => {
    const coin = new Coin(10n);
    const other = new Coin(5n);
    coin.join(other);

    expect(coin.value).toBe(15n);
    expect(other.value).toBe(0n);
  });

  it("should reject a negative value", () => {
    expectCustodyError(() => new Coin(-1n), "INVALID_AMOUNT");
  });
});

// ============================================
// MINT PHASE TESTS
// ============================================

describe("getMintPhase", () => {
  const window: MintWindow = {
    paused: false,
    mintingStart: 100,
    mintingEnd: 200,
    currentSupply: 0,
    maxSupply: 2,
  };

  it("should follow the window with inclusive bounds", () => {
    expect(getMintPhase(window, 99)).toBe("not_started");
    expect(getMintPhase(window, 100)).toBe("open");
    expect(getMintPhase(window, 200)).toBe("open");
    expect(getMintPhase(window, 201)).toBe("ended");
  });

  it("should report sold out regardless of time", () => {
    expect(getMintPhase({ ...window, currentSupply: 2 }, 150)).toBe("sold_out");
  });

  it("should let paused override every other phase", () => {
    expect(getMintPhase({ ...window, paused: true, currentSupply: 2 }, 150)).toBe("paused");
  });
});

// ============================================
// MINTING THROUGH THE ENGINE
// ============================================

describe("CollectionEngine.mint", () => {
  let engine: CollectionEngine;
  let capability: AdminCapability;
  let events: EventLog;

  beforeEach(() => {
    ({ engine, capability, events } = setupCollection());
  });

  it("should mint for an allow-listed minter paying exactly the price", () => {
    engine.updateRole(capability, MINTER, 2, ctx(CREATOR, T0));
    engine.addToWhitelist(capability, [MINTER], END, ctx(CREATOR, T0));

    const payment = new Coin(PRICE);
    const item = engine.mint(payment, METADATA, ctx(MINTER, T0));

    expect(item).toEqual({
      id: "item-1",
      collectionId: "collection-1",
      name: "Owl #1",
      description: "First owl",
      url: "ipfs://owl-1",
      creator: MINTER,
      owner: MINTER,
      revealed: false,
      revealTime: T0 + 500_000_000,
      attributes: {},
    });
    expect(engine.getSnapshot().currentSupply).toBe(1);
    expect(engine.getTreasuryBalance()).toBe(1_000_000n);
    expect(payment.value).toBe(0n);

    const minted = events.ofType("item_minted");
    expect(minted).toHaveLength(1);
    expect(minted[0]).toEqual({
      type: "item_minted",
      collectionId: "collection-1",
      timestamp: T0,
      itemId: "item-1",
      minter: MINTER,
      price: PRICE,
      supply: 1,
    });
  });

  it("should accept mints at both window bounds", () => {
    engine.mint(new Coin(PRICE), METADATA, ctx(CREATOR, T0));
    engine.mint(new Coin(PRICE), METADATA, ctx(CREATOR, END));
    expect(engine.getSnapshot().currentSupply).toBe(2);
  });

  it("should reject mints outside the window", () => {
    expectCustodyError(() => engine.mint(new Coin(PRICE), METADATA, ctx(CREATOR, T0 - 1)), "MINT_NOT_STARTED");
    expectCustodyError(() => engine.mint(new Coin(PRICE), METADATA, ctx(CREATOR, END + 1)), "MINT_ENDED");
  });

  it("should never exceed max supply", () => {
    ({ engine } = setupCollection({ maxSupply: 2 }));

    engine.mint(new Coin(PRICE), METADATA, ctx(CREATOR, T0));
    engine.mint(new Coin(PRICE), METADATA, ctx(CREATOR, T0));
    expectCustodyError(() => engine.mint(new Coin(PRICE), METADATA, ctx(CREATOR, T0)), "SOLD_OUT");

    expect(engine.getSnapshot().currentSupply).toBe(2);
    expect(engine.getMintPhase(T0)).toBe("sold_out");
  });

  it("should require the MINTER role", () => {
    expectCustodyError(() => engine.mint(new Coin(PRICE), METADATA, ctx(OUTSIDER, T0)), "MISSING_ROLE");
  });

  it("should enforce the allow-list once it has entries", () => {
    engine.updateRole(capability, MINTER, 2, ctx(CREATOR, T0));
    engine.addToWhitelist(capability, [CREATOR], END, ctx(CREATOR, T0));

    expectCustodyError(() => engine.mint(new Coin(PRICE), METADATA, ctx(MINTER, T0)), "NOT_WHITELISTED");
  });

  it("should reject an allow-list entry that has lapsed", () => {
    engine.updateRole(capability, MINTER, 2, ctx(CREATOR, T0));
    engine.addToWhitelist(capability, [MINTER], T0 + 10, ctx(CREATOR, T0));

    expectCustodyError(() => engine.mint(new Coin(PRICE), METADATA, ctx(MINTER, T0 + 11)), "NOT_WHITELISTED");
  });

  it("should reject an underpayment without touching the coin", () => {
    const payment = new Coin(PRICE - 1n);
    expectCustodyError(() => engine.mint(payment, METADATA, ctx(CREATOR, T0)), "INSUFFICIENT_PAYMENT");
    expect(payment.value).toBe(PRICE - 1n);
  });

  it("should take only the price and leave the change", () => {
    const payment = new Coin(1_500_000n);
    engine.mint(payment, METADATA, ctx(CREATOR, T0));

    expect(payment.value).toBe(500_000n);
    expect(engine.getTreasuryBalance()).toBe(PRICE);
  });

  it("should reject minting while paused", () => {
    engine.triggerFailSafe(capability, ctx(CREATOR, T0));
    expectCustodyError(() => engine.mint(new Coin(PRICE), METADATA, ctx(CREATOR, T0)), "COLLECTION_PAUSED");
  });

  it("should reject bad metadata with no state change", () => {
    const payment = new Coin(PRICE);
    const before = engine.getSnapshot();

    expectCustodyError(
      () => engine.mint(payment, { ...METADATA, url: "http://owl-1" }, ctx(CREATOR, T0)),
      "INVALID_URL"
    );
    expectCustodyError(
      () => engine.mint(payment, { ...METADATA, attributes: { ["k".repeat(31)]: "v" } }, ctx(CREATOR, T0)),
      "INVALID_ATTRIBUTE"
    );

    expect(engine.getSnapshot()).toEqual(before);
    expect(payment.value).toBe(PRICE);
  });
});
