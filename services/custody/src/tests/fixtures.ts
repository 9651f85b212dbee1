/**
 * Shared test fixtures for the custody service
 */

import { expect } from "vitest";
import { TIME } from "@mintvault/shared";
import { isCustodyError, type CustodyError, type CustodyErrorCode } from "../errors.js";
import { SequentialAllocator } from "../collection/allocator.js";
import { CollectionEngine } from "../collection/collection-engine.js";
import type {
  CallContext,
  CreateCollectionParams,
  MintMetadata,
} from "../collection/types.js";
import { EventLog } from "../events/event-log.js";

export const CREATOR = `0x${"a".repeat(40)}`;
export const MINTER = `0x${"b".repeat(40)}`;
export const SECOND_WITHDRAWER = `0x${"c".repeat(40)}`;
export const OUTSIDER = `0x${"d".repeat(40)}`;

export const T0 = 1_700_000_000_000;
export const PRICE = 1_000_000n;

export const DEFAULT_PARAMS: CreateCollectionParams = {
  name: "Night Owls",
  symbol: "OWL",
  description: "A test drop",
  royaltyPercent: 5,
  mintPrice: PRICE,
  mintingStart: T0,
  mintingEnd: T0 + 1_000_000_000,
  revealTime: T0 + 500_000_000,
  maxSupply: 1000,
  upgradable: true,
};

export const METADATA: MintMetadata = {
  name: "Owl #1",
  description: "First owl",
  url: "ipfs://owl-1",
};

export const DAY = TIME.DAY_MS;

export function ctx(sender: string, now: number): CallContext {
  return { sender, now };
}

export function setupCollection(overrides: Partial<CreateCollectionParams> = {}, createdAt = T0) {
  const events = new EventLog();
  const { engine, capability } = CollectionEngine.create(
    { ...DEFAULT_PARAMS, ...overrides },
    ctx(CREATOR, createdAt),
    { events, allocator: new SequentialAllocator() }
  );
  return { engine, capability, events };
}

/**
 * Run fn and assert it throws a CustodyError with the given code
 */
export function expectCustodyError(fn: () => unknown, code: CustodyErrorCode): CustodyError {
  try {
    fn();
  } catch (error) {
    if (isCustodyError(error)) {
      expect(error.code).toBe(code);
      return error;
    }
    throw error;
  }
  throw new Error(`Expected CustodyError ${code}, but the call succeeded`);
}
