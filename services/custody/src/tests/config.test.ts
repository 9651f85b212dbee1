/**
 * Custody Configuration Tests
 */

import { describe, it, expect } from "vitest";
import {
  DEFAULT_CUSTODY_CONFIG,
  loadCustodyConfig,
  resolveCustodyConfig,
} from "../config.js";

describe("Custody config", () => {
  it("should fall back to protocol defaults", () => {
    expect(loadCustodyConfig({})).toEqual({
      defaultWithdrawalTimeLockMs: 86_400_000,
      defaultCapabilityLifetimeMs: 31_536_000_000,
    });
    expect(loadCustodyConfig({})).toEqual(DEFAULT_CUSTODY_CONFIG);
  });

  it("should read overrides from the environment", () => {
    const config = loadCustodyConfig({
      CUSTODY_DEFAULT_TIME_LOCK_MS: "0",
      CUSTODY_CAPABILITY_LIFETIME_MS: "604800000",
    });

    expect(config.defaultWithdrawalTimeLockMs).toBe(0);
    expect(config.defaultCapabilityLifetimeMs).toBe(604_800_000);
  });

  it("should reject invalid values", () => {
    expect(() => loadCustodyConfig({ CUSTODY_DEFAULT_TIME_LOCK_MS: "-5" })).toThrow();
    expect(() => loadCustodyConfig({ CUSTODY_CAPABILITY_LIFETIME_MS: "0" })).toThrow();
    expect(() => loadCustodyConfig({ LOG_LEVEL: "verbose" })).toThrow();
  });

  it("should merge partial overrides onto the defaults", () => {
    expect(resolveCustodyConfig({ defaultWithdrawalTimeLockMs: 1_000 })).toEqual({
      defaultWithdrawalTimeLockMs: 1_000,
      defaultCapabilityLifetimeMs: 31_536_000_000,
    });
    expect(() => resolveCustodyConfig({ defaultCapabilityLifetimeMs: -1 })).toThrow();
  });
});
