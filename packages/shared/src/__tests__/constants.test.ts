import { describe, it, expect } from "vitest";
import {
  TIME,
  ROLE,
  ALL_ROLES,
  CAPABILITY,
  MINTING,
  WITHDRAWAL,
  WHITELIST,
  FIELD_LIMITS,
} from "../constants/index.js";

describe("Constants", () => {
  describe("ROLE", () => {
    it("should use distinct single bits", () => {
      expect(ROLE.ADMIN).toBe(1);
      expect(ROLE.MINTER).toBe(2);
      expect(ROLE.WITHDRAWER).toBe(4);
    });

    it("should combine into the full mask", () => {
      expect(ALL_ROLES).toBe(7);
    });
  });

  describe("CAPABILITY", () => {
    it("should default to a one year lifetime", () => {
      expect(CAPABILITY.defaultLifetimeMs).toBe(365 * 86_400_000);
    });

    it("should have a 7 day grace window and 30 day warning window", () => {
      expect(CAPABILITY.gracePeriodMs).toBe(7 * TIME.DAY_MS);
      expect(CAPABILITY.warningWindowMs).toBe(30 * TIME.DAY_MS);
    });
  });

  describe("MINTING", () => {
    it("should allow reveal up to 24h after minting ends", () => {
      expect(MINTING.revealGraceMs).toBe(86_400_000);
    });

    it("should bound royalties to 1-20%", () => {
      expect(MINTING.minRoyaltyPercent).toBe(1);
      expect(MINTING.maxRoyaltyPercent).toBe(20);
    });
  });

  describe("WITHDRAWAL", () => {
    it("should require two approvals", () => {
      expect(WITHDRAWAL.multisigThreshold).toBe(2);
    });

    it("should default to a 24h time-lock", () => {
      expect(WITHDRAWAL.defaultTimeLockMs).toBe(24 * TIME.HOUR_MS);
    });
  });

  describe("limits", () => {
    it("should cap allow-list batches at 1000", () => {
      expect(WHITELIST.maxBatchSize).toBe(1000);
    });

    it("should cap attribute keys and values", () => {
      expect(FIELD_LIMITS.attributeKeyMaxLength).toBe(30);
      expect(FIELD_LIMITS.attributeValueMaxLength).toBe(50);
    });
  });
});
