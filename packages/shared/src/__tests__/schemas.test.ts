import { describe, it, expect } from "vitest";
import {
  addressSchema,
  bigIntSchema,
  positiveAmountSchema,
  collectionSymbolSchema,
  collectionNameSchema,
  assetUrlSchema,
  itemAttributesSchema,
  itemMetadataSchema,
  envSchema,
} from "../schemas/index.js";

describe("Schema Validation", () => {
  describe("addressSchema", () => {
    it("should accept 20-byte and 32-byte addresses", () => {
      const short = "0x" + "a".repeat(40);
      const long = "0x" + "b".repeat(64);
      expect(addressSchema.parse(short)).toBe(short);
      expect(addressSchema.parse(long)).toBe(long);
    });

    it("should normalise to lower case", () => {
      expect(addressSchema.parse("0x" + "AB".repeat(20))).toBe("0x" + "ab".repeat(20));
    });

    it("should reject invalid address", () => {
      expect(() => addressSchema.parse("invalid")).toThrow();
      expect(() => addressSchema.parse("0x123")).toThrow();
      expect(() => addressSchema.parse("a".repeat(40))).toThrow();
      expect(() => addressSchema.parse("0x" + "a".repeat(50))).toThrow();
    });
  });

  describe("bigIntSchema", () => {
    it("should accept bigint, numeric strings and integers", () => {
      expect(bigIntSchema.parse(5n)).toBe(5n);
      expect(bigIntSchema.parse("1000000")).toBe(1_000_000n);
      expect(bigIntSchema.parse(42)).toBe(42n);
    });

    it("should reject non-numeric strings", () => {
      expect(bigIntSchema.safeParse("12abc").success).toBe(false);
      expect(bigIntSchema.safeParse("-5").success).toBe(false);
    });

    it("should reject zero for positive amounts", () => {
      expect(positiveAmountSchema.safeParse(0n).success).toBe(false);
      expect(positiveAmountSchema.parse("1")).toBe(1n);
    });
  });

  describe("collection fields", () => {
    it("should require uppercase alphanumeric symbols", () => {
      expect(collectionSymbolSchema.safeParse("DROP1").success).toBe(true);
      expect(collectionSymbolSchema.safeParse("drop").success).toBe(false);
      expect(collectionSymbolSchema.safeParse("").success).toBe(false);
    });

    it("should reject blank names", () => {
      expect(collectionNameSchema.safeParse("   ").success).toBe(false);
      expect(collectionNameSchema.safeParse("Genesis").success).toBe(true);
    });

    it("should restrict URL prefixes", () => {
      expect(assetUrlSchema.safeParse("https://example.com/1.png").success).toBe(true);
      expect(assetUrlSchema.safeParse("ipfs://cid/1.png").success).toBe(true);
      expect(assetUrlSchema.safeParse("http://example.com/1.png").success).toBe(false);
    });
  });

  describe("itemAttributesSchema", () => {
    it("should enforce key and value length", () => {
      expect(itemAttributesSchema.safeParse({ ["k".repeat(30)]: "v".repeat(50) }).success).toBe(true);
      expect(itemAttributesSchema.safeParse({ ["k".repeat(31)]: "v" }).success).toBe(false);
      expect(itemAttributesSchema.safeParse({ key: "v".repeat(51) }).success).toBe(false);
    });
  });

  describe("itemMetadataSchema", () => {
    it("should default attributes to an empty record", () => {
      const metadata = itemMetadataSchema.parse({
        name: "Item #1",
        description: "",
        url: "ipfs://cid/1.json",
      });

      expect(metadata.attributes).toEqual({});
    });
  });

  describe("envSchema", () => {
    it("should apply defaults", () => {
      const env = envSchema.parse({});
      expect(env.CUSTODY_DEFAULT_TIME_LOCK_MS).toBe(86_400_000);
      expect(env.CUSTODY_CAPABILITY_LIFETIME_MS).toBe(31_536_000_000);
      expect(env.LOG_LEVEL).toBe("info");
    });

    it("should coerce numeric strings", () => {
      const env = envSchema.parse({ CUSTODY_DEFAULT_TIME_LOCK_MS: "60000" });
      expect(env.CUSTODY_DEFAULT_TIME_LOCK_MS).toBe(60_000);
    });

    it("should reject negative durations", () => {
      expect(envSchema.safeParse({ CUSTODY_DEFAULT_TIME_LOCK_MS: "-1" }).success).toBe(false);
    });
  });
});
