/**
 * Common Schema Primitives
 * Shared types used across all schemas
 */

import { z } from "zod";

// ============================================
// PRIMITIVE SCHEMAS
// ============================================

/**
 * Account address: 20-byte (EVM style) or 32-byte hex, normalised to lower case
 */
export const addressSchema = z
  .string()
  .regex(/^0x(?:[a-fA-F0-9]{40}|[a-fA-F0-9]{64})$/, "Invalid address")
  .transform((value) => value.toLowerCase());

export type Address = z.output<typeof addressSchema>;

/** Millisecond timestamp supplied by the clock oracle */
export const timestampMsSchema = z.number().int().nonnegative();

/** Millisecond duration */
export const durationMsSchema = z.number().int().nonnegative();

/**
 * Token amount in base units. Accepts bigint, numeric strings and safe integers.
 */
export const bigIntSchema = z.union([
  z.bigint(),
  z.string().regex(/^\d+$/, "Amount must be a numeric string").transform((val) => BigInt(val)),
  z.number().int().nonnegative().transform((val) => BigInt(val)),
]);

/** Strictly positive amount */
export const positiveAmountSchema = bigIntSchema.refine(
  (value) => value > 0n,
  "Amount must be greater than zero"
);
