/**
 * mintvault Zod Schemas
 * Validation schemas for addresses, collection fields and environment
 */

import { z } from "zod";
import { CAPABILITY, WITHDRAWAL } from "../constants/index.js";

// ============================================
// RE-EXPORT ALL SCHEMAS
// ============================================

// Common primitives
export * from "./common.js";

// Domain schemas
export * from "./collection.js";

// ============================================
// ENVIRONMENT SCHEMAS
// ============================================

export const envSchema = z.object({
  // Custody defaults
  CUSTODY_DEFAULT_TIME_LOCK_MS: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(WITHDRAWAL.defaultTimeLockMs),
  CUSTODY_CAPABILITY_LIFETIME_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(CAPABILITY.defaultLifetimeMs),

  // Logging
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  LOG_FORMAT: z.enum(["json", "pretty"]).default("json"),

  // Node
  NODE_ENV: z.enum(["development", "production", "test"]).default("production"),
});

export type EnvConfig = z.infer<typeof envSchema>;
