/**
 * Custody Service Configuration
 */

import { z } from "zod";
import { CAPABILITY, WITHDRAWAL, envSchema } from "@mintvault/shared";

// ============================================
// CUSTODY CONFIG SCHEMA
// ============================================

const custodyConfigSchema = z.object({
  // Applied when a collection is created without an explicit time-lock
  defaultWithdrawalTimeLockMs: z.number().int().nonnegative(),

  // Applied when a collection is created without an explicit capability expiry
  defaultCapabilityLifetimeMs: z.number().int().positive(),
});

export type CustodyConfig = z.infer<typeof custodyConfigSchema>;

export const DEFAULT_CUSTODY_CONFIG: CustodyConfig = {
  defaultWithdrawalTimeLockMs: WITHDRAWAL.defaultTimeLockMs,
  defaultCapabilityLifetimeMs: CAPABILITY.defaultLifetimeMs,
};

// ============================================
// LOAD CONFIGURATION
// ============================================

export function loadCustodyConfig(
  source: Record<string, string | undefined> = process.env
): CustodyConfig {
  const env = envSchema.parse(source);

  return custodyConfigSchema.parse({
    defaultWithdrawalTimeLockMs: env.CUSTODY_DEFAULT_TIME_LOCK_MS,
    defaultCapabilityLifetimeMs: env.CUSTODY_CAPABILITY_LIFETIME_MS,
  });
}

export function resolveCustodyConfig(overrides?: Partial<CustodyConfig>): CustodyConfig {
  return custodyConfigSchema.parse({ ...DEFAULT_CUSTODY_CONFIG, ...overrides });
}
