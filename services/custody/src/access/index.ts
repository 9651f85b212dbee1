/**
 * Access Control Module Exports
 *
 * - Role registry (ADMIN / MINTER / WITHDRAWER bitmasks)
 * - Admin capability lifecycle (active, warning, expired, dead)
 * - Allow-list gate
 * - Reentrancy guard
 */

export * from "./types.js";
export * from "./role-registry.js";
export * from "./capability.js";
export * from "./allowlist-gate.js";
export * from "./reentrancy-guard.js";
