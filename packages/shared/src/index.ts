/**
 * @mintvault/shared
 * Shared logger, schemas, and protocol constants for mintvault
 */

// Export schemas (includes address, collection field and env schemas)
export * from "./schemas/index.js";

// Export constants (includes ROLE, CAPABILITY, WITHDRAWAL, etc.)
export * from "./constants/index.js";

// Export logger
export {
  logger,
  createServiceLogger,
  custodyLogger,
  logSecurityEvent,
  audit,
  logError,
} from "./logger/index.js";
