/**
 * mintvault Custody Service
 *
 * Collectible-drop custody engine: role-gated minting into a treasury,
 * time-locked multisig withdrawals and an expiring admin capability.
 */

export * from "./errors.js";
export * from "./validation.js";
export * from "./config.js";
export * from "./access/index.js";
export * from "./events/index.js";
export * from "./mint/index.js";
export * from "./treasury/index.js";
export * from "./collection/index.js";
