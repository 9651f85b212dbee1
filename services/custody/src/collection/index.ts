/**
 * Collection Module Exports
 */

export * from "./types.js";
export * from "./allocator.js";
export * from "./items.js";
export * from "./updates.js";
export * from "./staging.js";
export * from "./collection-engine.js";
