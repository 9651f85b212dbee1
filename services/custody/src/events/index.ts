export * from "./types.js";
export * from "./event-log.js";
