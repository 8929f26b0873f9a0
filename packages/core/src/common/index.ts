export * from "./ids.js";
export * from "./json.js";
export * from "./keyed-lock.js";
export * from "./logger.js";
