export * from "./revision.js";
export * from "./revision-history.js";
