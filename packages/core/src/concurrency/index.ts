export * from "./optimistic-update.js";
