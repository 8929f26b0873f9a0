export * from "./metastore-error.js";
export * from "./storage-errors.js";
