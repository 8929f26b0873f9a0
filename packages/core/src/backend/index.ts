export * from "./factory.js";
export * from "./metastore.js";
