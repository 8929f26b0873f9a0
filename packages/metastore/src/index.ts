/**
 * @metastore/metastore
 *
 * Entry point bundling every backend: pick one by type name and get a
 * Metastore facade over it.
 *
 * @packageDocumentation
 */

export * from "@metastore/core";
export * from "./config.js";
export * from "./create-metastore.js";
export * from "./default-registry.js";
