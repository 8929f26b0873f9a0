/**
 * @metastore/core
 *
 * Versioning and concurrency model shared by every metadata storage
 * backend: revision model, error taxonomy, the MetadataStorage capability
 * contract, optimistic concurrency control and the Metastore facade.
 *
 * @packageDocumentation
 */

export * from "./backend/index.js";
export * from "./common/index.js";
export * from "./concurrency/index.js";
export * from "./errors/index.js";
export * from "./model/index.js";
export * from "./storage/index.js";
