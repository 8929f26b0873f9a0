/**
 * In-memory reference backend for the metadata store
 *
 * Keeps packages in process memory for tests, development and as the
 * conformance target of the persistent adapters.
 */

export * from "./memory-metadata-storage.js";
