/**
 * File-based storage backend for the metadata store
 *
 * Keeps packages as JSON records in a FilesApi tree: in memory, or in a
 * directory of the local file system.
 */

export * from "./create-files-metadata-storage.js";
export * from "./metadata/index.js";
