/**
 * Remote storage backend for the metadata store
 *
 * Every package lives in its own hosted Git repository; GitHub is the
 * bundled host.
 */

export * from "./create-github-metadata-storage.js";
export * from "./github/index.js";
export * from "./memory/index.js";
export * from "./package-id.js";
export * from "./repository-host.js";
export * from "./repository-metadata-storage.js";
