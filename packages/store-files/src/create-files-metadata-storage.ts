import { InvalidArgumentError, type MetastoreLogger } from "@metastore/core";
import type { FilesApi } from "@statewalker/webrun-files";
import { NodeFilesApi } from "@statewalker/webrun-files-node";
import { FilesMetadataStorage } from "./metadata/files-metadata-storage.js";

/**
 * Options for creating a files backend
 */
export interface CreateFilesMetadataStorageOptions {
  /** Directory of the local file system; used when `files` is not given */
  rootDir?: string;
  /** Files tree to store packages in */
  files?: FilesApi;
  /** Directory inside the tree; defaults to its root */
  basePath?: string;
  logger?: MetastoreLogger;
}

/**
 * Create a files backend over an explicit FilesApi or a local directory.
 *
 * @example
 * ```typescript
 * const storage = createFilesMetadataStorage({ rootDir: "./data" });
 * const metastore = new Metastore({ storage });
 * ```
 */
export function createFilesMetadataStorage(options: CreateFilesMetadataStorageOptions): FilesMetadataStorage {
  let files = options.files;
  if (!files && options.rootDir !== undefined) {
    files = new NodeFilesApi({ rootDir: options.rootDir });
  }
  if (!files) {
    throw new InvalidArgumentError("rootDir", options.rootDir, "Either files or rootDir must be provided");
  }
  return new FilesMetadataStorage({ files, basePath: options.basePath, logger: options.logger });
}
