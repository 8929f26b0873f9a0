/**
 * Backend types known out of the box
 *
 * | type         | config keys                                                         |
 * |--------------|---------------------------------------------------------------------|
 * | `memory`     | none                                                                |
 * | `filesystem` | `rootDir` or `files`, optional `basePath`                           |
 * | `github`     | `token`, optional `defaultOwner`, `defaultBranch`, `baseUrl`,       |
 * |              | `timeoutMs`, `defaultAuthor`, `maxForceAttempts`                    |
 */

import {
  type BackendFactory,
  BackendRegistry,
  InvalidArgumentError,
  readConfigNumber,
  readConfigString,
} from "@metastore/core";
import { createFilesMetadataStorage } from "@metastore/store-files";
import { createGitHubMetadataStorage } from "@metastore/store-github";
import { MemoryMetadataStorage } from "@metastore/store-mem";
import { readConfigAuthor, readConfigFilesApi } from "./config.js";

export const memoryBackend: BackendFactory = () => new MemoryMetadataStorage();

export const filesystemBackend: BackendFactory = (config, { logger }) => {
  const files = readConfigFilesApi(config, "files");
  const rootDir = readConfigString(config, "rootDir");
  if (!files && rootDir === undefined) {
    throw new InvalidArgumentError("rootDir", undefined, "The filesystem backend needs rootDir or files");
  }
  return createFilesMetadataStorage({ files, rootDir, basePath: readConfigString(config, "basePath"), logger });
};

export const githubBackend: BackendFactory = (config, { logger }) => {
  const token = readConfigString(config, "token");
  if (token === undefined) {
    throw new InvalidArgumentError("token", undefined, "The github backend needs a token");
  }
  return createGitHubMetadataStorage({
    token,
    defaultOwner: readConfigString(config, "defaultOwner"),
    defaultBranch: readConfigString(config, "defaultBranch"),
    baseUrl: readConfigString(config, "baseUrl"),
    timeoutMs: readConfigNumber(config, "timeoutMs"),
    defaultAuthor: readConfigAuthor(config, "defaultAuthor"),
    maxForceAttempts: readConfigNumber(config, "maxForceAttempts"),
    logger,
  });
};

/**
 * Fresh registry holding the memory, filesystem and github backends.
 */
export function createDefaultRegistry(): BackendRegistry {
  return new BackendRegistry()
    .register("memory", memoryBackend)
    .register("filesystem", filesystemBackend)
    .register("github", githubBackend);
}
