import type { Author, MetastoreLogger } from "@metastore/core";
import { type FetchFunction, GitHubRepositoryHost } from "./github/github-repository-host.js";
import { RepositoryMetadataStorage } from "./repository-metadata-storage.js";

export interface CreateGitHubMetadataStorageOptions {
  token: string;
  defaultOwner?: string;
  defaultBranch?: string;
  baseUrl?: string;
  timeoutMs?: number;
  defaultAuthor?: Author;
  /** Attempts of a forced write racing other writers; defaults to 3 */
  maxForceAttempts?: number;
  fetch?: FetchFunction;
  logger?: MetastoreLogger;
}

/**
 * Create a remote backend storing each package in a GitHub repository.
 *
 * @example
 * ```typescript
 * const storage = createGitHubMetadataStorage({ token: process.env.GITHUB_TOKEN ?? "", defaultOwner: "acme" });
 * const metastore = new Metastore({ storage, overwriteTags: true });
 * ```
 */
export function createGitHubMetadataStorage(options: CreateGitHubMetadataStorageOptions): RepositoryMetadataStorage {
  const host = new GitHubRepositoryHost({
    token: options.token,
    baseUrl: options.baseUrl,
    timeoutMs: options.timeoutMs,
    fetch: options.fetch,
    logger: options.logger,
  });
  return new RepositoryMetadataStorage({
    host,
    defaultOwner: options.defaultOwner,
    defaultBranch: options.defaultBranch,
    defaultAuthor: options.defaultAuthor,
    maxForceAttempts: options.maxForceAttempts,
    logger: options.logger,
  });
}
