/**
 * RepositoryHost - the primitives a hosted Git service must offer
 *
 * The remote backend maps a package to a repository, a revision to a
 * commit and a tag to an annotated tag ref. This interface keeps the
 * backend independent from the concrete service API; GitHubRepositoryHost
 * implements it over the GitHub REST API.
 *
 * Failures are reported with the metastore error classes: a missing
 * repository on delete is NotFoundError, a taken repository or tag name
 * is AlreadyExistsError, transport problems are BackendUnavailableError.
 */

import type { Author } from "@metastore/core";

/**
 * Owner and name of a hosted repository
 */
export interface RepositoryRef {
  owner: string;
  name: string;
}

export interface CommitInfo {
  sha: string;
  message: string;
  author?: Author;
  date: Date;
  /** Parent commit ids; empty for a root commit */
  parents: string[];
}

export interface TagObject {
  name: string;
  commitSha: string;
  message: string;
  tagger?: Author;
  date: Date;
}

export interface CommitFile {
  path: string;
  content: string;
}

export interface CreateCommitOptions {
  parentSha: string;
  files: CommitFile[];
  message: string;
  author?: Author;
}

export interface CreateTagOptions {
  name: string;
  commitSha: string;
  message: string;
  tagger?: Author;
  /** Re-point an existing tag ref instead of failing */
  force?: boolean;
}

export interface RepositoryHost {
  /**
   * Create a repository holding a single root commit on `branch`.
   *
   * @throws AlreadyExistsError if the repository exists
   */
  createRepository(repo: RepositoryRef, options: { branch: string; description?: string }): Promise<void>;

  /**
   * @throws NotFoundError if the repository does not exist
   */
  deleteRepository(repo: RepositoryRef): Promise<void>;

  /**
   * Commit a branch points at; undefined if the repository or the branch
   * does not exist.
   */
  getBranchHead(repo: RepositoryRef, branch: string): Promise<string | undefined>;

  getCommit(repo: RepositoryRef, sha: string): Promise<CommitInfo | undefined>;

  /**
   * Commits reachable from `branch`, newest first.
   */
  listCommits(repo: RepositoryRef, branch: string): Promise<CommitInfo[]>;

  /**
   * Text of a file at a commit; undefined if it does not exist there.
   */
  readFile(repo: RepositoryRef, path: string, sha: string): Promise<string | undefined>;

  /**
   * Create a commit on top of `parentSha` replacing the given files.
   * No branch moves.
   */
  createCommit(repo: RepositoryRef, options: CreateCommitOptions): Promise<CommitInfo>;

  /**
   * Move a branch to a commit.
   *
   * Without `force` the update only succeeds if it is a fast-forward,
   * i.e. the branch still points at an ancestor of `sha`.
   *
   * @returns False if a non-forced update was rejected
   */
  updateBranch(repo: RepositoryRef, branch: string, sha: string, options: { force: boolean }): Promise<boolean>;

  /**
   * Create an annotated tag and its ref.
   *
   * @throws AlreadyExistsError if the ref exists and `force` is not set
   */
  createTag(repo: RepositoryRef, options: CreateTagOptions): Promise<TagObject>;

  getTag(repo: RepositoryRef, name: string): Promise<TagObject | undefined>;

  listTags(repo: RepositoryRef): Promise<TagObject[]>;

  /**
   * @returns False if the tag did not exist
   */
  deleteTag(repo: RepositoryRef, name: string): Promise<boolean>;
}
