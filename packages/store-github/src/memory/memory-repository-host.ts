/**
 * In-process RepositoryHost
 *
 * Keeps repositories in maps and enforces the rules of a hosted service:
 * unique repository and tag names, fast-forward-only branch updates
 * unless forced. Used for tests and ephemeral stores.
 */

import { AlreadyExistsError, createRevisionId, NotFoundError } from "@metastore/core";
import type {
  CommitInfo,
  CreateCommitOptions,
  CreateTagOptions,
  RepositoryHost,
  RepositoryRef,
  TagObject,
} from "../repository-host.js";

export interface StoredCommit {
  info: CommitInfo;
  files: Map<string, string>;
}

export interface StoredRepository {
  description?: string;
  branches: Map<string, string>;
  commits: Map<string, StoredCommit>;
  tags: Map<string, TagObject>;
}

function copyCommit(commit: CommitInfo): CommitInfo {
  const copy: CommitInfo = { ...commit, date: new Date(commit.date.getTime()), parents: [...commit.parents] };
  if (commit.author) copy.author = { ...commit.author };
  return copy;
}

function copyTag(tag: TagObject): TagObject {
  const copy: TagObject = { ...tag, date: new Date(tag.date.getTime()) };
  if (tag.tagger) copy.tagger = { ...tag.tagger };
  return copy;
}

export class MemoryRepositoryHost implements RepositoryHost {
  readonly repositories = new Map<string, StoredRepository>();

  async createRepository(repo: RepositoryRef, options: { branch: string; description?: string }): Promise<void> {
    const key = this.key(repo);
    if (this.repositories.has(key)) {
      throw new AlreadyExistsError(`Repository already exists: ${key}`);
    }
    const root: StoredCommit = {
      info: { sha: createRevisionId(), message: "Initial commit", date: new Date(), parents: [] },
      files: new Map([["README.md", `# ${repo.name}\n`]]),
    };
    const stored: StoredRepository = {
      branches: new Map([[options.branch, root.info.sha]]),
      commits: new Map([[root.info.sha, root]]),
      tags: new Map(),
    };
    if (options.description !== undefined) stored.description = options.description;
    this.repositories.set(key, stored);
  }

  async deleteRepository(repo: RepositoryRef): Promise<void> {
    if (!this.repositories.delete(this.key(repo))) {
      throw new NotFoundError(`Repository not found: ${this.key(repo)}`);
    }
  }

  async getBranchHead(repo: RepositoryRef, branch: string): Promise<string | undefined> {
    return this.repositories.get(this.key(repo))?.branches.get(branch);
  }

  async getCommit(repo: RepositoryRef, sha: string): Promise<CommitInfo | undefined> {
    const commit = this.repositories.get(this.key(repo))?.commits.get(sha);
    return commit && copyCommit(commit.info);
  }

  async listCommits(repo: RepositoryRef, branch: string): Promise<CommitInfo[]> {
    const stored = this.require(repo);
    const commits: CommitInfo[] = [];
    let sha = stored.branches.get(branch);
    while (sha !== undefined) {
      const commit = stored.commits.get(sha);
      if (!commit) break;
      commits.push(copyCommit(commit.info));
      sha = commit.info.parents[0];
    }
    return commits;
  }

  async readFile(repo: RepositoryRef, path: string, sha: string): Promise<string | undefined> {
    return this.require(repo).commits.get(sha)?.files.get(path);
  }

  async createCommit(repo: RepositoryRef, options: CreateCommitOptions): Promise<CommitInfo> {
    const stored = this.require(repo);
    const parent = stored.commits.get(options.parentSha);
    if (!parent) {
      throw new NotFoundError(`Commit not found: ${options.parentSha}`);
    }
    const files = new Map(parent.files);
    for (const file of options.files) {
      files.set(file.path, file.content);
    }
    const info: CommitInfo = {
      sha: createRevisionId(),
      message: options.message,
      date: new Date(),
      parents: [options.parentSha],
    };
    if (options.author) info.author = { ...options.author };
    stored.commits.set(info.sha, { info, files });
    return copyCommit(info);
  }

  async updateBranch(repo: RepositoryRef, branch: string, sha: string, options: { force: boolean }): Promise<boolean> {
    const stored = this.require(repo);
    if (!stored.commits.has(sha)) {
      throw new NotFoundError(`Commit not found: ${sha}`);
    }
    const current = stored.branches.get(branch);
    if (!options.force && current !== undefined && !this.isAncestor(stored, current, sha)) {
      return false;
    }
    stored.branches.set(branch, sha);
    return true;
  }

  async createTag(repo: RepositoryRef, options: CreateTagOptions): Promise<TagObject> {
    const stored = this.require(repo);
    if (!stored.commits.has(options.commitSha)) {
      throw new NotFoundError(`Commit not found: ${options.commitSha}`);
    }
    if (stored.tags.has(options.name) && !options.force) {
      throw new AlreadyExistsError("Reference already exists");
    }
    const tag: TagObject = {
      name: options.name,
      commitSha: options.commitSha,
      message: options.message,
      date: new Date(),
    };
    if (options.tagger) tag.tagger = { ...options.tagger };
    stored.tags.set(options.name, tag);
    return copyTag(tag);
  }

  async getTag(repo: RepositoryRef, name: string): Promise<TagObject | undefined> {
    const tag = this.repositories.get(this.key(repo))?.tags.get(name);
    return tag && copyTag(tag);
  }

  async listTags(repo: RepositoryRef): Promise<TagObject[]> {
    return [...this.require(repo).tags.values()].map(copyTag);
  }

  async deleteTag(repo: RepositoryRef, name: string): Promise<boolean> {
    return this.require(repo).tags.delete(name);
  }

  private isAncestor(stored: StoredRepository, ancestor: string, sha: string): boolean {
    let current: string | undefined = sha;
    while (current !== undefined) {
      if (current === ancestor) return true;
      current = stored.commits.get(current)?.info.parents[0];
    }
    return false;
  }

  private require(repo: RepositoryRef): StoredRepository {
    const stored = this.repositories.get(this.key(repo));
    if (!stored) {
      throw new NotFoundError(`Repository not found: ${this.key(repo)}`);
    }
    return stored;
  }

  private key(repo: RepositoryRef): string {
    return `${repo.owner}/${repo.name}`;
  }
}
