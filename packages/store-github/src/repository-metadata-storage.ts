/**
 * MetadataStorage over a hosted Git repository service
 *
 * - package: a repository, created with one root commit
 * - revision: every later commit on the branch, with the package
 *   content in `datapackage.json`
 * - tag: an annotated tag ref
 *
 * Conditional appends create the commit on top of the expected head and
 * move the branch with a non-forced ref update; the service rejects the
 * update if the branch moved meanwhile. Writers in one instance are also
 * serialized per package.
 */

import {
  AlreadyExistsError,
  type Author,
  BackendUnavailableError,
  cloneDocument,
  ConflictError,
  decodeDocument,
  encodeDocument,
  isMetastoreError,
  isValidTagName,
  KeyedLock,
  type MetadataDocument,
  type MetadataStorage,
  type MetastoreLogger,
  NotFoundError,
  type Revision,
  type RevisionWriteOptions,
  type Tag,
  type TagCreateOptions,
  type TagUpdateOptions,
  UnexpectedBackendError,
  validateTagName,
} from "@metastore/core";
import { parsePackageId } from "./package-id.js";
import type { CommitInfo, RepositoryHost, RepositoryRef, TagObject } from "./repository-host.js";

export const DATAPACKAGE_FILE = "datapackage.json";
export const DEFAULT_BRANCH = "master";
export const DEFAULT_CREATE_MESSAGE = "Initial datapackage commit";
export const DEFAULT_UPDATE_MESSAGE = "Datapackage updated";
export const DEFAULT_TAG_MESSAGE = "Tagging revision";
export const DEFAULT_REPOSITORY_DESCRIPTION = "Data package repository";

const COMMIT_SHA_RE = /^[0-9a-f]{4,64}$/;

export interface RepositoryMetadataStorageOptions {
  host: RepositoryHost;
  /** Owner for package ids without an "owner/" prefix */
  defaultOwner?: string;
  /** Branch holding the revisions; defaults to "master" */
  defaultBranch?: string;
  /** Author recorded when a write names none */
  defaultAuthor?: Author;
  /** Attempts of a forced write racing other writers; defaults to 3 */
  maxForceAttempts?: number;
  logger?: MetastoreLogger;
}

export class RepositoryMetadataStorage implements MetadataStorage {
  private readonly host: RepositoryHost;
  private readonly defaultOwner: string | undefined;
  private readonly branch: string;
  private readonly defaultAuthor: Author | undefined;
  readonly maxForceAttempts: number;
  private readonly logger: MetastoreLogger | undefined;
  private readonly lock = new KeyedLock();

  constructor(options: RepositoryMetadataStorageOptions) {
    this.host = options.host;
    this.defaultOwner = options.defaultOwner;
    this.branch = options.defaultBranch ?? DEFAULT_BRANCH;
    this.defaultAuthor = options.defaultAuthor;
    this.maxForceAttempts = Math.max(1, options.maxForceAttempts ?? 3);
    this.logger = options.logger;
  }

  async createPackage(
    packageId: string,
    content: MetadataDocument,
    options: RevisionWriteOptions = {},
  ): Promise<Revision> {
    const repo = parsePackageId(packageId, this.defaultOwner);
    return this.lock.runExclusive(packageId, async () => {
      await this.host.createRepository(repo, { branch: this.branch, description: DEFAULT_REPOSITORY_DESCRIPTION });
      try {
        const rootSha = await this.host.getBranchHead(repo, this.branch);
        if (rootSha === undefined) {
          throw new BackendUnavailableError(`Repository ${repo.owner}/${repo.name} has no ${this.branch} branch`);
        }
        const commit = await this.host.createCommit(repo, {
          parentSha: rootSha,
          files: [{ path: DATAPACKAGE_FILE, content: encodeDocument(content) }],
          message: options.message ?? DEFAULT_CREATE_MESSAGE,
          author: options.author ?? this.defaultAuthor,
        });
        if (!(await this.host.updateBranch(repo, this.branch, commit.sha, { force: false }))) {
          throw new BackendUnavailableError(`Branch ${this.branch} of ${packageId} moved during creation`);
        }
        return this.toRevision(packageId, commit, content, undefined);
      } catch (error) {
        await this.discardRepository(packageId, repo);
        throw error;
      }
    });
  }

  async appendRevision(
    packageId: string,
    expectedParentRevisionId: string | undefined,
    content: MetadataDocument,
    options: RevisionWriteOptions = {},
  ): Promise<Revision> {
    const repo = parsePackageId(packageId, this.defaultOwner);
    return this.lock.runExclusive(packageId, async () => {
      const attempts = expectedParentRevisionId === undefined ? this.maxForceAttempts : 1;
      for (let attempt = 1; attempt <= attempts; attempt++) {
        const head = await this.requireHead(packageId, repo);
        if (expectedParentRevisionId !== undefined && expectedParentRevisionId !== head.sha) {
          throw new ConflictError(head.sha, { expectedRevisionId: expectedParentRevisionId, packageId });
        }
        const commit = await this.host.createCommit(repo, {
          parentSha: head.sha,
          files: [{ path: DATAPACKAGE_FILE, content: encodeDocument(content) }],
          message: options.message ?? DEFAULT_UPDATE_MESSAGE,
          author: options.author ?? this.defaultAuthor,
        });
        if (await this.host.updateBranch(repo, this.branch, commit.sha, { force: false })) {
          return this.toRevision(packageId, commit, content, head.sha);
        }
        if (expectedParentRevisionId !== undefined) {
          const current = await this.host.getBranchHead(repo, this.branch);
          throw new ConflictError(current, { expectedRevisionId: expectedParentRevisionId, packageId });
        }
        this.logger?.warn?.(`Head of ${packageId} moved during a forced write (attempt ${attempt} of ${attempts})`);
      }
      throw new BackendUnavailableError(
        `Head of ${packageId} kept moving; gave up after ${attempts} attempts`,
        { packageId },
      );
    });
  }

  async getRevision(packageId: string, revisionId?: string): Promise<Revision> {
    const repo = parsePackageId(packageId, this.defaultOwner);
    const head = await this.requireHead(packageId, repo);
    if (revisionId === undefined || revisionId === head.sha) {
      return this.loadRevision(packageId, repo, head);
    }
    const commit = COMMIT_SHA_RE.test(revisionId) ? await this.host.getCommit(repo, revisionId) : undefined;
    if (!commit || commit.parents.length === 0) {
      throw new NotFoundError(`Revision not found: ${revisionId}`, { packageId });
    }
    return this.loadRevision(packageId, repo, commit);
  }

  async listRevisions(packageId: string): Promise<Revision[]> {
    const repo = parsePackageId(packageId, this.defaultOwner);
    await this.requireHead(packageId, repo);
    const listed = await this.host.listCommits(repo, this.branch);
    const roots = new Set(listed.filter((commit) => commit.parents.length === 0).map((commit) => commit.sha));
    const revisions: Revision[] = [];
    for (const commit of listed) {
      if (roots.has(commit.sha)) continue;
      const content = await this.readContent(packageId, repo, commit.sha);
      const [parentSha] = commit.parents;
      const parentRevisionId = parentSha === undefined || roots.has(parentSha) ? undefined : parentSha;
      revisions.push(this.toRevision(packageId, commit, content, parentRevisionId));
    }
    return revisions;
  }

  async deletePackage(packageId: string): Promise<void> {
    const repo = parsePackageId(packageId, this.defaultOwner);
    await this.lock.runExclusive(packageId, async () => {
      await this.requireHead(packageId, repo);
      await this.host.deleteRepository(repo);
    });
  }

  async createTag(packageId: string, revisionId: string, name: string, options: TagCreateOptions = {}): Promise<Tag> {
    const repo = parsePackageId(packageId, this.defaultOwner);
    validateTagName(name);
    return this.lock.runExclusive(packageId, async () => {
      const revision = await this.getRevision(packageId, revisionId);
      if (!options.overwrite && (await this.host.getTag(repo, name))) {
        throw new AlreadyExistsError(`Tag already exists: ${name}`, { packageId });
      }
      const tag = await this.host.createTag(repo, {
        name,
        commitSha: revision.revisionId,
        message: options.description ?? DEFAULT_TAG_MESSAGE,
        tagger: options.author ?? this.defaultAuthor,
        force: options.overwrite,
      });
      return toTag(packageId, tag);
    });
  }

  async getTag(packageId: string, name: string): Promise<Tag> {
    const repo = parsePackageId(packageId, this.defaultOwner);
    await this.requireHead(packageId, repo);
    return toTag(packageId, await this.requireTag(packageId, repo, name));
  }

  async listTags(packageId: string): Promise<Tag[]> {
    const repo = parsePackageId(packageId, this.defaultOwner);
    await this.requireHead(packageId, repo);
    const tags = await this.host.listTags(repo);
    return tags.map((tag) => toTag(packageId, tag));
  }

  async updateTag(packageId: string, name: string, options: TagUpdateOptions): Promise<Tag> {
    const repo = parsePackageId(packageId, this.defaultOwner);
    return this.lock.runExclusive(packageId, async () => {
      await this.requireHead(packageId, repo);
      const current = await this.requireTag(packageId, repo, name);
      const newName = options.newName ?? name;
      const renamed = newName !== name;
      if (renamed) {
        validateTagName(newName, "newName");
      }
      const tag = await this.host.createTag(repo, {
        name: newName,
        commitSha: current.commitSha,
        message: options.description ?? current.message,
        tagger: options.author ?? current.tagger ?? this.defaultAuthor,
        force: !renamed,
      });
      if (renamed) {
        try {
          await this.host.deleteTag(repo, name);
        } catch (error) {
          await this.discardTag(packageId, repo, newName);
          throw error;
        }
      }
      return toTag(packageId, tag);
    });
  }

  async deleteTag(packageId: string, name: string): Promise<void> {
    const repo = parsePackageId(packageId, this.defaultOwner);
    await this.lock.runExclusive(packageId, async () => {
      await this.requireHead(packageId, repo);
      if (!isValidTagName(name) || !(await this.host.deleteTag(repo, name))) {
        throw new NotFoundError(`Tag not found: ${name}`, { packageId });
      }
    });
  }

  /**
   * Head revision commit; the root commit alone is no revision.
   */
  private async requireHead(packageId: string, repo: RepositoryRef): Promise<CommitInfo> {
    const sha = await this.host.getBranchHead(repo, this.branch);
    const commit = sha === undefined ? undefined : await this.host.getCommit(repo, sha);
    if (!commit || commit.parents.length === 0) {
      throw new NotFoundError(`Package not found: ${packageId}`, { packageId });
    }
    return commit;
  }

  private async requireTag(packageId: string, repo: RepositoryRef, name: string): Promise<TagObject> {
    const tag = isValidTagName(name) ? await this.host.getTag(repo, name) : undefined;
    if (!tag) {
      throw new NotFoundError(`Tag not found: ${name}`, { packageId });
    }
    return tag;
  }

  private async loadRevision(packageId: string, repo: RepositoryRef, commit: CommitInfo): Promise<Revision> {
    const content = await this.readContent(packageId, repo, commit.sha);
    const [parentSha] = commit.parents;
    const parent = parentSha === undefined ? undefined : await this.host.getCommit(repo, parentSha);
    const parentRevisionId = parent && parent.parents.length > 0 ? parent.sha : undefined;
    return this.toRevision(packageId, commit, content, parentRevisionId);
  }

  private async readContent(packageId: string, repo: RepositoryRef, sha: string): Promise<MetadataDocument> {
    const text = await this.host.readFile(repo, DATAPACKAGE_FILE, sha);
    if (text === undefined) {
      throw new NotFoundError(`${DATAPACKAGE_FILE} not found for ${packageId}@${sha}`, { packageId });
    }
    try {
      return decodeDocument(text);
    } catch (error) {
      throw new UnexpectedBackendError(`Unable to parse ${DATAPACKAGE_FILE} in ${packageId}@${sha}`, {
        cause: error,
        packageId,
      });
    }
  }

  private toRevision(
    packageId: string,
    commit: CommitInfo,
    content: MetadataDocument,
    parentRevisionId: string | undefined,
  ): Revision {
    const revision: Revision = {
      packageId,
      revisionId: commit.sha,
      content: cloneDocument(content),
      createdAt: new Date(commit.date.getTime()),
      message: commit.message,
    };
    if (commit.author) revision.author = { ...commit.author };
    if (parentRevisionId !== undefined) revision.parentRevisionId = parentRevisionId;
    return revision;
  }

  private async discardTag(packageId: string, repo: RepositoryRef, name: string): Promise<void> {
    try {
      await this.host.deleteTag(repo, name);
    } catch (error) {
      this.logger?.warn?.(`Tag ${name} of ${packageId} was left behind by a failed rename:`, error);
    }
  }

  private async discardRepository(packageId: string, repo: RepositoryRef): Promise<void> {
    try {
      await this.host.deleteRepository(repo);
    } catch (error) {
      if (!isMetastoreError(error, "not-found")) {
        this.logger?.warn?.(`Failed to remove half-created repository for ${packageId}:`, error);
      }
    }
  }
}

function toTag(packageId: string, tag: TagObject): Tag {
  const result: Tag = {
    packageId,
    name: tag.name,
    revisionId: tag.commitSha,
    createdAt: new Date(tag.date.getTime()),
    description: tag.message,
  };
  if (tag.tagger) result.author = { ...tag.tagger };
  return result;
}
