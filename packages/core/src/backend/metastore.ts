/**
 * Metastore - the backend facade
 *
 * Validates arguments, sequences capability calls on the configured
 * adapter and returns detached projections of the revision model.
 * It adds no locking of its own; conflict detection is entirely the
 * adapter's atomic append.
 *
 * @example
 * ```typescript
 * const metastore = new Metastore({ storage: new MemoryMetadataStorage() });
 *
 * const r1 = await metastore.create("pkg-a", { name: "mypackage", version: "1.0.0" });
 * const r2 = await metastore.update("pkg-a", { name: "mypackage", version: "1.0.1" }, {
 *   baseRevisionId: r1.revisionId,
 * });
 * await metastore.tagCreate("pkg-a", r2.revisionId, "ver-1.0.1");
 * ```
 */

import { validatePackageId, validateRevisionId, validateTagName } from "../common/ids.js";
import { cloneDocument, isMetadataDocument, type MetadataDocument } from "../common/json.js";
import type { MetastoreLogger } from "../common/logger.js";
import { applyUpdate } from "../concurrency/optimistic-update.js";
import { InvalidArgumentError, MetastoreError, UnexpectedBackendError } from "../errors/index.js";
import {
  type Author,
  type PackageRevisionInfo,
  type RevisionInfo,
  type TagInfo,
  toPackageRevisionInfo,
  toRevisionInfo,
  toTagInfo,
} from "../model/revision.js";
import type {
  MetadataStorage,
  RevisionWriteOptions,
  TagCreateOptions,
  TagUpdateOptions,
} from "../storage/metadata-storage.js";

export interface MetastoreOptions {
  /** Storage adapter the facade drives */
  storage: MetadataStorage;
  logger?: MetastoreLogger;
  /**
   * Duplicate tag policy of this backend: re-point existing tags instead
   * of failing. Defaults to false; a per-call `overwrite` takes precedence.
   */
  overwriteTags?: boolean;
  /** Author recorded when a call does not name one */
  defaultAuthor?: Author;
}

export interface UpdateOptions {
  /** Revision the caller last read; omit for last-write-wins */
  baseRevisionId?: string;
  message?: string;
  author?: Author;
  /** Merge top-level keys over the base revision instead of replacing it */
  partial?: boolean;
}

export class Metastore {
  readonly storage: MetadataStorage;
  private readonly logger: MetastoreLogger | undefined;
  private readonly overwriteTags: boolean;
  private readonly defaultAuthor: Author | undefined;

  constructor(options: MetastoreOptions) {
    this.storage = options.storage;
    this.logger = options.logger;
    this.overwriteTags = options.overwriteTags ?? false;
    this.defaultAuthor = options.defaultAuthor;
  }

  /**
   * Create a package with its first revision.
   *
   * @throws AlreadyExistsError if the package exists
   */
  create(packageId: string, content: MetadataDocument, options: RevisionWriteOptions = {}): Promise<PackageRevisionInfo> {
    return this.run("create", packageId, async () => {
      validatePackageId(packageId);
      const document = validateContent(content);
      const revision = await this.storage.createPackage(packageId, document, {
        message: options.message,
        author: options.author ?? this.defaultAuthor,
      });
      return toPackageRevisionInfo(revision);
    });
  }

  /**
   * Append a new revision.
   *
   * @throws NotFoundError if the package does not exist
   * @throws ConflictError if `baseRevisionId` is not the current head
   */
  update(packageId: string, content: MetadataDocument, options: UpdateOptions = {}): Promise<PackageRevisionInfo> {
    return this.run("update", packageId, async () => {
      validatePackageId(packageId);
      const document = validateContent(content);
      if (options.baseRevisionId !== undefined) {
        validateRevisionId(options.baseRevisionId);
      }
      const revision = await applyUpdate(this.storage, packageId, {
        content: document,
        baseRevisionId: options.baseRevisionId,
        partial: options.partial,
        message: options.message,
        author: options.author ?? this.defaultAuthor,
      });
      return toPackageRevisionInfo(revision);
    });
  }

  /**
   * Current snapshot, or the given historical revision.
   */
  fetch(packageId: string, revisionId?: string): Promise<PackageRevisionInfo> {
    return this.run("fetch", packageId, async () => {
      validatePackageId(packageId);
      if (revisionId !== undefined) {
        validateRevisionId(revisionId);
      }
      return toPackageRevisionInfo(await this.storage.getRevision(packageId, revisionId));
    });
  }

  /**
   * Snapshot of the revision a tag points at.
   */
  fetchTagged(packageId: string, name: string): Promise<PackageRevisionInfo> {
    return this.run("fetchTagged", packageId, async () => {
      validatePackageId(packageId);
      validateTagName(name);
      const tag = await this.storage.getTag(packageId, name);
      return toPackageRevisionInfo(await this.storage.getRevision(packageId, tag.revisionId));
    });
  }

  /**
   * Complete history without content, newest first.
   */
  revisionList(packageId: string): Promise<RevisionInfo[]> {
    return this.run("revisionList", packageId, async () => {
      validatePackageId(packageId);
      const revisions = await this.storage.listRevisions(packageId);
      return revisions.map(toRevisionInfo);
    });
  }

  revisionFetch(packageId: string, revisionId: string): Promise<RevisionInfo> {
    return this.run("revisionFetch", packageId, async () => {
      validatePackageId(packageId);
      validateRevisionId(revisionId);
      return toRevisionInfo(await this.storage.getRevision(packageId, revisionId));
    });
  }

  /**
   * Remove the package, its history and its tags.
   *
   * Not idempotent: deleting a missing package fails with NotFoundError.
   */
  delete(packageId: string): Promise<void> {
    return this.run("delete", packageId, async () => {
      validatePackageId(packageId);
      await this.storage.deletePackage(packageId);
    });
  }

  tagCreate(packageId: string, revisionId: string, name: string, options: TagCreateOptions = {}): Promise<TagInfo> {
    return this.run("tagCreate", packageId, async () => {
      validatePackageId(packageId);
      validateRevisionId(revisionId);
      validateTagName(name);
      const tag = await this.storage.createTag(packageId, revisionId, name, {
        description: options.description,
        author: options.author ?? this.defaultAuthor,
        overwrite: options.overwrite ?? this.overwriteTags,
      });
      return toTagInfo(tag);
    });
  }

  tagList(packageId: string): Promise<TagInfo[]> {
    return this.run("tagList", packageId, async () => {
      validatePackageId(packageId);
      const tags = await this.storage.listTags(packageId);
      return tags.map(toTagInfo);
    });
  }

  tagFetch(packageId: string, name: string): Promise<TagInfo> {
    return this.run("tagFetch", packageId, async () => {
      validatePackageId(packageId);
      validateTagName(name);
      return toTagInfo(await this.storage.getTag(packageId, name));
    });
  }

  /**
   * Rename a tag and/or change its description.
   */
  tagUpdate(packageId: string, name: string, options: TagUpdateOptions): Promise<TagInfo> {
    return this.run("tagUpdate", packageId, async () => {
      validatePackageId(packageId);
      validateTagName(name);
      if (options.newName === undefined && options.description === undefined) {
        throw new InvalidArgumentError("options", options, "Expected newName or description");
      }
      if (options.newName !== undefined) {
        validateTagName(options.newName, "newName");
      }
      const tag = await this.storage.updateTag(packageId, name, {
        newName: options.newName,
        description: options.description,
        author: options.author ?? this.defaultAuthor,
      });
      return toTagInfo(tag);
    });
  }

  tagDelete(packageId: string, name: string): Promise<void> {
    return this.run("tagDelete", packageId, async () => {
      validatePackageId(packageId);
      validateTagName(name);
      await this.storage.deleteTag(packageId, name);
    });
  }

  async close(): Promise<void> {
    await this.storage.close?.();
  }

  private async run<T>(operation: string, packageId: string, task: () => Promise<T>): Promise<T> {
    this.logger?.debug?.(`${operation} ${packageId}`);
    try {
      return await task();
    } catch (error) {
      throw this.describeFailure(operation, packageId, error);
    }
  }

  private describeFailure(operation: string, packageId: string, error: unknown): MetastoreError {
    const context = { operation, packageId };
    if (error instanceof MetastoreError) {
      if (error.kind === "unexpected") {
        this.logger?.error?.(`${operation} ${packageId} failed:`, error);
      }
      return error.withContext(context);
    }
    this.logger?.error?.(`${operation} ${packageId} failed:`, error);
    const reason = error instanceof Error ? error.message : String(error);
    return new UnexpectedBackendError(`${operation} failed: ${reason}`, { cause: error }).withContext(context);
  }
}

function validateContent(content: unknown): MetadataDocument {
  if (!isMetadataDocument(content)) {
    throw new InvalidArgumentError("content", content, "Content must be a JSON object");
  }
  return cloneDocument(content);
}
