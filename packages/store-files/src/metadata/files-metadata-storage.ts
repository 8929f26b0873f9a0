/**
 * MetadataStorage over a FilesApi tree
 *
 * Each package is a directory holding one JSON record per revision, one
 * per tag, and a HEAD file naming the current revision. A new revision
 * is written first and HEAD is then replaced through a temporary file
 * and a move, so readers observe either the old head or the new one.
 * History is reconstructed by following parent links from HEAD.
 *
 * Writers are serialized per package inside one instance. Several
 * processes writing the same tree are not coordinated.
 */

import {
  AlreadyExistsError,
  BackendUnavailableError,
  cloneDocument,
  ConflictError,
  createRevisionId,
  isValidTagName,
  KeyedLock,
  type MetadataDocument,
  type MetadataStorage,
  MetastoreError,
  type MetastoreLogger,
  NotFoundError,
  type Revision,
  type RevisionWriteOptions,
  type Tag,
  type TagCreateOptions,
  type TagUpdateOptions,
  toPackageRevisionInfo,
  toTagInfo,
  UnexpectedBackendError,
  validateTagName,
} from "@metastore/core";
import type { FilesApi } from "@statewalker/webrun-files";
import { tryReadText, writeText, writeTextAtomic } from "./file-text.js";
import { PackageLayout, RECORD_EXT } from "./package-layout.js";
import { decodeRevisionRecord, decodeTagRecord, encodeRevisionRecord, encodeTagRecord } from "./records.js";

const REVISION_ID_RE = /^[0-9a-f]+$/;

export interface FilesMetadataStorageOptions {
  files: FilesApi;
  /** Directory inside `files` holding the store; defaults to the root */
  basePath?: string;
  logger?: MetastoreLogger;
}

export class FilesMetadataStorage implements MetadataStorage {
  private readonly files: FilesApi;
  private readonly basePath: string;
  private readonly logger: MetastoreLogger | undefined;
  private readonly lock = new KeyedLock();

  constructor(options: FilesMetadataStorageOptions) {
    this.files = options.files;
    this.basePath = options.basePath ?? "";
    this.logger = options.logger;
  }

  createPackage(packageId: string, content: MetadataDocument, options: RevisionWriteOptions = {}): Promise<Revision> {
    return this.run(packageId, "create package", async (layout) => {
      if ((await this.readHead(layout)) !== undefined) {
        throw new AlreadyExistsError(`Package already exists: ${packageId}`, { packageId });
      }
      // Leftovers of an interrupted delete must not leak into the new package.
      await this.files.remove(layout.dir);
      const revision = buildRevision(packageId, undefined, content, options);
      await this.commit(layout, revision);
      return toPackageRevisionInfo(revision);
    });
  }

  appendRevision(
    packageId: string,
    expectedParentRevisionId: string | undefined,
    content: MetadataDocument,
    options: RevisionWriteOptions = {},
  ): Promise<Revision> {
    return this.run(packageId, "append revision", async (layout) => {
      const headId = await this.requireHead(layout, packageId);
      if (expectedParentRevisionId !== undefined && expectedParentRevisionId !== headId) {
        throw new ConflictError(headId, { expectedRevisionId: expectedParentRevisionId, packageId });
      }
      const parent = await this.readRevision(layout, packageId, headId);
      const revision = buildRevision(packageId, parent, content, options);
      await this.commit(layout, revision);
      return toPackageRevisionInfo(revision);
    });
  }

  getRevision(packageId: string, revisionId?: string): Promise<Revision> {
    return this.run(packageId, "read revision", async (layout) => {
      const headId = await this.requireHead(layout, packageId);
      return this.readRevision(layout, packageId, revisionId ?? headId);
    });
  }

  listRevisions(packageId: string): Promise<Revision[]> {
    return this.run(packageId, "list revisions", async (layout) => {
      const history: Revision[] = [];
      const seen = new Set<string>();
      let next: string | undefined = await this.requireHead(layout, packageId);
      while (next !== undefined) {
        if (seen.has(next)) {
          throw new UnexpectedBackendError(`Revision history of ${packageId} loops at ${next}`, { packageId });
        }
        seen.add(next);
        const revision = await this.loadRevision(layout, next);
        if (!revision) {
          throw new UnexpectedBackendError(`Revision history of ${packageId} is missing ${next}`, { packageId });
        }
        history.push(revision);
        next = revision.parentRevisionId;
      }
      return history;
    });
  }

  deletePackage(packageId: string): Promise<void> {
    return this.run(packageId, "delete package", async (layout) => {
      await this.requireHead(layout, packageId);
      await this.files.remove(layout.head);
      try {
        await this.files.remove(layout.dir);
      } catch (error) {
        this.logger?.warn?.(`Package ${packageId} deleted, but ${layout.dir} could not be removed:`, error);
      }
    });
  }

  createTag(packageId: string, revisionId: string, name: string, options: TagCreateOptions = {}): Promise<Tag> {
    return this.run(packageId, "create tag", async (layout) => {
      await this.requireHead(layout, packageId);
      validateTagName(name);
      await this.readRevision(layout, packageId, revisionId);
      if (!options.overwrite && (await this.files.exists(layout.tag(name)))) {
        throw new AlreadyExistsError(`Tag already exists: ${name}`, { packageId });
      }
      const tag: Tag = { packageId, name, revisionId, createdAt: new Date() };
      if (options.description !== undefined) tag.description = options.description;
      if (options.author !== undefined) tag.author = { ...options.author };
      await writeTextAtomic(this.files, layout.tag(name), encodeTagRecord(tag));
      return toTagInfo(tag);
    });
  }

  getTag(packageId: string, name: string): Promise<Tag> {
    return this.run(packageId, "read tag", async (layout) => {
      await this.requireHead(layout, packageId);
      return this.readTag(layout, packageId, name);
    });
  }

  listTags(packageId: string): Promise<Tag[]> {
    return this.run(packageId, "list tags", async (layout) => {
      await this.requireHead(layout, packageId);
      const tags: Tag[] = [];
      for await (const entry of this.files.list(layout.tagsDir)) {
        if (entry.kind !== "file" || !entry.name.endsWith(RECORD_EXT)) continue;
        const text = await tryReadText(this.files, entry.path);
        if (text !== undefined) {
          tags.push(decodeTagRecord(text, entry.path));
        }
      }
      return tags.sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime() || a.name.localeCompare(b.name));
    });
  }

  updateTag(packageId: string, name: string, options: TagUpdateOptions): Promise<Tag> {
    return this.run(packageId, "update tag", async (layout) => {
      await this.requireHead(layout, packageId);
      const current = await this.readTag(layout, packageId, name);
      const newName = options.newName ?? name;
      const renamed = newName !== name;
      if (renamed) {
        validateTagName(newName, "newName");
        if (await this.files.exists(layout.tag(newName))) {
          throw new AlreadyExistsError(`Tag already exists: ${newName}`, { packageId });
        }
      }

      const updated: Tag = { ...current, name: newName };
      if (options.description !== undefined) updated.description = options.description;
      if (options.author !== undefined) updated.author = { ...options.author };
      await writeTextAtomic(this.files, layout.tag(newName), encodeTagRecord(updated));

      if (renamed) {
        try {
          await this.files.remove(layout.tag(name));
        } catch (error) {
          await this.discard(layout.tag(newName));
          throw error;
        }
      }
      return toTagInfo(updated);
    });
  }

  deleteTag(packageId: string, name: string): Promise<void> {
    return this.run(packageId, "delete tag", async (layout) => {
      await this.requireHead(layout, packageId);
      await this.readTag(layout, packageId, name);
      await this.files.remove(layout.tag(name));
    });
  }

  /**
   * Run a task under the package lock, reporting medium failures as
   * BackendUnavailableError.
   */
  private run<T>(packageId: string, action: string, task: (layout: PackageLayout) => Promise<T>): Promise<T> {
    return this.lock.runExclusive(packageId, async () => {
      try {
        return await task(new PackageLayout(this.basePath, packageId));
      } catch (error) {
        if (error instanceof MetastoreError) {
          throw error;
        }
        const reason = error instanceof Error ? error.message : String(error);
        throw new BackendUnavailableError(`Failed to ${action}: ${reason}`, { cause: error, packageId });
      }
    });
  }

  private async commit(layout: PackageLayout, revision: Revision): Promise<void> {
    const path = layout.revision(revision.revisionId);
    await writeText(this.files, path, encodeRevisionRecord(revision));
    try {
      await writeTextAtomic(this.files, layout.head, revision.revisionId);
    } catch (error) {
      await this.discard(path);
      throw error;
    }
  }

  private async discard(path: string): Promise<void> {
    try {
      await this.files.remove(path);
    } catch (error) {
      this.logger?.warn?.(`Failed to clean up ${path}:`, error);
    }
  }

  private async readHead(layout: PackageLayout): Promise<string | undefined> {
    const text = await tryReadText(this.files, layout.head);
    if (text === undefined) return undefined;
    const headId = text.trim();
    if (!REVISION_ID_RE.test(headId)) {
      throw new UnexpectedBackendError(`Damaged record ${layout.head}: invalid revision id`);
    }
    return headId;
  }

  private async requireHead(layout: PackageLayout, packageId: string): Promise<string> {
    const headId = await this.readHead(layout);
    if (headId === undefined) {
      throw new NotFoundError(`Package not found: ${packageId}`, { packageId });
    }
    return headId;
  }

  private async loadRevision(layout: PackageLayout, revisionId: string): Promise<Revision | undefined> {
    if (!REVISION_ID_RE.test(revisionId)) return undefined;
    const path = layout.revision(revisionId);
    const text = await tryReadText(this.files, path);
    return text === undefined ? undefined : decodeRevisionRecord(text, path);
  }

  private async readRevision(layout: PackageLayout, packageId: string, revisionId: string): Promise<Revision> {
    const revision = await this.loadRevision(layout, revisionId);
    if (!revision) {
      throw new NotFoundError(`Revision not found: ${revisionId}`, { packageId });
    }
    return revision;
  }

  private async readTag(layout: PackageLayout, packageId: string, name: string): Promise<Tag> {
    const missing = () => new NotFoundError(`Tag not found: ${name}`, { packageId });
    if (!isValidTagName(name)) {
      throw missing();
    }
    const path = layout.tag(name);
    const text = await tryReadText(this.files, path);
    if (text === undefined) {
      throw missing();
    }
    return decodeTagRecord(text, path);
  }
}

function buildRevision(
  packageId: string,
  parent: Revision | undefined,
  content: MetadataDocument,
  options: RevisionWriteOptions,
): Revision {
  // Creation times never run backwards along the history.
  const createdAt = new Date(Math.max(Date.now(), parent?.createdAt.getTime() ?? 0));
  const revision: Revision = { packageId, revisionId: createRevisionId(), content: cloneDocument(content), createdAt };
  if (parent) revision.parentRevisionId = parent.revisionId;
  if (options.message !== undefined) revision.message = options.message;
  if (options.author !== undefined) revision.author = { ...options.author };
  return revision;
}
