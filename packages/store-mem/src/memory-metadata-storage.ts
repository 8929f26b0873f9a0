/**
 * In-memory MetadataStorage implementation
 *
 * Reference backend: keeps every package in process memory and serves
 * as the conformance target other adapters are compared against.
 * No persistence - data is lost when the instance is garbage collected.
 */

import {
  AlreadyExistsError,
  type Author,
  cloneDocument,
  ConflictError,
  createRevisionId,
  KeyedLock,
  type MetadataDocument,
  type MetadataStorage,
  NotFoundError,
  type Revision,
  type RevisionWriteOptions,
  type Tag,
  type TagCreateOptions,
  type TagUpdateOptions,
  toPackageRevisionInfo,
  toTagInfo,
} from "@metastore/core";

/**
 * Internal storage entry for one package
 */
interface PackageEntry {
  /** Oldest first */
  revisions: Revision[];
  byId: Map<string, Revision>;
  tags: Map<string, Tag>;
}

export class MemoryMetadataStorage implements MetadataStorage {
  private readonly packages = new Map<string, PackageEntry>();
  private readonly lock = new KeyedLock();

  async createPackage(
    packageId: string,
    content: MetadataDocument,
    options: RevisionWriteOptions = {},
  ): Promise<Revision> {
    return this.lock.runExclusive(packageId, () => {
      if (this.packages.has(packageId)) {
        throw new AlreadyExistsError(`Package already exists: ${packageId}`, { packageId });
      }
      const entry: PackageEntry = { revisions: [], byId: new Map(), tags: new Map() };
      const revision = this.append(entry, packageId, undefined, content, options);
      this.packages.set(packageId, entry);
      return toPackageRevisionInfo(revision);
    });
  }

  async appendRevision(
    packageId: string,
    expectedParentRevisionId: string | undefined,
    content: MetadataDocument,
    options: RevisionWriteOptions = {},
  ): Promise<Revision> {
    return this.lock.runExclusive(packageId, () => {
      const entry = this.requirePackage(packageId);
      const head = entry.revisions[entry.revisions.length - 1];
      if (expectedParentRevisionId !== undefined && head?.revisionId !== expectedParentRevisionId) {
        throw new ConflictError(head?.revisionId, { expectedRevisionId: expectedParentRevisionId, packageId });
      }
      return toPackageRevisionInfo(this.append(entry, packageId, head, content, options));
    });
  }

  async getRevision(packageId: string, revisionId?: string): Promise<Revision> {
    return this.lock.runExclusive(packageId, () => {
      const entry = this.requirePackage(packageId);
      const revision =
        revisionId === undefined ? entry.revisions[entry.revisions.length - 1] : entry.byId.get(revisionId);
      if (!revision) {
        throw new NotFoundError(`Revision not found: ${revisionId ?? "HEAD"}`, { packageId });
      }
      return toPackageRevisionInfo(revision);
    });
  }

  async listRevisions(packageId: string): Promise<Revision[]> {
    return this.lock.runExclusive(packageId, () => {
      const entry = this.requirePackage(packageId);
      return [...entry.revisions].reverse().map(toPackageRevisionInfo);
    });
  }

  async deletePackage(packageId: string): Promise<void> {
    await this.lock.runExclusive(packageId, () => {
      this.requirePackage(packageId);
      this.packages.delete(packageId);
    });
  }

  async createTag(packageId: string, revisionId: string, name: string, options: TagCreateOptions = {}): Promise<Tag> {
    return this.lock.runExclusive(packageId, () => {
      const entry = this.requirePackage(packageId);
      if (!entry.byId.has(revisionId)) {
        throw new NotFoundError(`Revision not found: ${revisionId}`, { packageId });
      }
      if (entry.tags.has(name) && !options.overwrite) {
        throw new AlreadyExistsError(`Tag already exists: ${name}`, { packageId });
      }
      const tag = withOptionalFields({ packageId, name, revisionId, createdAt: new Date() }, options);
      entry.tags.set(name, tag);
      return toTagInfo(tag);
    });
  }

  async getTag(packageId: string, name: string): Promise<Tag> {
    return this.lock.runExclusive(packageId, () => {
      const entry = this.requirePackage(packageId);
      return toTagInfo(this.requireTag(entry, packageId, name));
    });
  }

  async listTags(packageId: string): Promise<Tag[]> {
    return this.lock.runExclusive(packageId, () => [...this.requirePackage(packageId).tags.values()].map(toTagInfo));
  }

  async updateTag(packageId: string, name: string, options: TagUpdateOptions): Promise<Tag> {
    return this.lock.runExclusive(packageId, () => {
      const entry = this.requirePackage(packageId);
      const current = this.requireTag(entry, packageId, name);
      const newName = options.newName ?? name;
      if (newName !== name && entry.tags.has(newName)) {
        throw new AlreadyExistsError(`Tag already exists: ${newName}`, { packageId });
      }
      const updated = withOptionalFields(
        { ...current, name: newName },
        { description: options.description ?? current.description, author: options.author ?? current.author },
      );
      entry.tags.delete(name);
      entry.tags.set(newName, updated);
      return toTagInfo(updated);
    });
  }

  async deleteTag(packageId: string, name: string): Promise<void> {
    await this.lock.runExclusive(packageId, () => {
      const entry = this.requirePackage(packageId);
      this.requireTag(entry, packageId, name);
      entry.tags.delete(name);
    });
  }

  private append(
    entry: PackageEntry,
    packageId: string,
    parent: Revision | undefined,
    content: MetadataDocument,
    options: RevisionWriteOptions,
  ): Revision {
    let revisionId = createRevisionId();
    while (entry.byId.has(revisionId)) {
      revisionId = createRevisionId();
    }
    // Creation times never run backwards along the history.
    const createdAt = new Date(Math.max(Date.now(), parent?.createdAt.getTime() ?? 0));
    const revision: Revision = { packageId, revisionId, content: cloneDocument(content), createdAt };
    if (options.message !== undefined) revision.message = options.message;
    if (options.author !== undefined) revision.author = { ...options.author };
    if (parent) revision.parentRevisionId = parent.revisionId;

    entry.revisions.push(revision);
    entry.byId.set(revisionId, revision);
    return revision;
  }

  private requirePackage(packageId: string): PackageEntry {
    const entry = this.packages.get(packageId);
    if (!entry) {
      throw new NotFoundError(`Package not found: ${packageId}`, { packageId });
    }
    return entry;
  }

  private requireTag(entry: PackageEntry, packageId: string, name: string): Tag {
    const tag = entry.tags.get(name);
    if (!tag) {
      throw new NotFoundError(`Tag not found: ${name}`, { packageId });
    }
    return tag;
  }
}

function withOptionalFields(tag: Tag, fields: { description?: string; author?: Author }): Tag {
  const result: Tag = {
    packageId: tag.packageId,
    name: tag.name,
    revisionId: tag.revisionId,
    createdAt: tag.createdAt,
  };
  if (fields.description !== undefined) result.description = fields.description;
  if (fields.author !== undefined) result.author = { ...fields.author };
  return result;
}

/**
 * Create an empty in-memory storage.
 */
export function createMemoryMetadataStorage(): MemoryMetadataStorage {
  return new MemoryMetadataStorage();
}
