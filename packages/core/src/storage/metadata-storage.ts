/**
 * MetadataStorage - the capability contract every storage medium implements
 *
 * The facade sequences these calls; adapters only have to provide the
 * primitives below over their medium (process memory, a file tree, a
 * hosted Git repository, ...).
 *
 * Atomicity: `appendRevision` must check the head and append the new
 * revision as one indivisible step with respect to other callers of the
 * same package. The same holds for `createPackage`, `deletePackage` and
 * every tag mutation. Operations either apply completely or not at all.
 *
 * Failures are reported with the error classes from `../errors`:
 * NotFoundError, AlreadyExistsError, ConflictError,
 * BackendUnavailableError, InvalidArgumentError.
 */

import type { MetadataDocument } from "../common/json.js";
import type { Author, Revision, Tag } from "../model/revision.js";

export interface RevisionWriteOptions {
  message?: string;
  author?: Author;
}

export interface TagCreateOptions {
  description?: string;
  author?: Author;
  /**
   * Re-point an existing tag with the same name instead of failing
   * with AlreadyExistsError.
   */
  overwrite?: boolean;
}

export interface TagUpdateOptions {
  /** Rename the tag */
  newName?: string;
  /** Replace the tag description */
  description?: string;
  author?: Author;
}

export interface MetadataStorage {
  /**
   * Create a package with its first revision.
   *
   * @throws AlreadyExistsError if the package already has a revision
   */
  createPackage(packageId: string, content: MetadataDocument, options?: RevisionWriteOptions): Promise<Revision>;

  /**
   * Append a revision on top of the current head.
   *
   * @param expectedParentRevisionId Head the caller expects; undefined skips the check
   * @throws NotFoundError if the package does not exist
   * @throws ConflictError if the head differs from the expected parent
   */
  appendRevision(
    packageId: string,
    expectedParentRevisionId: string | undefined,
    content: MetadataDocument,
    options?: RevisionWriteOptions,
  ): Promise<Revision>;

  /**
   * Read a revision, or the head when `revisionId` is omitted.
   *
   * @throws NotFoundError for an unknown package or revision
   */
  getRevision(packageId: string, revisionId?: string): Promise<Revision>;

  /**
   * Complete history, newest first.
   *
   * @throws NotFoundError for an unknown package
   */
  listRevisions(packageId: string): Promise<Revision[]>;

  /**
   * Remove the package with all revisions and tags.
   *
   * @throws NotFoundError for an unknown package
   */
  deletePackage(packageId: string): Promise<void>;

  /**
   * @throws NotFoundError for an unknown package or revision
   * @throws AlreadyExistsError if the name is taken and `overwrite` is not set
   */
  createTag(packageId: string, revisionId: string, name: string, options?: TagCreateOptions): Promise<Tag>;

  /**
   * @throws NotFoundError for an unknown package or tag
   */
  getTag(packageId: string, name: string): Promise<Tag>;

  /**
   * All tags of a package. Order is not part of the contract.
   *
   * @throws NotFoundError for an unknown package
   */
  listTags(packageId: string): Promise<Tag[]>;

  /**
   * Rename and/or re-describe a tag. The tagged revision never changes.
   *
   * @throws NotFoundError for an unknown package or tag
   * @throws AlreadyExistsError if `newName` belongs to another tag
   */
  updateTag(packageId: string, name: string, options: TagUpdateOptions): Promise<Tag>;

  /**
   * @throws NotFoundError for an unknown package or tag
   */
  deleteTag(packageId: string, name: string): Promise<void>;

  /**
   * Release resources held by the adapter (connections, handles).
   */
  close?(): Promise<void>;
}
