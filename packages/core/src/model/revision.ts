/**
 * Revision model
 *
 * A package is a linear, append-only chain of immutable revisions.
 * Tags are named pointers into that chain.
 */

import { cloneDocument, type MetadataDocument } from "../common/json.js";

/**
 * Who made a revision or a tag.
 */
export interface Author {
  name?: string;
  email?: string;
}

/**
 * Immutable snapshot of a package's content.
 */
export interface Revision {
  packageId: string;
  /** Backend-assigned, unique within the package history */
  revisionId: string;
  content: MetadataDocument;
  createdAt: Date;
  message?: string;
  author?: Author;
  /** Revision this one was created from; absent for the first revision */
  parentRevisionId?: string;
}

/**
 * Named pointer to a revision.
 */
export interface Tag {
  packageId: string;
  name: string;
  revisionId: string;
  createdAt: Date;
  description?: string;
  author?: Author;
}

/**
 * Revision with its content, as returned by create/update/fetch.
 */
export type PackageRevisionInfo = Revision;

/**
 * Listing projection of a revision, without content.
 */
export type RevisionInfo = Omit<Revision, "content">;

export type TagInfo = Tag;

function revisionMetadata(revision: Revision): RevisionInfo {
  const info: RevisionInfo = {
    packageId: revision.packageId,
    revisionId: revision.revisionId,
    createdAt: new Date(revision.createdAt.getTime()),
  };
  if (revision.message !== undefined) info.message = revision.message;
  if (revision.author !== undefined) info.author = { ...revision.author };
  if (revision.parentRevisionId !== undefined) info.parentRevisionId = revision.parentRevisionId;
  return info;
}

/**
 * Detached copy of a revision; mutating it never touches stored state.
 */
export function toPackageRevisionInfo(revision: Revision): PackageRevisionInfo {
  return { ...revisionMetadata(revision), content: cloneDocument(revision.content) };
}

export function toRevisionInfo(revision: Revision): RevisionInfo {
  return revisionMetadata(revision);
}

export function toTagInfo(tag: Tag): TagInfo {
  const info: TagInfo = {
    packageId: tag.packageId,
    name: tag.name,
    revisionId: tag.revisionId,
    createdAt: new Date(tag.createdAt.getTime()),
  };
  if (tag.description !== undefined) info.description = tag.description;
  if (tag.author !== undefined) info.author = { ...tag.author };
  return info;
}
