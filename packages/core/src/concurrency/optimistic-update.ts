/**
 * Optimistic concurrency control for package updates
 *
 * The controller never locks. It only decides which head the append must
 * be checked against and lets the adapter's atomic check-and-append
 * enforce it. Conflicts are rejected, never merged: content is opaque.
 */

import { mergeDocuments, type MetadataDocument } from "../common/json.js";
import { ConflictError, isMetastoreError } from "../errors/index.js";
import type { Author, Revision } from "../model/revision.js";
import type { MetadataStorage } from "../storage/metadata-storage.js";

export interface UpdateRequest {
  content: MetadataDocument;
  /** Revision the caller last read; omit for last-write-wins */
  baseRevisionId?: string;
  /** Merge `content` over the base revision instead of replacing it */
  partial?: boolean;
  message?: string;
  author?: Author;
}

/**
 * Append a revision according to the caller's concurrency intent.
 *
 * - no base: force write on top of whatever the head is
 * - base: append only if the base is still the head
 * - partial with a base: merge over the base and append checked
 *   against it
 * - partial without a base: merge over the head just read and force
 *   the append, so a concurrent write is overwritten, never reported
 *
 * @throws ConflictError when the base is not the head
 * @throws NotFoundError when the package does not exist
 */
export async function applyUpdate(
  storage: MetadataStorage,
  packageId: string,
  request: UpdateRequest,
): Promise<Revision> {
  const writeOptions = { message: request.message, author: request.author };

  if (!request.partial) {
    return storage.appendRevision(packageId, request.baseRevisionId, request.content, writeOptions);
  }

  const base = await loadMergeBase(storage, packageId, request.baseRevisionId);
  const merged = mergeDocuments(base.content, request.content);
  return storage.appendRevision(packageId, request.baseRevisionId, merged, writeOptions);
}

async function loadMergeBase(
  storage: MetadataStorage,
  packageId: string,
  baseRevisionId: string | undefined,
): Promise<Revision> {
  if (baseRevisionId === undefined) {
    return storage.getRevision(packageId);
  }
  try {
    return await storage.getRevision(packageId, baseRevisionId);
  } catch (error) {
    if (!isMetastoreError(error, "not-found")) {
      throw error;
    }
    // Unknown base on an existing package: report the current head.
    const head = await storage.getRevision(packageId);
    throw new ConflictError(head.revisionId, { expectedRevisionId: baseRevisionId, packageId });
  }
}
