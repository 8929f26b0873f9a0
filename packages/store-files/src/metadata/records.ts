/**
 * On-disk records of the files backend
 *
 * Revisions and tags are stored as JSON files; dates are ISO-8601
 * strings. Decoding validates the shape so a damaged file is reported
 * instead of leaking malformed objects.
 */

import {
  type Author,
  decodeDocument,
  isMetadataDocument,
  type MetadataDocument,
  type Revision,
  type Tag,
  UnexpectedBackendError,
} from "@metastore/core";

export function encodeRevisionRecord(revision: Revision): string {
  return JSON.stringify(
    {
      packageId: revision.packageId,
      revisionId: revision.revisionId,
      parentRevisionId: revision.parentRevisionId,
      createdAt: revision.createdAt.toISOString(),
      message: revision.message,
      author: revision.author,
      content: revision.content,
    },
    null,
    2,
  );
}

export function encodeTagRecord(tag: Tag): string {
  return JSON.stringify(
    {
      packageId: tag.packageId,
      name: tag.name,
      revisionId: tag.revisionId,
      createdAt: tag.createdAt.toISOString(),
      description: tag.description,
      author: tag.author,
    },
    null,
    2,
  );
}

/**
 * @throws UnexpectedBackendError if the record is damaged
 */
export function decodeRevisionRecord(text: string, path: string): Revision {
  const record = parseRecord(text, path);
  const content = record.content;
  if (!isMetadataDocument(content)) {
    throw corrupt(path, "content is not a JSON object");
  }
  const revision: Revision = {
    packageId: requireString(record, "packageId", path),
    revisionId: requireString(record, "revisionId", path),
    content,
    createdAt: requireDate(record, "createdAt", path),
  };
  const parentRevisionId = optionalString(record, "parentRevisionId", path);
  const message = optionalString(record, "message", path);
  const author = optionalAuthor(record, path);
  if (parentRevisionId !== undefined) revision.parentRevisionId = parentRevisionId;
  if (message !== undefined) revision.message = message;
  if (author !== undefined) revision.author = author;
  return revision;
}

/**
 * @throws UnexpectedBackendError if the record is damaged
 */
export function decodeTagRecord(text: string, path: string): Tag {
  const record = parseRecord(text, path);
  const tag: Tag = {
    packageId: requireString(record, "packageId", path),
    name: requireString(record, "name", path),
    revisionId: requireString(record, "revisionId", path),
    createdAt: requireDate(record, "createdAt", path),
  };
  const description = optionalString(record, "description", path);
  const author = optionalAuthor(record, path);
  if (description !== undefined) tag.description = description;
  if (author !== undefined) tag.author = author;
  return tag;
}

function parseRecord(text: string, path: string): MetadataDocument {
  try {
    return decodeDocument(text);
  } catch (error) {
    throw corrupt(path, error instanceof Error ? error.message : String(error), error);
  }
}

function requireString(record: MetadataDocument, key: string, path: string): string {
  const value = record[key];
  if (typeof value !== "string" || value.length === 0) {
    throw corrupt(path, `missing ${key}`);
  }
  return value;
}

function optionalString(record: MetadataDocument, key: string, path: string): string | undefined {
  const value = record[key];
  if (value === undefined) return undefined;
  if (typeof value !== "string") {
    throw corrupt(path, `${key} is not a string`);
  }
  return value;
}

function requireDate(record: MetadataDocument, key: string, path: string): Date {
  const date = new Date(requireString(record, key, path));
  if (Number.isNaN(date.getTime())) {
    throw corrupt(path, `${key} is not a date`);
  }
  return date;
}

function optionalAuthor(record: MetadataDocument, path: string): Author | undefined {
  const value = record.author;
  if (value === undefined) return undefined;
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    throw corrupt(path, "author is not an object");
  }
  const author: Author = {};
  const name = optionalString(value, "name", path);
  const email = optionalString(value, "email", path);
  if (name !== undefined) author.name = name;
  if (email !== undefined) author.email = email;
  return author;
}

function corrupt(path: string, reason: string, cause?: unknown): UnexpectedBackendError {
  return new UnexpectedBackendError(`Damaged record ${path}: ${reason}`, { cause });
}
