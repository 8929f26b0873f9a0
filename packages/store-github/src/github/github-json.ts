/**
 * Readers for GitHub REST API payloads
 *
 * Responses are treated as untrusted JSON and narrowed field by field.
 */

import { type Author, UnexpectedBackendError } from "@metastore/core";
import type { CommitInfo, TagObject } from "../repository-host.js";

type JsonObject = { [key: string]: unknown };

export function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function malformed(what: string): UnexpectedBackendError {
  return new UnexpectedBackendError(`Malformed GitHub response: ${what}`);
}

export function readObject(value: unknown, what: string): JsonObject {
  if (!isObject(value)) {
    throw malformed(`${what} is not an object`);
  }
  return value;
}

export function readString(object: JsonObject, key: string): string {
  const value = object[key];
  if (typeof value !== "string") {
    throw malformed(`missing ${key}`);
  }
  return value;
}

export function readArray(value: unknown, what: string): unknown[] {
  if (!Array.isArray(value)) {
    throw malformed(`${what} is not an array`);
  }
  return value;
}

/**
 * Git signature: `{ name, email, date }`.
 */
function readSignature(value: unknown): { author?: Author; date: Date } {
  const signature = readObject(value, "signature");
  const date = new Date(readString(signature, "date"));
  if (Number.isNaN(date.getTime())) {
    throw malformed("invalid signature date");
  }
  const author: Author = {};
  if (typeof signature.name === "string") author.name = signature.name;
  if (typeof signature.email === "string") author.email = signature.email;
  return author.name !== undefined || author.email !== undefined ? { author, date } : { date };
}

function readParents(value: unknown): string[] {
  return readArray(value, "parents").map((parent) => readString(readObject(parent, "parent"), "sha"));
}

function trimMessage(message: string): string {
  return message.replace(/\n+$/, "");
}

/**
 * Git commit object, as returned by `GET|POST /repos/{owner}/{repo}/git/commits`.
 */
export function readGitCommit(value: unknown): CommitInfo & { treeSha: string } {
  const commit = readObject(value, "commit");
  const { author, date } = readSignature(commit.author);
  const result: CommitInfo & { treeSha: string } = {
    sha: readString(commit, "sha"),
    message: trimMessage(readString(commit, "message")),
    date,
    parents: readParents(commit.parents),
    treeSha: readString(readObject(commit.tree, "tree"), "sha"),
  };
  if (author) result.author = author;
  return result;
}

/**
 * Entry of `GET /repos/{owner}/{repo}/commits`.
 */
export function readListedCommit(value: unknown): CommitInfo {
  const entry = readObject(value, "commit entry");
  const commit = readObject(entry.commit, "commit");
  const { author, date } = readSignature(commit.author);
  const result: CommitInfo = {
    sha: readString(entry, "sha"),
    message: trimMessage(readString(commit, "message")),
    date,
    parents: readParents(entry.parents),
  };
  if (author) result.author = author;
  return result;
}

/**
 * Annotated tag object, as returned by `GET|POST /repos/{owner}/{repo}/git/tags`.
 */
export function readGitTag(value: unknown): TagObject {
  const tag = readObject(value, "tag");
  const { author, date } = readSignature(tag.tagger);
  const result: TagObject = {
    name: readString(tag, "tag"),
    commitSha: readString(readObject(tag.object, "tag object"), "sha"),
    message: trimMessage(readString(tag, "message")),
    date,
  };
  if (author) result.tagger = author;
  return result;
}

/**
 * Git reference: `{ ref, object: { sha, type } }`.
 */
export function readGitRef(value: unknown): { ref: string; sha: string; type: string } {
  const ref = readObject(value, "ref");
  const object = readObject(ref.object, "ref object");
  return { ref: readString(ref, "ref"), sha: readString(object, "sha"), type: readString(object, "type") };
}

/**
 * Human-readable error text of a GitHub error payload:
 * `{ message, errors: [{ message } | { code }] }`.
 */
export function readErrorMessage(value: unknown): string {
  if (!isObject(value)) {
    return "";
  }
  const parts: string[] = [];
  if (typeof value.message === "string") parts.push(value.message);
  if (Array.isArray(value.errors)) {
    for (const error of value.errors) {
      if (typeof error === "string") {
        parts.push(error);
      } else if (isObject(error)) {
        if (typeof error.message === "string") parts.push(error.message);
        else if (typeof error.code === "string") parts.push(error.code);
      }
    }
  }
  return parts.join(": ");
}
