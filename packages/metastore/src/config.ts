/**
 * Readers for the structured values of backend configurations
 */

import { type Author, type BackendConfig, InvalidArgumentError } from "@metastore/core";
import type { FilesApi } from "@statewalker/webrun-files";

const FILES_API_METHODS = ["read", "write", "mkdir", "remove", "stats", "list", "exists", "move", "copy"] as const;

function isFilesApi(value: unknown): value is FilesApi {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  return FILES_API_METHODS.every((method) => typeof Reflect.get(value, method) === "function");
}

/**
 * Read an optional FilesApi instance.
 */
export function readConfigFilesApi(config: BackendConfig, key: string): FilesApi | undefined {
  const value = config[key];
  if (value === undefined) return undefined;
  if (!isFilesApi(value)) {
    throw new InvalidArgumentError(key, value, `Config option ${key} must be a FilesApi`);
  }
  return value;
}

/**
 * Read an optional `{ name?, email? }` author.
 */
export function readConfigAuthor(config: BackendConfig, key: string): Author | undefined {
  const value = config[key];
  if (value === undefined) return undefined;
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new InvalidArgumentError(key, value, `Config option ${key} must be an object with name and email`);
  }
  const author: Author = {};
  for (const field of ["name", "email"] as const) {
    const entry: unknown = Reflect.get(value, field);
    if (entry === undefined) continue;
    if (typeof entry !== "string") {
      throw new InvalidArgumentError(key, value, `Config option ${key}.${field} must be a string`);
    }
    author[field] = entry;
  }
  return author;
}
