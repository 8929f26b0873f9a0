/**
 * Identifier checks.
 *
 * Package and revision ids are opaque: the core only requires them to be
 * non-empty. Tag names end up as file names and ref names, so they are
 * restricted to a conservative character set.
 */

import { randomUUID } from "node:crypto";
import { InvalidArgumentError } from "../errors/index.js";

const TAG_NAME_RE = /^[\w\-+.]+$/;
const DOTS_ONLY_RE = /^\.+$/;

function requireNonEmpty(argumentName: string, value: unknown): string {
  if (typeof value !== "string" || value.length === 0) {
    throw new InvalidArgumentError(argumentName, value, `${argumentName} must be a non-empty string`);
  }
  return value;
}

export function validatePackageId(packageId: unknown): string {
  return requireNonEmpty("packageId", packageId);
}

export function validateRevisionId(revisionId: unknown): string {
  return requireNonEmpty("revisionId", revisionId);
}

export function isValidTagName(name: string): boolean {
  return TAG_NAME_RE.test(name) && !DOTS_ONLY_RE.test(name);
}

export function validateTagName(name: unknown, argumentName = "name"): string {
  const value = requireNonEmpty(argumentName, name);
  if (!isValidTagName(value)) {
    throw new InvalidArgumentError(argumentName, value, `Invalid tag name: ${JSON.stringify(value)}`);
  }
  return value;
}

/**
 * Random revision id: 32 lowercase hex characters.
 */
export function createRevisionId(): string {
  return randomUUID().replace(/-/g, "");
}
