/**
 * Location of package data inside the files tree:
 *
 * ```
 * <basePath>/p/<sha256(packageId)>/HEAD
 * <basePath>/p/<sha256(packageId)>/revisions/<revisionId>.json
 * <basePath>/p/<sha256(packageId)>/tags/<name>.json
 * ```
 *
 * Hashing keeps arbitrary package ids (slashes, unicode) out of paths.
 */

import { createHash } from "node:crypto";
import { joinPath } from "@statewalker/webrun-files";

export const HEAD_FILE = "HEAD";
export const REVISIONS_DIR = "revisions";
export const TAGS_DIR = "tags";
export const RECORD_EXT = ".json";

export class PackageLayout {
  readonly dir: string;

  constructor(basePath: string, packageId: string) {
    this.dir = joinPath(basePath, "p", hashPackageId(packageId));
  }

  get head(): string {
    return joinPath(this.dir, HEAD_FILE);
  }

  get tagsDir(): string {
    return joinPath(this.dir, TAGS_DIR);
  }

  revision(revisionId: string): string {
    return joinPath(this.dir, REVISIONS_DIR, `${revisionId}${RECORD_EXT}`);
  }

  tag(name: string): string {
    return joinPath(this.dir, TAGS_DIR, `${name}${RECORD_EXT}`);
  }
}

export function hashPackageId(packageId: string): string {
  return createHash("sha256").update(packageId, "utf8").digest("hex");
}
