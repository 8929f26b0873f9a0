import { InvalidArgumentError } from "@metastore/core";
import type { RepositoryRef } from "./repository-host.js";

/**
 * Map a package id to a repository: "owner/name", or "name" under the
 * default owner.
 *
 * @throws InvalidArgumentError for ids that name no repository
 */
export function parsePackageId(packageId: string, defaultOwner?: string): RepositoryRef {
  const slash = packageId.indexOf("/");
  if (slash < 0) {
    if (!defaultOwner) {
      throw new InvalidArgumentError(
        "packageId",
        packageId,
        `Invalid package ID for a repository backend without default owner: ${packageId}`,
      );
    }
    return { owner: defaultOwner, name: packageId };
  }
  const owner = packageId.substring(0, slash);
  const name = packageId.substring(slash + 1);
  if (owner.length === 0 || name.length === 0 || name.includes("/")) {
    throw new InvalidArgumentError("packageId", packageId, `Invalid package ID: ${packageId}`);
  }
  return { owner, name };
}
