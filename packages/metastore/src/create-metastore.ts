import {
  type Author,
  type BackendConfig,
  type BackendRegistry,
  Metastore,
  type MetastoreLogger,
} from "@metastore/core";
import { createDefaultRegistry } from "./default-registry.js";

export interface CreateMetastoreOptions {
  /** Registry to look the type up in; defaults to {@link createDefaultRegistry} */
  registry?: BackendRegistry;
  logger?: MetastoreLogger;
  /** Re-point existing tags on tagCreate instead of failing */
  overwriteTags?: boolean;
  defaultAuthor?: Author;
}

/**
 * Build a metastore over a backend chosen by type name.
 *
 * @example
 * ```typescript
 * const metastore = await createMetastore("filesystem", { rootDir: "./data" });
 * const revision = await metastore.create("pkg-a", { name: "mypackage" });
 * ```
 *
 * @throws InvalidArgumentError for an unknown type or a malformed config
 */
export async function createMetastore(
  type: string,
  config: BackendConfig = {},
  options: CreateMetastoreOptions = {},
): Promise<Metastore> {
  const registry = options.registry ?? createDefaultRegistry();
  const storage = await registry.create(type, config, { logger: options.logger });
  return new Metastore({
    storage,
    logger: options.logger,
    overwriteTags: options.overwriteTags,
    defaultAuthor: options.defaultAuthor,
  });
}
