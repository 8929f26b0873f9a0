/**
 * Backend registry
 *
 * Maps a backend type name to a factory that builds the matching
 * MetadataStorage from an opaque configuration mapping. The keys a
 * configuration may carry are entirely up to each factory.
 *
 * Registries are plain instances: two registries (or two storages built
 * from one registry) never share state.
 */

import type { MetastoreLogger } from "../common/logger.js";
import { InvalidArgumentError } from "../errors/index.js";
import type { MetadataStorage } from "../storage/metadata-storage.js";

/**
 * Opaque, backend-specific configuration.
 */
export type BackendConfig = Readonly<Record<string, unknown>>;

/**
 * Services handed to every factory alongside its configuration.
 */
export interface BackendFactoryContext {
  logger?: MetastoreLogger;
}

export type BackendFactory = (
  config: BackendConfig,
  context: BackendFactoryContext,
) => MetadataStorage | Promise<MetadataStorage>;

export class BackendRegistry {
  private readonly factories = new Map<string, BackendFactory>();

  /**
   * Register (or replace) the factory for a backend type.
   *
   * @example
   * ```typescript
   * registry.register("memory", () => new MemoryMetadataStorage());
   * ```
   */
  register(type: string, factory: BackendFactory): this {
    if (type.length === 0) {
      throw new InvalidArgumentError("type", type, "Backend type must be a non-empty string");
    }
    this.factories.set(type, factory);
    return this;
  }

  has(type: string): boolean {
    return this.factories.has(type);
  }

  types(): string[] {
    return [...this.factories.keys()];
  }

  /**
   * Build a storage adapter for the given type.
   *
   * @throws InvalidArgumentError if the type is not registered
   */
  async create(type: string, config: BackendConfig = {}, context: BackendFactoryContext = {}): Promise<MetadataStorage> {
    const factory = this.factories.get(type);
    if (!factory) {
      throw new InvalidArgumentError(
        "type",
        type,
        `Unknown backend type: ${type}. ` + `Available types: ${this.types().join(", ") || "(none registered)"}`,
      );
    }
    return factory(config, context);
  }
}

/**
 * Read an optional string key from a backend configuration.
 *
 * @throws InvalidArgumentError when the key holds a non-string value
 */
export function readConfigString(config: BackendConfig, key: string): string | undefined {
  const value = config[key];
  if (value === undefined) return undefined;
  if (typeof value !== "string" || value.length === 0) {
    throw new InvalidArgumentError(key, value, `Config option ${key} must be a non-empty string`);
  }
  return value;
}

/**
 * Read an optional positive number from a backend configuration.
 */
export function readConfigNumber(config: BackendConfig, key: string): number | undefined {
  const value = config[key];
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
    throw new InvalidArgumentError(key, value, `Config option ${key} must be a positive number`);
  }
  return value;
}
