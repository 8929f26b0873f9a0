/**
 * Base error for every failure raised by metadata storage.
 *
 * Each subclass carries a `kind` discriminant so callers can branch
 * without `instanceof` chains when errors cross package boundaries.
 */

export type MetastoreErrorKind =
  | "not-found"
  | "already-exists"
  | "conflict"
  | "backend-unavailable"
  | "invalid-argument"
  | "unexpected";

/**
 * Context attached to an error once it passes through the facade.
 */
export interface MetastoreErrorContext {
  /** Facade operation that failed (e.g. "update", "tagCreate") */
  operation?: string;
  /** Package the operation targeted */
  packageId?: string;
}

export interface MetastoreErrorOptions extends ErrorOptions {
  packageId?: string;
}

export abstract class MetastoreError extends Error {
  abstract readonly kind: MetastoreErrorKind;

  packageId?: string;
  operation?: string;

  constructor(message: string, options?: MetastoreErrorOptions) {
    super(message, options);
    this.name = "MetastoreError";
    this.packageId = options?.packageId;
  }

  /**
   * Fill in missing context. Values already set by the adapter win.
   */
  withContext(context: MetastoreErrorContext): this {
    this.operation ??= context.operation;
    this.packageId ??= context.packageId;
    return this;
  }
}

/**
 * Check whether a value is a metastore error, optionally of a given kind.
 */
export function isMetastoreError(error: unknown, kind?: MetastoreErrorKind): error is MetastoreError {
  if (!(error instanceof MetastoreError)) {
    return false;
  }
  return kind === undefined || error.kind === kind;
}
