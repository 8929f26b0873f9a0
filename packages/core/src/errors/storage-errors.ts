import { MetastoreError, type MetastoreErrorOptions } from "./metastore-error.js";

/**
 * Referenced package, revision or tag does not exist.
 */
export class NotFoundError extends MetastoreError {
  readonly kind = "not-found" as const;

  constructor(message: string, options?: MetastoreErrorOptions) {
    super(message, options);
    this.name = "NotFoundError";
  }
}

/**
 * A package or tag with the same identifier already exists.
 */
export class AlreadyExistsError extends MetastoreError {
  readonly kind = "already-exists" as const;

  constructor(message: string, options?: MetastoreErrorOptions) {
    super(message, options);
    this.name = "AlreadyExistsError";
  }
}

export interface ConflictErrorOptions extends MetastoreErrorOptions {
  /** Revision the caller expected to be the head */
  expectedRevisionId?: string;
}

/**
 * The supplied base revision is no longer the head of the package.
 *
 * Carries the actual head so the caller can re-fetch and retry
 * without another round trip.
 */
export class ConflictError extends MetastoreError {
  readonly kind = "conflict" as const;
  readonly currentRevisionId: string | undefined;
  readonly expectedRevisionId: string | undefined;

  constructor(currentRevisionId: string | undefined, options?: ConflictErrorOptions & { message?: string }) {
    super(
      options?.message ??
        `Expected head ${options?.expectedRevisionId ?? "(none)"}, found ${currentRevisionId ?? "nothing"}`,
      options,
    );
    this.name = "ConflictError";
    this.currentRevisionId = currentRevisionId;
    this.expectedRevisionId = options?.expectedRevisionId;
  }
}

export interface BackendUnavailableErrorOptions extends MetastoreErrorOptions {
  /** Transport status code, when the medium reported one */
  status?: number;
}

/**
 * The storage medium could not complete the operation.
 *
 * Never retried by the core: only the caller knows whether the
 * side effect may have landed.
 */
export class BackendUnavailableError extends MetastoreError {
  readonly kind = "backend-unavailable" as const;
  readonly status: number | undefined;

  constructor(message: string, options?: BackendUnavailableErrorOptions) {
    super(message, options);
    this.name = "BackendUnavailableError";
    this.status = options?.status;
  }
}

/**
 * Malformed identifier, content or option.
 */
export class InvalidArgumentError extends MetastoreError {
  readonly kind = "invalid-argument" as const;
  readonly argumentName: string;
  readonly value: unknown;

  constructor(argumentName: string, value: unknown, message?: string, options?: MetastoreErrorOptions) {
    super(message ?? `Invalid value for ${argumentName}: ${String(value)}`, options);
    this.name = "InvalidArgumentError";
    this.argumentName = argumentName;
    this.value = value;
  }
}

/**
 * Anything an adapter raised that is not part of the taxonomy.
 * The original failure is kept as `cause`.
 */
export class UnexpectedBackendError extends MetastoreError {
  readonly kind = "unexpected" as const;

  constructor(message: string, options?: MetastoreErrorOptions) {
    super(message, options);
    this.name = "UnexpectedBackendError";
  }
}
