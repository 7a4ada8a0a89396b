export class SyncError extends Error {
  constructor(
    message: string,
    public readonly retryable: boolean,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = "SyncError";
  }
}

/** Failure talking to the remote store. Auth failures are not retryable. */
export class NetworkError extends SyncError {
  constructor(message: string, cause?: Error, retryable = true) {
    super(message, retryable, cause);
    this.name = "NetworkError";
  }
}

export class LocalWriteError extends SyncError {
  constructor(
    message: string,
    public readonly path: string,
    cause?: Error,
  ) {
    super(message, false, cause);
    this.name = "LocalWriteError";
  }
}

export class MetadataCodecError extends SyncError {
  constructor(message: string, cause?: Error) {
    super(message, false, cause);
    this.name = "MetadataCodecError";
  }
}

export class ContentTooLargeError extends SyncError {
  constructor(
    public readonly key: string,
    public readonly limit: number,
  ) {
    super(`Object ${key} exceeds ${limit} bytes`, false);
    this.name = "ContentTooLargeError";
  }
}

export class DuplicateResourceNameError extends SyncError {
  constructor(public readonly fileName: string) {
    super(`Duplicate resource name in group: ${fileName}`, false);
    this.name = "DuplicateResourceNameError";
  }
}

export class InvalidResourceNameError extends SyncError {
  constructor(public readonly fileName: string) {
    super(`Invalid resource name: ${JSON.stringify(fileName)}`, false);
    this.name = "InvalidResourceNameError";
  }
}

export class MissingRemoteResourceError extends SyncError {
  constructor(public readonly fileNames: string[]) {
    super(`No remote object for: ${fileNames.join(", ")}`, false);
    this.name = "MissingRemoteResourceError";
  }
}

export interface SyncReport {
  group: string;
  fetched: string[];
  reused: string[];
  skipped: string[];
  failed: string[];
}

/**
 * Raised at the end of a pass in which some resources failed.
 * Resources that succeeded in the same pass are already persisted.
 */
export class SyncPassError extends AggregateError {
  constructor(
    errors: Error[],
    public readonly report: SyncReport,
  ) {
    super(
      errors,
      `Failed to sync ${report.failed.length} resource(s) in ${report.group}: ${report.failed.join(", ")}`,
    );
    this.name = "SyncPassError";
  }
}

export class NotCachedError extends Error {
  constructor(public readonly fileName: string) {
    super(`Resource not cached: ${fileName}`);
    this.name = "NotCachedError";
  }
}

export class DecodeError extends Error {
  constructor(
    public readonly fileName: string,
    public readonly cause?: Error,
  ) {
    super(`Failed to decode ${fileName}: ${cause?.message ?? "unknown error"}`);
    this.name = "DecodeError";
  }
}

export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
}

export const RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
};

/**
 * A retryable SyncError, or an aggregate made only of such errors, as thrown
 * by a pass whose downloads all failed for transient reasons.
 */
export function isRetryable(err: unknown): boolean {
  if (err instanceof SyncError) return err.retryable;
  if (err instanceof AggregateError) {
    return err.errors.length > 0 && err.errors.every(isRetryable);
  }
  return false;
}

/** Retries retryable errors only; anything else is rethrown immediately. */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: RetryConfig = RETRY_CONFIG,
): Promise<T> {
  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (!isRetryable(err)) throw err;
      if (attempt === config.maxAttempts) throw err;

      const delay = Math.min(
        config.baseDelayMs *
          Math.pow(config.backoffMultiplier, attempt - 1),
        config.maxDelayMs,
      );
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }
  throw new Error("Unreachable");
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
