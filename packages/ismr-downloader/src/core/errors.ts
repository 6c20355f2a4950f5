/**
 * ISMR Downloader Error Types
 *
 * Custom error classes for the download engine. Each carries a stable `code`
 * so the CLI can map failures to exit codes without string matching.
 *
 * RUN-LEVEL:
 * - InvalidRangeError: bad request spec, thrown before any chunk exists
 * - AuthError: authentication exchange failed, halts the run
 * - ConfigError: configuration could not be loaded or validated
 *
 * CHUNK-LEVEL:
 * - UnexpectedResponseError: data endpoint answered with an unknown shape
 * - ArtifactWriteError: artifact could not be persisted
 */

export type ErrorCode =
  | 'INVALID_RANGE'
  | 'AUTH_FAILED'
  | 'CONFIG_INVALID'
  | 'UNEXPECTED_RESPONSE'
  | 'ARTIFACT_WRITE_FAILED';

/**
 * Base class for all downloader errors
 */
export class IsmrDownloaderError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    options?: { readonly cause?: unknown }
  ) {
    super(message, options);
    this.name = 'IsmrDownloaderError';

    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Error thrown for empty, inverted or unparseable time ranges
 */
export class InvalidRangeError extends IsmrDownloaderError {
  constructor(message: string) {
    super(message, 'INVALID_RANGE');
    this.name = 'InvalidRangeError';
  }
}

/**
 * Error thrown when the email/password exchange fails
 *
 * Covers bad credentials (non-2xx), transport failures and malformed token
 * responses. Always fatal for the run.
 */
export class AuthError extends IsmrDownloaderError {
  constructor(
    message: string,
    public readonly status?: number,
    options?: { readonly cause?: unknown }
  ) {
    super(message, 'AUTH_FAILED', options);
    this.name = 'AuthError';
  }
}

/**
 * Error thrown when merged configuration fails validation
 */
export class ConfigError extends IsmrDownloaderError {
  constructor(
    message: string,
    public readonly issues: readonly string[] = []
  ) {
    super(message, 'CONFIG_INVALID');
    this.name = 'ConfigError';
  }

  /**
   * Get formatted list of validation issues
   */
  getSummary(): string {
    if (this.issues.length === 0) {
      return this.message;
    }

    return [this.message, ...this.issues.map((issue) => `  - ${issue}`)].join('\n');
  }
}

/**
 * Error thrown when the data endpoint returns a body we cannot interpret
 */
export class UnexpectedResponseError extends IsmrDownloaderError {
  constructor(
    message: string,
    public readonly url: string
  ) {
    super(message, 'UNEXPECTED_RESPONSE');
    this.name = 'UnexpectedResponseError';
  }
}

/**
 * Error thrown when an artifact stream cannot be written to disk
 */
export class ArtifactWriteError extends IsmrDownloaderError {
  constructor(
    message: string,
    public readonly path: string,
    options?: { readonly cause?: unknown }
  ) {
    super(message, 'ARTIFACT_WRITE_FAILED', options);
    this.name = 'ArtifactWriteError';
  }
}

/**
 * Render any thrown value as a log-friendly message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
