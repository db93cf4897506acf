/**
 * Custom Application Errors
 * Domain-specific error classes for better error handling.
 */

/**
 * Base application error class.
 * All domain errors should extend this.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public isOperational: boolean = true,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Closed set of failure kinds a download can end with.
 * Callers branch on the kind instead of inspecting messages.
 */
export const DOWNLOAD_ERROR_KINDS = [
  "unresolvable_reference",
  "source_unavailable",
  "bot_detection",
  "no_matching_stream",
  "uniqueness_exhausted",
  "transient",
] as const;

export type DownloadErrorKind = (typeof DOWNLOAD_ERROR_KINDS)[number];

/** Only these kinds are worth another attempt within the same run. */
const RETRYABLE_KINDS: ReadonlySet<DownloadErrorKind> = new Set(["transient"]);

/**
 * Failure of the per-video pipeline.
 */
export class DownloadError extends AppError {
  constructor(
    public readonly kind: DownloadErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, true, options);
  }

  get retryable(): boolean {
    return RETRYABLE_KINDS.has(this.kind);
  }
}

/**
 * Invalid or missing configuration value.
 */
export class ConfigError extends AppError {
  constructor(
    message: string,
    public readonly field: string
  ) {
    super(message, false);
  }
}

export function isDownloadError(error: unknown): error is DownloadError {
  return error instanceof DownloadError;
}
