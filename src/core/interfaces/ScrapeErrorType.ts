/**
 * Scrape error taxonomy
 *
 * - Per-task kinds (fetch, extraction, cancellation, unknown) end up as
 *   failure outcomes and never abort a run
 * - Sink kinds are reported in the SinkReport
 * - Startup, busy, config and consistency errors propagate to the caller
 */

/**
 * Error kinds
 */
export enum ScrapeErrorType {
  /** Navigation exceeded the per-fetch timeout */
  TIMEOUT = "TIMEOUT",

  /** Definitive page load failure (HTTP >= 400, DNS, not-found page) */
  NAVIGATION_FAILED = "NAVIGATION_FAILED",

  /** Browser session died or the page crashed */
  BROWSER_CRASHED = "BROWSER_CRASHED",

  /** Page has no recognizable product content root */
  MALFORMED_PAGE = "MALFORMED_PAGE",

  /** Run deadline expired or the run was stopped */
  CANCELLED = "CANCELLED",

  /** Unexpected fault while processing a task */
  UNKNOWN_ERROR = "UNKNOWN_ERROR",

  /** Output JSON could not be written */
  WRITE_FAILED = "WRITE_FAILED",

  /** Downstream API did not accept the submission */
  API_REJECTED = "API_REJECTED",
}

/**
 * Kinds a task failure outcome can carry
 */
export type TaskErrorKind =
  | ScrapeErrorType.TIMEOUT
  | ScrapeErrorType.NAVIGATION_FAILED
  | ScrapeErrorType.BROWSER_CRASHED
  | ScrapeErrorType.MALFORMED_PAGE
  | ScrapeErrorType.CANCELLED
  | ScrapeErrorType.UNKNOWN_ERROR;

export type FetchErrorType =
  | ScrapeErrorType.TIMEOUT
  | ScrapeErrorType.NAVIGATION_FAILED
  | ScrapeErrorType.BROWSER_CRASHED;

export type SinkErrorType =
  | ScrapeErrorType.WRITE_FAILED
  | ScrapeErrorType.API_REJECTED;

interface ScrapeErrorOptions {
  url?: string;
  retryable?: boolean;
  cause?: unknown;
}

/**
 * Base class of all typed pipeline errors
 */
export class ScrapeError extends Error {
  public readonly type: ScrapeErrorType;
  public readonly url?: string;
  public readonly retryable: boolean;
  public readonly errorCause?: unknown;

  constructor(
    type: ScrapeErrorType,
    message: string,
    options: ScrapeErrorOptions = {},
  ) {
    super(message);
    this.name = "ScrapeError";
    this.type = type;
    this.url = options.url;
    this.retryable = options.retryable ?? false;
    this.errorCause = options.cause;
  }

  /**
   * Plain object for structured logging
   */
  toLogObject(): Record<string, unknown> {
    return {
      errorType: this.type,
      message: this.message,
      url: this.url,
      retryable: this.retryable,
    };
  }
}

/**
 * Page load failure. TIMEOUT and BROWSER_CRASHED are retryable.
 */
export class FetchError extends ScrapeError {
  declare readonly type: FetchErrorType;

  constructor(
    type: FetchErrorType,
    message: string,
    options: Omit<ScrapeErrorOptions, "retryable"> = {},
  ) {
    super(type, message, {
      ...options,
      retryable: type !== ScrapeErrorType.NAVIGATION_FAILED,
    });
    this.name = "FetchError";
  }
}

export class ExtractionError extends ScrapeError {
  constructor(message: string, options: Omit<ScrapeErrorOptions, "retryable"> = {}) {
    super(ScrapeErrorType.MALFORMED_PAGE, message, options);
    this.name = "ExtractionError";
  }
}

export class CancelledError extends ScrapeError {
  constructor(message = "Cancelled", options: Omit<ScrapeErrorOptions, "retryable"> = {}) {
    super(ScrapeErrorType.CANCELLED, message, options);
    this.name = "CancelledError";
  }
}

export class SinkError extends ScrapeError {
  declare readonly type: SinkErrorType;
  public readonly statusCode?: number;

  constructor(
    type: SinkErrorType,
    message: string,
    options: Omit<ScrapeErrorOptions, "retryable"> & { statusCode?: number } = {},
  ) {
    super(type, message, options);
    this.name = "SinkError";
    this.statusCode = options.statusCode;
  }

  override toLogObject(): Record<string, unknown> {
    return { ...super.toLogObject(), statusCode: this.statusCode };
  }
}

/**
 * Fatal condition detected before any task ran
 */
export class PipelineStartupError extends Error {
  constructor(
    message: string,
    public readonly errorCause?: unknown,
  ) {
    super(message);
    this.name = "PipelineStartupError";
  }
}

/**
 * A run is already in progress on this controller
 */
export class PipelineBusyError extends Error {
  constructor(message = "A pipeline run is already in progress") {
    super(message);
    this.name = "PipelineBusyError";
  }
}

/**
 * Internal bookkeeping violation (duplicate or missing outcome)
 */
export class AggregatorConsistencyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AggregatorConsistencyError";
  }
}

/**
 * Invalid configuration
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigError";
  }
}

/**
 * Maps any thrown value to the kind recorded on a failure outcome
 */
export function toTaskErrorKind(error: unknown): TaskErrorKind {
  if (error instanceof ScrapeError) {
    switch (error.type) {
      case ScrapeErrorType.TIMEOUT:
      case ScrapeErrorType.NAVIGATION_FAILED:
      case ScrapeErrorType.BROWSER_CRASHED:
      case ScrapeErrorType.MALFORMED_PAGE:
      case ScrapeErrorType.CANCELLED:
        return error.type;
      default:
        return ScrapeErrorType.UNKNOWN_ERROR;
    }
  }
  return ScrapeErrorType.UNKNOWN_ERROR;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
