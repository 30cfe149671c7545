/**
 * Error types raised by the scraper pipeline.
 *
 * Each class carries a stable `code` so callers can branch on the failure kind
 * without matching message text.
 */

export type FetchFailureKind =
  | "client_error"
  | "server_error"
  | "rate_limited"
  | "timeout"
  | "network_error"
  | "invalid_body";

export class ScraperError extends Error {
  public readonly code: string;
  public readonly details?: unknown;

  constructor(message: string, code: string, details?: unknown) {
    super(message);
    this.name = "ScraperError";
    this.code = code;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * The links file is missing, unreadable or not a JSON object. Fatal: nothing
 * has been processed yet.
 */
export class LoadError extends ScraperError {
  constructor(message: string, details?: unknown) {
    super(`Load failed: ${message}`, "LOAD_FAILED", details);
    this.name = "LoadError";
  }
}

export interface FetchErrorDetails {
  url: string;
  kind: FetchFailureKind;
  attempts: number;
  httpStatus?: number;
  cause?: unknown;
}

/**
 * Every attempt of a request failed.
 *
 * @example
 * ```typescript
 * throw new FetchError({ url, kind: "server_error", attempts: 3, httpStatus: 500 });
 * // Error: Fetch failed: HTTP 500 for https://... after 3 attempt(s)
 * ```
 */
export class FetchError extends ScraperError {
  public readonly url: string;
  public readonly kind: FetchFailureKind;
  public readonly attempts: number;
  public readonly httpStatus?: number;

  constructor(details: FetchErrorDetails) {
    const reason = details.httpStatus !== undefined ? `HTTP ${details.httpStatus}` : details.kind.replace("_", " ");
    super(`Fetch failed: ${reason} for ${details.url} after ${details.attempts} attempt(s)`, "FETCH_FAILED", details);
    this.name = "FetchError";
    this.url = details.url;
    this.kind = details.kind;
    this.attempts = details.attempts;
    this.httpStatus = details.httpStatus;
  }
}

/** One link could not be turned into a record. The batch moves on. */
export class ResolutionError extends ScraperError {
  constructor(message: string, details?: unknown) {
    super(`Resolution failed: ${message}`, "RESOLUTION_FAILED", details);
    this.name = "ResolutionError";
  }
}

export class ThumbnailError extends ScraperError {
  constructor(message: string, details?: unknown) {
    super(`Thumbnail failed: ${message}`, "THUMBNAIL_FAILED", details);
    this.name = "ThumbnailError";
  }
}

export class PersistenceError extends ScraperError {
  constructor(message: string, details?: unknown) {
    super(`Persistence failed: ${message}`, "PERSISTENCE_FAILED", details);
    this.name = "PersistenceError";
  }
}

export class RegistryValidationError extends ScraperError {
  public readonly problems: string[];

  constructor(file: string, problems: string[]) {
    super(`Registry ${file} is invalid (${problems.length} problem(s))`, "REGISTRY_INVALID", { file, problems });
    this.name = "RegistryValidationError";
    this.problems = problems;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
