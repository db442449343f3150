// ── Error codes ──────────────────────────────────────────────────────────────

/** String constants for all catalog-search error codes. */
export const ErrorCode = {
  CONFIG_INVALID: "CONFIG_INVALID",
  NOT_AUTHENTICATED: "NOT_AUTHENTICATED",
  NOT_APPLICABLE: "NOT_APPLICABLE",
  BACKEND_TIMEOUT: "BACKEND_TIMEOUT",
  BACKEND_QUERY_FAILED: "BACKEND_QUERY_FAILED",
  PARTIAL_AUTHORIZATION: "PARTIAL_AUTHORIZATION",
  HTTP_FAILED: "HTTP_FAILED",
  SEARCH_FAILED: "SEARCH_FAILED",
} as const;

/** Union type of all error code string values. */
export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

/** Structured category attached to every user-visible search failure. */
export type ErrorCategory =
  | "authentication"
  | "not_applicable"
  | "configuration"
  | "timeout"
  | "backend_error";

// ── Base error ───────────────────────────────────────────────────────────────

/** Base error class for all catalog-search errors. Carries a typed `code` and optional `cause`. */
export class CatalogSearchError extends Error {
  readonly code: ErrorCodeValue;

  constructor(message: string, code: ErrorCodeValue, cause?: Error) {
    super(message, { cause });
    this.name = "CatalogSearchError";
    this.code = code;
  }
}

// ── Subclasses ───────────────────────────────────────────────────────────────

/** Invalid scope, backend, limit, filter or config value. Local; never retried. */
export class ConfigurationError extends CatalogSearchError {
  constructor(message: string, cause?: Error) {
    super(message, ErrorCode.CONFIG_INVALID, cause);
    this.name = "ConfigurationError";
  }
}

/** No valid session, or the backend rejected the credentials. */
export class AuthenticationError extends CatalogSearchError {
  constructor(message: string, cause?: Error) {
    super(message, ErrorCode.NOT_AUTHENTICATED, cause);
    this.name = "AuthenticationError";
  }
}

/** No capable backend is registered for the request. */
export class NotApplicableError extends CatalogSearchError {
  constructor(message: string, cause?: Error) {
    super(message, ErrorCode.NOT_APPLICABLE, cause);
    this.name = "NotApplicableError";
  }
}

export class BackendTimeoutError extends CatalogSearchError {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number, cause?: Error) {
    super(message, ErrorCode.BACKEND_TIMEOUT, cause);
    this.name = "BackendTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/** Malformed query or backend-side failure. The backend's message is kept verbatim. */
export class BackendQueryError extends CatalogSearchError {
  constructor(message: string, cause?: Error) {
    super(message, ErrorCode.BACKEND_QUERY_FAILED, cause);
    this.name = "BackendQueryError";
  }
}

/** A multi-index query touched at least one index the caller may not read. */
export class PartialAuthorizationError extends CatalogSearchError {
  readonly indexPattern: string;

  constructor(message: string, indexPattern: string, cause?: Error) {
    super(message, ErrorCode.PARTIAL_AUTHORIZATION, cause);
    this.name = "PartialAuthorizationError";
    this.indexPattern = indexPattern;
  }
}

/** Non-2xx HTTP response from a backend endpoint. */
export class HttpStatusError extends CatalogSearchError {
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string, url: string) {
    super(`HTTP ${status} from ${url}: ${body}`, ErrorCode.HTTP_FAILED);
    this.name = "HttpStatusError";
    this.status = status;
    this.body = body;
  }
}

// ── Categories ───────────────────────────────────────────────────────────────

/** Map an error to the category reported in `error_category`. */
export function errorCategoryOf(err: unknown): ErrorCategory {
  if (err instanceof AuthenticationError) return "authentication";
  if (err instanceof NotApplicableError) return "not_applicable";
  if (err instanceof ConfigurationError) return "configuration";
  if (err instanceof BackendTimeoutError) return "timeout";
  return "backend_error";
}

/** Best-effort message extraction for values thrown by third-party code. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
