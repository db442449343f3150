import type {
  BackendResponse,
  BackendStatus,
  BackendType,
  SearchFilters,
  SearchResult,
  SearchScope,
} from "../search/types.js";
import {
  AuthenticationError,
  BackendTimeoutError,
  ConfigurationError,
  HttpStatusError,
  errorMessage,
} from "../utils/errors.js";
import type { Logger } from "../utils/logger.js";
import { silentLogger } from "../utils/logger.js";
import { isAbortError } from "../utils/timeout.js";

// ── Types ────────────────────────────────────────────────────────────────────

export interface BackendSearchOptions {
  signal?: AbortSignal;
}

/** Contract every search backend implements. Adapters never throw for backend failures. */
export interface BackendAdapter {
  readonly backendType: BackendType;
  readonly status: BackendStatus;
  readonly lastError: string | null;
  /** True when the last failure was an authentication failure. */
  readonly authError: boolean;
  readonly initialized: boolean;

  /** Run the health check once, on first use. */
  ensureInitialized(): Promise<void>;
  /** Probe the backend and update `status`. Resolves false instead of throwing. */
  healthCheck(): Promise<boolean>;
  search(
    query: string,
    scope: SearchScope,
    target: string,
    filters: SearchFilters,
    limit: number,
    options?: BackendSearchOptions,
  ): Promise<BackendResponse>;
  /** Hit count without results. Only backends with a count mode implement it. */
  countResults?(
    query: string,
    scope: SearchScope,
    target: string,
    filters: SearchFilters,
    options?: BackendSearchOptions,
  ): Promise<number>;
}

// ── Base class ───────────────────────────────────────────────────────────────

/**
 * Lazy-initializing adapter base. Subclasses implement `healthCheck` and
 * `search`, recording outcomes through `markAvailable` / `markFailed`.
 * A failed search call only records `lastError`.
 */
export abstract class BaseBackend implements BackendAdapter {
  readonly backendType: BackendType;
  protected readonly logger: Logger;

  private currentStatus: BackendStatus = "unavailable";
  private lastFailure: string | null = null;
  private lastFailureWasAuth = false;
  private initPromise: Promise<void> | null = null;
  private initDone = false;

  protected constructor(backendType: BackendType, logger: Logger = silentLogger) {
    this.backendType = backendType;
    this.logger = logger;
  }

  get status(): BackendStatus {
    return this.currentStatus;
  }

  get lastError(): string | null {
    return this.lastFailure;
  }

  get authError(): boolean {
    return this.lastFailureWasAuth;
  }

  get initialized(): boolean {
    return this.initDone;
  }

  async ensureInitialized(): Promise<void> {
    if (!this.initPromise) {
      this.initPromise = this.healthCheck().then(() => {
        this.initDone = true;
      });
    }
    await this.initPromise;
  }

  abstract healthCheck(): Promise<boolean>;

  abstract search(
    query: string,
    scope: SearchScope,
    target: string,
    filters: SearchFilters,
    limit: number,
    options?: BackendSearchOptions,
  ): Promise<BackendResponse>;

  // ── Status bookkeeping ───────────────────────────────────────────────────

  protected markAvailable(): void {
    this.currentStatus = "available";
    this.lastFailure = null;
    this.lastFailureWasAuth = false;
  }

  protected markFailed(status: Exclude<BackendStatus, "available">, message: string, auth = false): void {
    this.currentStatus = status;
    this.lastFailure = message;
    this.lastFailureWasAuth = auth;
  }

  /**
   * Note a failed call without changing `status`. Only health checks and
   * authentication failures decide whether the backend can be selected.
   */
  protected recordCallFailure(message: string): void {
    this.lastFailure = message;
  }

  // ── Response helpers ─────────────────────────────────────────────────────

  protected elapsedSince(startedAt: number): number {
    return Math.round(performance.now() - startedAt);
  }

  protected successResponse(
    results: SearchResult[],
    startedAt: number,
    extra: Pick<BackendResponse, "total" | "excludedBuckets"> = {},
  ): BackendResponse {
    this.markAvailable();
    return {
      backendType: this.backendType,
      status: "available",
      results,
      queryTimeMs: this.elapsedSince(startedAt),
      ...extra,
    };
  }

  /** Response for a session that was never valid. */
  protected unauthenticatedResponse(startedAt: number): BackendResponse {
    const message = `${this.backendType} has no authenticated session`;
    this.markFailed("unavailable", message, true);
    return {
      backendType: this.backendType,
      status: "unavailable",
      results: [],
      queryTimeMs: this.elapsedSince(startedAt),
      errorMessage: message,
    };
  }

  /**
   * Convert a thrown error into a failed response. Configuration errors are
   * caller mistakes and are rethrown.
   */
  protected failureResponse(err: unknown, startedAt: number): BackendResponse {
    if (err instanceof ConfigurationError) throw err;

    const message = errorMessage(err);
    let status: Exclude<BackendStatus, "available">;
    let auth = false;

    if (
      err instanceof AuthenticationError ||
      (err instanceof HttpStatusError && err.status === 401)
    ) {
      status = "unavailable";
      auth = true;
    } else if (err instanceof BackendTimeoutError || isAbortError(err)) {
      status = "timeout";
    } else {
      status = "error";
    }

    if (auth) this.markFailed(status, message, auth);
    else this.recordCallFailure(message);
    this.logger.warn(`${this.backendType} search failed (${status}): ${message}`);
    return {
      backendType: this.backendType,
      status,
      results: [],
      queryTimeMs: this.elapsedSince(startedAt),
      errorMessage: message,
    };
  }
}
