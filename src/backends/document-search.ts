import type { BackendSearchOptions } from "./base.js";
import { BaseBackend } from "./base.js";
import {
  PACKAGE_INDEX_SUFFIX,
  assertSearchScope,
  buildIndexPatternForScope,
  normalizeBucketList,
} from "./index-pattern.js";
import type { NarrowingState } from "./narrowing.js";
import {
  DEFAULT_MAX_NARROWING_RETRIES,
  droppedBuckets,
  initialNarrowingState,
  narrow,
} from "./narrowing.js";
import type { DocumentQuery } from "./query-dsl.js";
import { buildDocumentQuery } from "./query-dsl.js";
import { DEFAULT_MANIFEST_PREFIX, normalizeHits } from "./scope-handlers.js";
import { postJson } from "../clients/http.js";
import type { BackendResponse, SearchFilters, SearchScope } from "../search/types.js";
import type { SessionProvider } from "../session/session.js";
import {
  AuthenticationError,
  BackendQueryError,
  ConfigurationError,
  HttpStatusError,
  PartialAuthorizationError,
  errorMessage,
} from "../utils/errors.js";
import { isRecord, readRecord, readString, readArray, readNumber } from "../utils/guards.js";
import type { Logger } from "../utils/logger.js";
import { TtlCache } from "../utils/ttl-cache.js";

// ── Types ────────────────────────────────────────────────────────────────────

export interface DocumentSearchBackendOptions {
  session: SessionProvider;
  /** Catalog search endpoint accepting `{ query, index, limit }`. */
  endpoint: string;
  bucketCache?: TtlCache<string[]>;
  packageIndexSuffix?: string;
  manifestPrefix?: string;
  maxNarrowingRetries?: number;
  logger?: Logger;
}

export interface DocumentSearchRequest {
  query: DocumentQuery;
  index: string;
  limit: number;
}

export interface ParsedHits {
  hits: unknown[];
  total: number | undefined;
}

interface ExecutionOutcome extends ParsedHits {
  excludedBuckets: readonly string[];
}

const BUCKET_CACHE_KEY = "document_search:buckets";
const DEFAULT_BUCKET_TTL_MS = 5 * 60 * 1000;

// ── Response parsing ─────────────────────────────────────────────────────────

/** Read `hits.hits` and `hits.total` (a number or `{ value }`). */
export function parseSearchResponse(payload: unknown): ParsedHits {
  if (!isRecord(payload)) {
    throw new BackendQueryError("Search response was not a JSON object");
  }

  const error = payload["error"];
  if (error !== undefined && error !== null) {
    const reason = isRecord(error)
      ? readString(error, "reason") ?? readString(error, "type") ?? JSON.stringify(error)
      : String(error);
    throw new BackendQueryError(reason);
  }

  const hits = readRecord(payload, "hits");
  const list = hits ? readArray(hits, "hits") : null;
  if (!hits || !list) {
    throw new BackendQueryError("Search response has no hits");
  }

  const totalField = hits["total"];
  const total =
    typeof totalField === "number"
      ? totalField
      : isRecord(totalField)
        ? readNumber(totalField, "value") ?? undefined
        : undefined;

  return { hits: list, total };
}

// ── Backend ──────────────────────────────────────────────────────────────────

/**
 * Full-text backend over per-bucket document indexes. Queries are built as
 * a boolean DSL; authorization gaps on multi-bucket patterns are narrowed.
 */
export class DocumentSearchBackend extends BaseBackend {
  private readonly session: SessionProvider;
  private readonly endpoint: string;
  private readonly bucketCache: TtlCache<string[]>;
  private readonly suffix: string;
  private readonly manifestPrefix: string;
  private readonly maxNarrowingRetries: number;

  constructor(options: DocumentSearchBackendOptions) {
    super("document_search", options.logger);
    this.session = options.session;
    this.endpoint = options.endpoint;
    this.bucketCache = options.bucketCache ?? new TtlCache({ ttlMs: DEFAULT_BUCKET_TTL_MS });
    this.suffix = options.packageIndexSuffix ?? PACKAGE_INDEX_SUFFIX;
    this.manifestPrefix = options.manifestPrefix ?? DEFAULT_MANIFEST_PREFIX;
    this.maxNarrowingRetries = options.maxNarrowingRetries ?? DEFAULT_MAX_NARROWING_RETRIES;
  }

  async healthCheck(): Promise<boolean> {
    if (!this.session.isAvailable()) {
      this.markFailed("unavailable", "No authenticated session", true);
      return false;
    }
    try {
      const buckets = await this.listBuckets();
      this.markAvailable();
      this.logger.debug(`document_search ready with ${buckets.length} bucket(s)`);
      return true;
    } catch (err) {
      const auth = err instanceof AuthenticationError;
      this.markFailed(auth ? "unavailable" : "error", errorMessage(err), auth);
      return false;
    }
  }

  /** Accessible buckets, cached for the configured TTL. */
  async listBuckets(options: { forceRefresh?: boolean } = {}): Promise<string[]> {
    const buckets = await this.bucketCache.getOrLoad(
      BUCKET_CACHE_KEY,
      () => this.session.listAccessibleBuckets(),
      options,
    );
    return normalizeBucketList(buckets);
  }

  async search(
    query: string,
    scope: SearchScope,
    target: string,
    filters: SearchFilters,
    limit: number,
    options: BackendSearchOptions = {},
  ): Promise<BackendResponse> {
    const startedAt = performance.now();
    assertSearchScope(scope);
    await this.ensureInitialized();
    if (!this.session.isAvailable()) return this.unauthenticatedResponse(startedAt);

    try {
      const buckets = await this.resolveBuckets(target, filters);
      if (buckets.length === 0) {
        this.logger.debug("No buckets to search");
        return this.successResponse([], startedAt, { total: 0 });
      }

      const outcome = await this.execute(scope, buckets, buildDocumentQuery(query, filters), limit, options.signal);
      const results = normalizeHits(outcome.hits, scope, {
        packageIndexSuffix: this.suffix,
        manifestPrefix: this.manifestPrefix,
        logger: this.logger,
      });

      return this.successResponse(results, startedAt, {
        total: outcome.total,
        ...(outcome.excludedBuckets.length > 0 ? { excludedBuckets: outcome.excludedBuckets } : {}),
      });
    } catch (err) {
      return this.failureResponse(err, startedAt);
    }
  }

  /** Hit count only (`limit: 0`). Errors propagate. */
  async countResults(
    query: string,
    scope: SearchScope,
    target: string,
    filters: SearchFilters,
    options: BackendSearchOptions = {},
  ): Promise<number> {
    assertSearchScope(scope);
    await this.ensureInitialized();
    if (!this.session.isAvailable()) {
      throw new AuthenticationError("document_search has no authenticated session");
    }
    const buckets = await this.resolveBuckets(target, filters);
    if (buckets.length === 0) return 0;

    const outcome = await this.execute(scope, buckets, buildDocumentQuery(query, filters), 0, options.signal);
    return outcome.total ?? outcome.hits.length;
  }

  // ── Internals ────────────────────────────────────────────────────────────

  /** Target bucket, else caller bucket filters, else every accessible bucket. */
  private async resolveBuckets(target: string, filters: SearchFilters): Promise<string[]> {
    if (target.trim()) return normalizeBucketList([target]);

    const requested =
      filters.buckets ?? (filters.bucket === undefined ? undefined : [filters.bucket].flat());
    if (requested !== undefined) return normalizeBucketList(requested);

    return this.listBuckets();
  }

  private async execute(
    scope: SearchScope,
    buckets: readonly string[],
    query: DocumentQuery,
    limit: number,
    signal: AbortSignal | undefined,
  ): Promise<ExecutionOutcome> {
    let state: NarrowingState = initialNarrowingState(buckets);

    for (;;) {
      const index = buildIndexPatternForScope(scope, state.buckets, this.suffix);
      try {
        const payload = await this.post({ query, index, limit }, signal);
        return { ...parseSearchResponse(payload), excludedBuckets: droppedBuckets(state) };
      } catch (err) {
        const failure = this.asPartialAuthorization(err, index);
        if (!failure) throw err;

        state = narrow(state, failure, this.maxNarrowingRetries, this.suffix);
        if (state.kind === "failed") throw new BackendQueryError(state.reason, failure);
        this.logger.warn(
          `Access denied on part of "${index}"; retrying without bucket "${state.dropped[state.dropped.length - 1]}"`,
        );
      }
    }
  }

  private asPartialAuthorization(err: unknown, index: string): PartialAuthorizationError | null {
    if (!(err instanceof HttpStatusError) || err.status !== 403) return null;
    if (!index.includes(",")) return null;
    return new PartialAuthorizationError(
      `Access denied for index pattern "${index}": ${err.body}`,
      index,
      err,
    );
  }

  private async post(request: DocumentSearchRequest, signal: AbortSignal | undefined): Promise<unknown> {
    if (!this.endpoint) throw new ConfigurationError("document_search endpoint is not configured");
    try {
      return await postJson(this.endpoint, request, {
        headers: this.session.getAuthHeaders(),
        signal,
      });
    } catch (err) {
      if (err instanceof HttpStatusError && err.status === 401) {
        throw new AuthenticationError("Search endpoint rejected the session", err);
      }
      throw err;
    }
  }
}
