import type { BackendSearchOptions } from "./base.js";
import { BaseBackend } from "./base.js";
import { assertSearchScope, normalizeBucketList } from "./index-pattern.js";
import { DEFAULT_MANIFEST_PREFIX, manifestLocation } from "./scope-handlers.js";
import type { GraphQLClient } from "../clients/graphql.js";
import type {
  AnalysisFilters,
  BackendResponse,
  SearchFilters,
  SearchResult,
  SearchScope,
} from "../search/types.js";
import type { SessionProvider } from "../session/session.js";
import { AuthenticationError, BackendQueryError, errorMessage } from "../utils/errors.js";
import { isRecord, readArray, readNumber, readRecord, readString, readText } from "../utils/guards.js";
import type { Logger } from "../utils/logger.js";
import { TtlCache } from "../utils/ttl-cache.js";

// ── Query document ───────────────────────────────────────────────────────────

export const SEARCH_PACKAGES_QUERY = `query SearchPackages(
  $buckets: [String!]
  $searchString: String
  $filter: PackagesSearchFilter
  $first: Int!
  $after: String
) {
  searchPackages(buckets: $buckets, searchString: $searchString, filter: $filter) {
    __typename
    ... on PackagesSearchResultSet {
      total
      page(first: $first, after: $after) {
        edges {
          cursor
          node {
            bucket
            name
            hash
            modified
            size
            comment
            score
          }
        }
        pageInfo {
          endCursor
          hasNextPage
        }
      }
    }
    ... on InvalidInput {
      errors {
        path
        message
      }
    }
    ... on OperationError {
      message
    }
  }
}`;

// ── Types ────────────────────────────────────────────────────────────────────

export interface RangeFilter {
  gte?: number | string;
  lte?: number | string;
}

export interface PackagesSearchFilter {
  size?: RangeFilter;
  modified?: RangeFilter;
}

export interface SearchPackagesVariables {
  [key: string]: unknown;
  buckets: string[];
  searchString: string | null;
  filter: PackagesSearchFilter | null;
  first: number;
  after: string | null;
}

export interface PackagePage {
  results: SearchResult[];
  total: number | undefined;
  endCursor: string | null;
  hasNextPage: boolean;
}

export interface CatalogQueryBackendOptions {
  session: SessionProvider;
  graphql: GraphQLClient;
  bucketCache?: TtlCache<string[]>;
  manifestPrefix?: string;
  logger?: Logger;
}

const BUCKET_CACHE_KEY = "catalog_query:buckets";
const DEFAULT_BUCKET_TTL_MS = 5 * 60 * 1000;

// ── Variable builders ────────────────────────────────────────────────────────

/**
 * Buckets named by the caller's filters. `buckets`, `bucket: "x"` and
 * `bucket: ["x"]` all yield a list. Null when the filters name none.
 */
export function bucketsFromFilters(filters: SearchFilters): string[] | null {
  if (filters.buckets !== undefined) return normalizeBucketList(filters.buckets);
  if (filters.bucket !== undefined) return normalizeBucketList([filters.bucket].flat());
  return null;
}

export function buildPackagesFilter(filters: AnalysisFilters): PackagesSearchFilter | null {
  const filter: PackagesSearchFilter = {};
  if (filters.sizeMin !== undefined || filters.sizeMax !== undefined) {
    filter.size = {};
    if (filters.sizeMin !== undefined) filter.size.gte = filters.sizeMin;
    if (filters.sizeMax !== undefined) filter.size.lte = filters.sizeMax;
  }
  if (filters.createdAfter !== undefined || filters.createdBefore !== undefined) {
    filter.modified = {};
    if (filters.createdAfter !== undefined) filter.modified.gte = filters.createdAfter;
    if (filters.createdBefore !== undefined) filter.modified.lte = filters.createdBefore;
  }
  return filter.size || filter.modified ? filter : null;
}

export function buildSearchVariables(
  text: string,
  buckets: string[],
  filters: AnalysisFilters,
  limit: number,
  after: string | null = null,
): SearchPackagesVariables {
  const trimmed = text.trim();
  return {
    buckets,
    searchString: trimmed && trimmed !== "*" ? trimmed : null,
    filter: buildPackagesFilter(filters),
    first: limit,
    after,
  };
}

// ── Response parsing ─────────────────────────────────────────────────────────

export function packageNodeToResult(
  node: Record<string, unknown>,
  manifestPrefix: string,
): SearchResult | null {
  const bucket = readText(node, "bucket");
  const name = readText(node, "name");
  if (!bucket || !name) return null;

  const hash = readText(node, "hash");
  return {
    id: `${bucket}/${name}@${hash ?? "latest"}`,
    type: "package",
    name,
    bucket,
    storageLocation: manifestLocation(bucket, name, hash, manifestPrefix),
    size: readNumber(node, "size"),
    extension: "",
    score: readNumber(node, "score") ?? 0,
    backend: "catalog_query",
    lastModified: readString(node, "modified"),
    metadata: {
      revision: hash,
      comment: readString(node, "comment"),
    },
  };
}

function invalidInputMessage(result: Record<string, unknown>): string {
  const errors = readArray(result, "errors") ?? [];
  const messages = errors
    .map((e) => (isRecord(e) ? readString(e, "message") : null))
    .filter((m): m is string => m !== null);
  return messages.length > 0 ? messages.join("; ") : "Invalid search input";
}

/** Decode a `searchPackages` union result into one page of results. */
export function parseSearchPackages(
  data: Record<string, unknown>,
  manifestPrefix: string,
): PackagePage {
  const result = readRecord(data, "searchPackages");
  if (!result) throw new BackendQueryError("searchPackages missing from response");

  const typename = readString(result, "__typename");
  switch (typename) {
    case "EmptySearchResultSet":
      return { results: [], total: 0, endCursor: null, hasNextPage: false };
    case "InvalidInput":
      throw new BackendQueryError(invalidInputMessage(result));
    case "OperationError":
      throw new BackendQueryError(readString(result, "message") ?? "Package search failed");
  }

  const page = readRecord(result, "page");
  const edges = page ? readArray(page, "edges") : null;
  if (!page || !edges) throw new BackendQueryError("searchPackages returned no page");

  const results: SearchResult[] = [];
  for (const edge of edges) {
    const node = isRecord(edge) ? readRecord(edge, "node") : null;
    const converted = node ? packageNodeToResult(node, manifestPrefix) : null;
    if (converted) results.push(converted);
  }

  const pageInfo = readRecord(page, "pageInfo") ?? {};
  return {
    results,
    total: readNumber(result, "total") ?? undefined,
    endCursor: readString(pageInfo, "endCursor"),
    hasNextPage: pageInfo["hasNextPage"] === true,
  };
}

// ── Backend ──────────────────────────────────────────────────────────────────

/**
 * Package-level search through the catalog's GraphQL API. Answers package
 * scope and global scope; file and entry scopes yield no results.
 */
export class CatalogQueryBackend extends BaseBackend {
  private readonly session: SessionProvider;
  private readonly graphql: GraphQLClient;
  private readonly bucketCache: TtlCache<string[]>;
  private readonly manifestPrefix: string;

  constructor(options: CatalogQueryBackendOptions) {
    super("catalog_query", options.logger);
    this.session = options.session;
    this.graphql = options.graphql;
    this.bucketCache = options.bucketCache ?? new TtlCache({ ttlMs: DEFAULT_BUCKET_TTL_MS });
    this.manifestPrefix = options.manifestPrefix ?? DEFAULT_MANIFEST_PREFIX;
  }

  async healthCheck(): Promise<boolean> {
    if (!this.session.isAvailable()) {
      this.markFailed("unavailable", "No authenticated session", true);
      return false;
    }
    try {
      await this.listBuckets();
      this.markAvailable();
      return true;
    } catch (err) {
      const auth = err instanceof AuthenticationError;
      this.markFailed(auth ? "unavailable" : "error", errorMessage(err), auth);
      return false;
    }
  }

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

    if (scope === "file" || scope === "packageEntry") {
      this.logger.debug(`catalog_query has no ${scope} results`);
      return this.successResponse([], startedAt, { total: 0 });
    }

    try {
      const buckets = target.trim()
        ? normalizeBucketList([target])
        : bucketsFromFilters(filters) ?? (await this.listBuckets());
      if (buckets.length === 0 || limit <= 0) {
        return this.successResponse([], startedAt, { total: 0 });
      }

      const variables = buildSearchVariables(query, buckets, filters, limit);
      const data = await this.graphql.query(SEARCH_PACKAGES_QUERY, variables, options.signal);
      const page = parseSearchPackages(data, this.manifestPrefix);

      return this.successResponse(page.results.slice(0, limit), startedAt, { total: page.total });
    } catch (err) {
      return this.failureResponse(err, startedAt);
    }
  }
}
