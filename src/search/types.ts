// ── Enumerations ─────────────────────────────────────────────────────────────

/** Class of entity being searched. */
export const SEARCH_SCOPES = ["file", "package", "packageEntry", "global"] as const;
export type SearchScope = (typeof SEARCH_SCOPES)[number];

/** Kind of a single result. Every scope except `global` names one. */
export type ResultType = Exclude<SearchScope, "global">;

export const QUERY_TYPES = [
  "file_search",
  "package_search",
  "analytical",
  "natural_language",
] as const;
export type QueryType = (typeof QUERY_TYPES)[number];

export const BACKEND_TYPES = ["document_search", "catalog_query"] as const;
export type BackendType = (typeof BACKEND_TYPES)[number];

/** Backend requested by the caller; `auto` defers to the registry policy. */
export type BackendPreference = "auto" | BackendType;

export type BackendStatus =
  | "available"
  | "unavailable"
  | "error"
  | "timeout"
  | "not_registered";

// ── Filters ──────────────────────────────────────────────────────────────────

/** Filters the analyzer can derive from free text. */
export interface AnalysisFilters {
  extensions?: string[];
  /** Inclusive lower bound in bytes. */
  sizeMin?: number;
  /** Inclusive upper bound in bytes. */
  sizeMax?: number;
  /** ISO-8601 timestamp. */
  createdAfter?: string;
  /** ISO-8601 timestamp. */
  createdBefore?: string;
}

/** Filters passed to a backend: analysis filters plus caller-supplied bucket selection. */
export interface SearchFilters extends AnalysisFilters {
  /** Singular bucket key; a string or a one-element list. */
  bucket?: string | string[];
  buckets?: string[];
}

// ── Query + analysis ─────────────────────────────────────────────────────────

export interface SearchQuery {
  readonly text: string;
  readonly scope: SearchScope;
  readonly target: string;
  readonly filters: Readonly<SearchFilters>;
  readonly limit: number;
  readonly explain: boolean;
}

export interface QueryAnalysis {
  queryType: QueryType;
  /** In [0, 1]. */
  confidence: number;
  keywords: string[];
  filters: AnalysisFilters;
}

// ── Results ──────────────────────────────────────────────────────────────────

/** Canonical result shape every backend converges to. `name` is the one path/identifier. */
export interface SearchResult {
  id: string;
  type: ResultType;
  name: string;
  bucket: string;
  storageLocation: string | null;
  size: number | null;
  extension: string;
  /** Backend-native relevance, not normalized. */
  score: number;
  backend: BackendType;
  lastModified: string | null;
  metadata: Record<string, unknown>;
}

export interface BackendResponse {
  readonly backendType: BackendType;
  readonly status: BackendStatus;
  readonly results: readonly SearchResult[];
  readonly queryTimeMs: number;
  readonly errorMessage?: string;
  /** Hit count reported by the backend, when it reports one. */
  readonly total?: number;
  /** Buckets dropped while narrowing around an authorization failure. */
  readonly excludedBuckets?: readonly string[];
}

// ── Type guards ──────────────────────────────────────────────────────────────

export function isSearchScope(value: unknown): value is SearchScope {
  return SEARCH_SCOPES.some((scope) => scope === value);
}

export function isBackendType(value: unknown): value is BackendType {
  return BACKEND_TYPES.some((type) => type === value);
}

export function isBackendPreference(value: unknown): value is BackendPreference {
  return value === "auto" || isBackendType(value);
}
