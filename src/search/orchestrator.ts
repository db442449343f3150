import { mergeFilters, parseFilters } from "./filters.js";
import { rankResults } from "./ranking.js";
import type { OutputResult } from "./results.js";
import { applyPostFilters, toOutputResult } from "./results.js";
import type {
  BackendPreference,
  BackendResponse,
  BackendType,
  QueryAnalysis,
  SearchFilters,
  SearchQuery,
} from "./types.js";
import { isBackendPreference, isSearchScope, SEARCH_SCOPES } from "./types.js";
import type { BackendAdapter } from "../backends/base.js";
import type { BackendRegistry } from "../backends/registry.js";
import { REPROBE_STATUSES, SELECTION_ORDER } from "../backends/registry.js";
import { analyzeQuery, searchTextFor } from "../steering/analyze.js";
import type { AnalysisOutput, DryRunExplanation, ExecutionSummary, Explanation, SelectionSummary } from "../steering/explain.js";
import {
  assessComplexity,
  buildExplanation,
  selectionRationale,
  suggestRefinements,
  toAnalysisOutput,
} from "../steering/explain.js";
import type { ErrorCategory } from "../utils/errors.js";
import {
  AuthenticationError,
  ConfigurationError,
  NotApplicableError,
  errorCategoryOf,
  errorMessage,
} from "../utils/errors.js";
import type { Logger } from "../utils/logger.js";
import { silentLogger } from "../utils/logger.js";
import { withTimeout } from "../utils/timeout.js";

// ── Types ────────────────────────────────────────────────────────────────────

export interface SearchRequest {
  query: string;
  scope?: string;
  target?: string;
  backend?: string;
  filters?: Record<string, unknown> | null;
  limit?: number;
  includeMetadata?: boolean;
  explainQuery?: boolean;
  signal?: AbortSignal;
}

export interface BackendStatusEntry {
  status: BackendResponse["status"];
  result_count: number;
  query_time_ms: number;
  error?: string;
  excluded_buckets?: string[];
}

export interface SearchResponse {
  success: boolean;
  query: string;
  scope: string;
  target: string;
  results: OutputResult[];
  total_results: number;
  query_time_ms: number;
  backend_used: BackendType | null;
  backend_status: Partial<Record<BackendType, BackendStatusEntry>>;
  analysis?: AnalysisOutput;
  explanation?: Explanation;
  error?: string;
  error_category?: ErrorCategory;
}

export interface CountResponse {
  success: boolean;
  query: string;
  scope: string;
  total_count: number;
  backend_used: BackendType | null;
  error?: string;
  error_category?: ErrorCategory;
}

export interface OrchestratorOptions {
  registry: BackendRegistry;
  logger?: Logger;
  timeoutMs?: number;
  /** Clock for relative date phrases. */
  now?: () => Date;
}

interface ValidatedRequest {
  query: SearchQuery;
  backend: BackendPreference;
  includeMetadata: boolean;
}

interface Selection {
  backend: BackendAdapter | null;
  summary: SelectionSummary;
}

interface FailureContext {
  backendUsed?: BackendType | null;
  backendStatus?: Partial<Record<BackendType, BackendStatusEntry>>;
  analysis?: QueryAnalysis;
  filters?: SearchFilters;
  includeMetadata?: boolean;
  explanation?: Explanation;
}

// ── Constants ────────────────────────────────────────────────────────────────

export const DEFAULT_LIMIT = 50;
export const MAX_LIMIT = 1000;
export const DEFAULT_TIMEOUT_MS = 30_000;

/** Failure category for a backend that answered with a non-available status. */
const STATUS_CATEGORY: Record<Exclude<BackendResponse["status"], "available">, ErrorCategory> = {
  unavailable: "authentication",
  timeout: "timeout",
  error: "backend_error",
  not_registered: "not_applicable",
};

// ── Helpers ──────────────────────────────────────────────────────────────────

function elapsedSince(startedAt: number): number {
  return Math.round(performance.now() - startedAt);
}

function singleStatus(
  type: BackendType,
  entry: BackendStatusEntry,
): Partial<Record<BackendType, BackendStatusEntry>> {
  const status: Partial<Record<BackendType, BackendStatusEntry>> = {};
  status[type] = entry;
  return status;
}

function toStatusEntry(response: BackendResponse): BackendStatusEntry {
  const entry: BackendStatusEntry = {
    status: response.status,
    result_count: response.results.length,
    query_time_ms: response.queryTimeMs,
  };
  if (response.errorMessage !== undefined) entry.error = response.errorMessage;
  if (response.excludedBuckets && response.excludedBuckets.length > 0) {
    entry.excluded_buckets = [...response.excludedBuckets];
  }
  return entry;
}

// ── Orchestrator ─────────────────────────────────────────────────────────────

/**
 * Single entry point for catalog search: validate, analyze, select a
 * backend, execute under a timeout, rank, post-filter and shape the
 * response. Never throws for search failures; they come back as
 * `success: false` with an `error_category`.
 */
export class SearchOrchestrator {
  private readonly registry: BackendRegistry;
  private readonly logger: Logger;
  private readonly timeoutMs: number;
  private readonly now: () => Date;

  constructor(options: OrchestratorOptions) {
    this.registry = options.registry;
    this.logger = options.logger ?? silentLogger;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.now = options.now ?? (() => new Date());
  }

  async search(request: SearchRequest): Promise<SearchResponse> {
    const startedAt = performance.now();

    let validated: ValidatedRequest;
    try {
      validated = this.validate(request);
    } catch (err) {
      return this.failure(request, startedAt, err, {});
    }

    const { query, includeMetadata } = validated;
    const analysis = analyzeQuery(query.text, this.now());
    const filters = mergeFilters(analysis.filters, query.filters);
    this.logger.debug(
      `Analyzed "${query.text}" as ${analysis.queryType} (confidence ${analysis.confidence})`,
    );

    const selection = await this.selectBackend(validated.backend);
    const backend = selection.backend;
    if (!backend) {
      const err =
        this.registry.size > 0 && this.registry.hasAuthError()
          ? new AuthenticationError("No authenticated search backend is available")
          : new NotApplicableError(selection.summary.rationale);
      return this.failure(request, startedAt, err, {
        backendUsed: null,
        backendStatus: this.registryStatusEntries(),
        analysis,
        filters,
        includeMetadata,
        explanation: request.explainQuery
          ? buildExplanation(analysis, filters, selection.summary, null)
          : undefined,
      });
    }

    const type = backend.backendType;
    let response: BackendResponse;
    try {
      response = await withTimeout(
        (signal) =>
          backend.search(searchTextFor(analysis), query.scope, query.target, filters, query.limit, {
            signal,
          }),
        this.timeoutMs,
        type,
        request.signal,
      );
    } catch (err) {
      const category = errorCategoryOf(err);
      return this.failure(request, startedAt, err, {
        backendUsed: type,
        backendStatus: singleStatus(type, {
          status: category === "timeout" ? "timeout" : "error",
          result_count: 0,
          query_time_ms: elapsedSince(startedAt),
          error: errorMessage(err),
        }),
        analysis,
        filters,
        includeMetadata,
      });
    }

    const statusEntry = toStatusEntry(response);
    const backendStatus = singleStatus(type, statusEntry);

    if (response.status !== "available") {
      const message = response.errorMessage ?? `${type} returned status ${response.status}`;
      const execution: ExecutionSummary = {
        status: response.status,
        raw_results: 0,
        after_post_filter: 0,
        returned: 0,
        query_time_ms: response.queryTimeMs,
      };
      return this.failure(
        request,
        startedAt,
        message,
        {
          backendUsed: type,
          backendStatus,
          analysis,
          filters,
          includeMetadata,
          explanation: request.explainQuery
            ? buildExplanation(analysis, filters, selection.summary, execution)
            : undefined,
        },
        STATUS_CATEGORY[response.status],
      );
    }

    const ranked = rankResults(response.results, analysis);
    const filtered = applyPostFilters(ranked, filters);
    const limited = filtered.slice(0, query.limit);
    const results = limited.map((r) => toOutputResult(r, includeMetadata));

    const output: SearchResponse = {
      success: true,
      query: query.text,
      scope: query.scope,
      target: query.target,
      results,
      total_results: results.length,
      query_time_ms: elapsedSince(startedAt),
      backend_used: type,
      backend_status: backendStatus,
    };

    if (includeMetadata) output.analysis = toAnalysisOutput(analysis, filters);
    if (request.explainQuery) {
      const execution: ExecutionSummary = {
        status: response.status,
        raw_results: response.results.length,
        after_post_filter: filtered.length,
        returned: results.length,
        query_time_ms: response.queryTimeMs,
      };
      if (statusEntry.excluded_buckets) execution.excluded_buckets = statusEntry.excluded_buckets;
      output.explanation = buildExplanation(analysis, filters, selection.summary, execution);
    }

    this.logger.debug(`${type} returned ${response.results.length} hit(s), ${results.length} after filtering`);
    return output;
  }

  /** Hit count without fetching results. Needs a backend with a count mode. */
  async count(request: SearchRequest): Promise<CountResponse> {
    const base = {
      query: request.query,
      scope: request.scope ?? "global",
      total_count: 0,
    };

    try {
      const { query } = this.validate(request);
      const analysis = analyzeQuery(query.text, this.now());
      const filters = mergeFilters(analysis.filters, query.filters);

      const backend = this.registry.get("document_search");
      const countResults = backend?.countResults?.bind(backend);
      if (!backend || !countResults) {
        throw new NotApplicableError("Counting requires the document_search backend");
      }
      await backend.ensureInitialized();

      const total = await withTimeout(
        (signal) => countResults(searchTextFor(analysis), query.scope, query.target, filters, { signal }),
        this.timeoutMs,
        backend.backendType,
        request.signal,
      );
      return { ...base, success: true, total_count: total, backend_used: backend.backendType };
    } catch (err) {
      return {
        ...base,
        success: false,
        backend_used: null,
        error: errorMessage(err),
        error_category: errorCategoryOf(err),
      };
    }
  }

  /**
   * Describe what `search` would do without querying any backend. Uses
   * the registry's last-known statuses. Throws ConfigurationError for
   * invalid requests.
   */
  explain(request: SearchRequest): DryRunExplanation {
    const { query, backend } = this.validate(request);
    const analysis = analyzeQuery(query.text, this.now());
    const filters = mergeFilters(analysis.filters, query.filters);
    const statuses = this.registry.getBackendStatuses();

    let selected: BackendType | null = null;
    if (backend !== "auto") {
      selected = statuses[backend].status === "not_registered" ? null : backend;
    } else {
      selected =
        SELECTION_ORDER.find((type) => {
          const snapshot = statuses[type];
          if (snapshot.status === "not_registered") return false;
          return (
            snapshot.status === "available" ||
            REPROBE_STATUSES.includes(snapshot.status) ||
            !snapshot.initialized
          );
        }) ?? null;
    }

    const summary: SelectionSummary = {
      requested: backend,
      selected,
      rationale: selectionRationale(backend, selected, this.statusMap()),
    };

    return {
      ...buildExplanation(analysis, filters, summary, null),
      scope: query.scope,
      search_text: searchTextFor(analysis),
      complexity: assessComplexity(analysis),
      suggestions: suggestRefinements(analysis, query.scope),
    };
  }

  // ── Internals ────────────────────────────────────────────────────────────

  private validate(request: SearchRequest): ValidatedRequest {
    const scope = request.scope ?? "global";
    if (!isSearchScope(scope)) {
      throw new ConfigurationError(
        `Invalid scope "${scope}". Expected one of: ${SEARCH_SCOPES.join(", ")}`,
      );
    }

    const backend = request.backend ?? "auto";
    if (!isBackendPreference(backend)) {
      throw new ConfigurationError(
        `Invalid backend "${backend}". Expected one of: auto, ${SELECTION_ORDER.join(", ")}`,
      );
    }

    const limit = request.limit ?? DEFAULT_LIMIT;
    if (!Number.isInteger(limit) || limit < 0 || limit > MAX_LIMIT) {
      throw new ConfigurationError(`Invalid limit ${limit}. Expected an integer from 0 to ${MAX_LIMIT}`);
    }

    const { filters, unknownKeys } = parseFilters(request.filters);
    if (unknownKeys.length > 0) {
      this.logger.warn(`Ignoring unknown filter key(s): ${unknownKeys.join(", ")}`);
    }

    return {
      query: {
        text: request.query,
        scope,
        target: (request.target ?? "").trim(),
        filters,
        limit,
        explain: request.explainQuery ?? false,
      },
      backend,
      includeMetadata: request.includeMetadata ?? false,
    };
  }

  private async selectBackend(preference: BackendPreference): Promise<Selection> {
    if (preference !== "auto") {
      const backend = this.registry.get(preference) ?? null;
      if (backend) await backend.ensureInitialized();
      return {
        backend,
        summary: {
          requested: preference,
          selected: backend ? preference : null,
          rationale: selectionRationale(preference, backend ? preference : null, this.statusMap()),
        },
      };
    }

    const backend = await this.registry.selectPrimary();
    const selected = backend?.backendType ?? null;
    return {
      backend,
      summary: {
        requested: preference,
        selected,
        rationale: selectionRationale(preference, selected, this.statusMap()),
      },
    };
  }

  /** Last-known status of each registered backend. */
  private statusMap(): Partial<Record<BackendType, BackendResponse["status"]>> {
    const statuses = this.registry.getBackendStatuses();
    const map: Partial<Record<BackendType, BackendResponse["status"]>> = {};
    for (const type of this.registry.registeredTypes()) map[type] = statuses[type].status;
    return map;
  }

  private registryStatusEntries(): Partial<Record<BackendType, BackendStatusEntry>> {
    const statuses = this.registry.getBackendStatuses();
    const entries: Partial<Record<BackendType, BackendStatusEntry>> = {};
    for (const type of this.registry.registeredTypes()) {
      const snapshot = statuses[type];
      entries[type] = {
        status: snapshot.status,
        result_count: 0,
        query_time_ms: 0,
        ...(snapshot.lastError ? { error: snapshot.lastError } : {}),
      };
    }
    return entries;
  }

  private failure(
    request: SearchRequest,
    startedAt: number,
    err: unknown,
    context: FailureContext,
    category: ErrorCategory = errorCategoryOf(err),
  ): SearchResponse {
    const message = typeof err === "string" ? err : errorMessage(err);
    this.logger.debug(`Search failed (${category}): ${message}`);

    const response: SearchResponse = {
      success: false,
      query: request.query,
      scope: request.scope ?? "global",
      target: request.target ?? "",
      results: [],
      total_results: 0,
      query_time_ms: elapsedSince(startedAt),
      backend_used: context.backendUsed ?? null,
      backend_status: context.backendStatus ?? {},
      error: message,
      error_category: category,
    };
    if (context.includeMetadata && context.analysis) {
      response.analysis = toAnalysisOutput(context.analysis, context.filters);
    }
    if (context.explanation) response.explanation = context.explanation;
    return response;
  }
}

