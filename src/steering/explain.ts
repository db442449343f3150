import type {
  BackendPreference,
  BackendStatus,
  BackendType,
  QueryAnalysis,
  SearchFilters,
  SearchScope,
} from "../search/types.js";

// ── Types ────────────────────────────────────────────────────────────────────

/** Filters in wire (snake_case) form. */
export interface FilterOutput {
  extensions?: string[];
  size_min?: number;
  size_max?: number;
  created_after?: string;
  created_before?: string;
  bucket?: string | string[];
  buckets?: string[];
}

export interface AnalysisOutput {
  query_type: QueryAnalysis["queryType"];
  confidence: number;
  keywords: string[];
  filters: FilterOutput;
}

export interface SelectionSummary {
  requested: BackendPreference;
  selected: BackendType | null;
  rationale: string;
}

export interface ExecutionSummary {
  status: BackendStatus;
  raw_results: number;
  after_post_filter: number;
  returned: number;
  query_time_ms: number;
  excluded_buckets?: string[];
}

export interface Explanation {
  query_analysis: AnalysisOutput;
  backend_selection: SelectionSummary;
  execution_summary: ExecutionSummary | null;
}

export type QueryComplexity = "simple" | "moderate" | "complex";

/** What a search would do, without running it. */
export interface DryRunExplanation extends Explanation {
  scope: SearchScope;
  search_text: string;
  complexity: QueryComplexity;
  suggestions: string[];
}

// ── Wire conversion ──────────────────────────────────────────────────────────

export function toFilterOutput(filters: SearchFilters): FilterOutput {
  const out: FilterOutput = {};
  if (filters.extensions !== undefined) out.extensions = [...filters.extensions];
  if (filters.sizeMin !== undefined) out.size_min = filters.sizeMin;
  if (filters.sizeMax !== undefined) out.size_max = filters.sizeMax;
  if (filters.createdAfter !== undefined) out.created_after = filters.createdAfter;
  if (filters.createdBefore !== undefined) out.created_before = filters.createdBefore;
  if (filters.bucket !== undefined) out.bucket = filters.bucket;
  if (filters.buckets !== undefined) out.buckets = [...filters.buckets];
  return out;
}

export function toAnalysisOutput(analysis: QueryAnalysis, filters: SearchFilters = analysis.filters): AnalysisOutput {
  return {
    query_type: analysis.queryType,
    confidence: Math.round(analysis.confidence * 100) / 100,
    keywords: [...analysis.keywords],
    filters: toFilterOutput(filters),
  };
}

// ── Selection rationale ──────────────────────────────────────────────────────

export function selectionRationale(
  requested: BackendPreference,
  selected: BackendType | null,
  statuses: Partial<Record<BackendType, BackendStatus>>,
): string {
  if (requested !== "auto") {
    return selected
      ? `${requested} was requested explicitly`
      : `${requested} was requested but is ${statuses[requested] ?? "not_registered"}`;
  }
  if (selected === "document_search") {
    return "document_search is available and preferred for full-text search";
  }
  if (selected === "catalog_query") {
    return `document_search is ${statuses.document_search ?? "not_registered"}; falling back to catalog_query`;
  }
  const described = Object.entries(statuses)
    .map(([type, status]) => `${type}=${status}`)
    .join(", ");
  return described ? `No backend is available (${described})` : "No backend is registered";
}

export function buildExplanation(
  analysis: QueryAnalysis,
  filters: SearchFilters,
  selection: SelectionSummary,
  execution: ExecutionSummary | null,
): Explanation {
  return {
    query_analysis: toAnalysisOutput(analysis, filters),
    backend_selection: selection,
    execution_summary: execution,
  };
}

// ── Dry run ──────────────────────────────────────────────────────────────────

export function assessComplexity(analysis: QueryAnalysis): QueryComplexity {
  const filterCount = Object.values(analysis.filters).filter((v) => v !== undefined).length;
  const score = filterCount + (analysis.keywords.length > 3 ? 1 : 0);
  if (score === 0) return "simple";
  if (score <= 2) return "moderate";
  return "complex";
}

/** Refinement hints for queries the analyzer could not pin down. */
export function suggestRefinements(analysis: QueryAnalysis, scope: SearchScope): string[] {
  const suggestions: string[] = [];
  const { filters } = analysis;

  if (analysis.queryType === "natural_language") {
    suggestions.push("Name a file type (e.g. \"csv files\") or a package (\"team/dataset\") to sharpen results");
  }
  if (analysis.queryType === "file_search" && filters.sizeMin === undefined && filters.sizeMax === undefined) {
    suggestions.push("Add a size bound such as \"larger than 100mb\" to narrow file results");
  }
  if (analysis.queryType === "package_search" && scope === "file") {
    suggestions.push("Use scope \"package\" for package queries; file scope returns objects only");
  }
  if (analysis.queryType === "file_search" && scope === "package") {
    suggestions.push("Use scope \"file\" or \"global\" for file queries; package scope returns packages only");
  }
  if (filters.createdAfter === undefined && filters.createdBefore === undefined) {
    suggestions.push("Add a time window such as \"last 30 days\" to focus on recent data");
  }
  return suggestions;
}
