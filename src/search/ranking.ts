import type { QueryAnalysis, QueryType, ResultType, SearchResult } from "./types.js";

// ── Types ────────────────────────────────────────────────────────────────────

/** Result with a normalized 0–1 relevance after boosting. */
export interface RankedResult extends SearchResult {
  relevance: number;
}

// ── Boost constants ──────────────────────────────────────────────────────────

/** Result types favored by each query type. Missing entries mean 1.0. */
const TYPE_BOOSTS: Record<QueryType, Partial<Record<ResultType, number>>> = {
  file_search: { file: 1.2, packageEntry: 1.1 },
  package_search: { package: 1.3 },
  analytical: { file: 1.1 },
  natural_language: {},
};

const EXTENSION_MATCH_BOOST = 1.25;
const KEYWORD_NAME_BOOST = 1.15;

// ── Ranking ──────────────────────────────────────────────────────────────────

function dedupeById<T extends SearchResult>(results: readonly T[]): T[] {
  const seen = new Set<string>();
  const unique: T[] = [];
  for (const result of results) {
    if (seen.has(result.id)) continue;
    seen.add(result.id);
    unique.push(result);
  }
  return unique;
}

function boostFor(result: SearchResult, analysis: QueryAnalysis): number {
  let boost = TYPE_BOOSTS[analysis.queryType][result.type] ?? 1.0;

  const extensions = analysis.filters.extensions ?? [];
  if (result.extension && extensions.includes(result.extension)) {
    boost *= EXTENSION_MATCH_BOOST;
  }

  const nameLower = result.name.toLowerCase();
  const extensionSet = new Set(extensions);
  const terms = analysis.keywords.filter((k) => !extensionSet.has(k));
  if (terms.some((k) => nameLower.includes(k))) {
    boost *= KEYWORD_NAME_BOOST;
  }

  return boost;
}

/** Re-normalize relevance so the maximum is 1.0. */
function renormalize(results: RankedResult[]): RankedResult[] {
  if (results.length === 0) return results;

  const maxRelevance = Math.max(...results.map((r) => r.relevance));
  if (maxRelevance === 0) return results;

  return results.map((r) => ({ ...r, relevance: r.relevance / maxRelevance }));
}

/**
 * Rank one backend's results: backend scores normalized to the batch
 * maximum, multiplied by query-type, extension and name boosts, then
 * re-normalized. Duplicate ids keep their first occurrence. Ties keep
 * backend order.
 */
export function rankResults(
  results: readonly SearchResult[],
  analysis: QueryAnalysis,
): RankedResult[] {
  const unique = dedupeById(results);
  if (unique.length === 0) return [];

  const maxScore = Math.max(...unique.map((r) => r.score));
  const ranked = unique.map((r) => ({
    ...r,
    relevance: (maxScore > 0 ? Math.max(0, r.score) / maxScore : 1) * boostFor(r, analysis),
  }));

  ranked.sort((a, b) => b.relevance - a.relevance);
  return renormalize(ranked);
}
