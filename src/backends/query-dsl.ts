import type { AnalysisFilters } from "../search/types.js";

// ── Types ────────────────────────────────────────────────────────────────────

export interface RangeBounds {
  gte?: number | string;
  lte?: number | string;
}

export interface QueryStringClause {
  query_string: {
    query: string;
    analyze_wildcard: boolean;
  };
}

export type FilterClause =
  | { terms: Record<string, string[]> }
  | { range: Record<string, RangeBounds> };

export interface DocumentQuery {
  query: {
    bool: {
      must: QueryStringClause[];
      filter: FilterClause[];
    };
  };
}

// ── Escaping ─────────────────────────────────────────────────────────────────

/** Reserved query-string characters. `*` and `?` stay live as wildcards. */
const RESERVED_CHARS_RE = /[/\-:+()[\]{}"\\]/g;

/** Escape reserved characters so `team/dataset` matches literally. */
export function escapeQueryString(text: string): string {
  return text.replace(RESERVED_CHARS_RE, (ch) => `\\${ch}`);
}

// ── Builder ──────────────────────────────────────────────────────────────────

/** `.csv` form used by the `ext` field. */
export function toExtensionTerm(extension: string): string {
  return `.${extension.trim().toLowerCase().replace(/^\.+/, "")}`;
}

function rangeOf(min: number | string | undefined, max: number | string | undefined): RangeBounds | null {
  if (min === undefined && max === undefined) return null;
  const bounds: RangeBounds = {};
  if (min !== undefined) bounds.gte = min;
  if (max !== undefined) bounds.lte = max;
  return bounds;
}

/** Structured filters the document index enforces itself. */
export function buildFilterClauses(filters: AnalysisFilters): FilterClause[] {
  const clauses: FilterClause[] = [];

  const extensions = (filters.extensions ?? []).filter((e) => e.trim().length > 0);
  if (extensions.length > 0) {
    clauses.push({ terms: { ext: [...new Set(extensions.map(toExtensionTerm))] } });
  }

  const size = rangeOf(filters.sizeMin, filters.sizeMax);
  if (size) clauses.push({ range: { size } });

  const modified = rangeOf(filters.createdAfter, filters.createdBefore);
  if (modified) clauses.push({ range: { last_modified: modified } });

  return clauses;
}

/** Boolean query: escaped free text must match, filters narrow without scoring. */
export function buildDocumentQuery(text: string, filters: AnalysisFilters): DocumentQuery {
  const query = text.trim().length > 0 ? escapeQueryString(text.trim()) : "*";
  return {
    query: {
      bool: {
        must: [{ query_string: { query, analyze_wildcard: true } }],
        filter: buildFilterClauses(filters),
      },
    },
  };
}
