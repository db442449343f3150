import type { RankedResult } from "./ranking.js";
import type { AnalysisFilters, BackendType, ResultType, SearchResult } from "./types.js";

// ── Output shape ─────────────────────────────────────────────────────────────

/** Wire form of one result. Optional fields appear only when metadata is requested. */
export interface OutputResult {
  name: string;
  type: ResultType;
  bucket: string;
  size: number | null;
  extension: string;
  score: number;
  backend: BackendType;
  relevance?: number;
  id?: string;
  storage_location?: string | null;
  last_modified?: string | null;
  metadata?: Record<string, unknown>;
}

function round(value: number): number {
  return Math.round(value * 1000) / 1000;
}

export function toOutputResult(result: RankedResult, includeMetadata: boolean): OutputResult {
  const output: OutputResult = {
    name: result.name,
    type: result.type,
    bucket: result.bucket,
    size: result.size,
    extension: result.extension,
    score: result.score,
    backend: result.backend,
    relevance: round(result.relevance),
  };
  if (includeMetadata) {
    output.id = result.id;
    output.storage_location = result.storageLocation;
    output.last_modified = result.lastModified;
    output.metadata = result.metadata;
  }
  return output;
}

// ── Post-filtering ───────────────────────────────────────────────────────────

/** A result must carry a non-empty name; backends that break this are filtered here. */
export function hasRequiredFields(result: SearchResult): boolean {
  return result.name.trim().length > 0;
}

function matchesExtension(result: SearchResult, allowed: ReadonlySet<string>): boolean {
  if (allowed.size === 0) return true;
  // Packages carry no single extension.
  if (result.type === "package") return true;
  return allowed.has(result.extension.toLowerCase());
}

function matchesSize(result: SearchResult, filters: AnalysisFilters): boolean {
  const size = result.size ?? 0;
  if (filters.sizeMin !== undefined && size < filters.sizeMin) return false;
  if (filters.sizeMax !== undefined && size > filters.sizeMax) return false;
  return true;
}

/**
 * Enforce extension and size filters locally. Backends may already have
 * applied them; running this again changes nothing.
 */
export function applyPostFilters<T extends SearchResult>(
  results: readonly T[],
  filters: AnalysisFilters,
): T[] {
  const allowed = new Set(
    (filters.extensions ?? []).map((e) => e.replace(/^\.+/, "").toLowerCase()).filter(Boolean),
  );
  return results.filter(
    (r) => hasRequiredFields(r) && matchesExtension(r, allowed) && matchesSize(r, filters),
  );
}
