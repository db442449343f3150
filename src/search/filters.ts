import type { AnalysisFilters, SearchFilters } from "./types.js";
import { toBytes } from "../steering/analyze.js";
import { ConfigurationError } from "../utils/errors.js";
import { isStringArray } from "../utils/guards.js";

// ── Constants ────────────────────────────────────────────────────────────────

const SIZE_VALUE_RE = /^\s*(\d+(?:\.\d+)?)\s*(bytes?|[kmgt]i?b|b)?\s*$/i;

/** Accepted spellings for each filter, snake_case first. */
const FILTER_ALIASES = {
  extensions: ["extensions", "file_extensions", "ext"],
  sizeMin: ["size_min", "sizeMin", "size_gt", "min_size"],
  sizeMax: ["size_max", "sizeMax", "size_lt", "max_size"],
  createdAfter: ["created_after", "createdAfter", "modified_after"],
  createdBefore: ["created_before", "createdBefore", "modified_before"],
  bucket: ["bucket"],
  buckets: ["buckets"],
} as const;

type FilterField = keyof typeof FILTER_ALIASES;

// ── Value parsers ────────────────────────────────────────────────────────────

/** Bytes from a number or a string such as `"100MB"` / `"5 kb"`. */
export function parseSizeValue(value: unknown, key: string): number {
  if (typeof value === "number" && Number.isFinite(value) && value >= 0) {
    return Math.floor(value);
  }
  if (typeof value === "string") {
    const match = SIZE_VALUE_RE.exec(value);
    if (match) return toBytes(match[1], match[2]?.toLowerCase());
  }
  throw new ConfigurationError(`Filter "${key}" must be a non-negative size, got ${JSON.stringify(value)}`);
}

function parseDateValue(value: unknown, key: string): string {
  if (typeof value === "string" && !Number.isNaN(Date.parse(value))) {
    return new Date(value).toISOString();
  }
  throw new ConfigurationError(`Filter "${key}" must be an ISO-8601 date, got ${JSON.stringify(value)}`);
}

function parseExtensions(value: unknown, key: string): string[] {
  const list = typeof value === "string" ? value.split(",") : value;
  if (!isStringArray(list)) {
    throw new ConfigurationError(`Filter "${key}" must be a string or a list of strings`);
  }
  return [
    ...new Set(
      list.map((e) => e.trim().replace(/^\*?\.+/, "").toLowerCase()).filter((e) => e.length > 0),
    ),
  ];
}

function parseBucketValue(value: unknown, key: string): string | string[] {
  if (typeof value === "string" || isStringArray(value)) return value;
  throw new ConfigurationError(`Filter "${key}" must be a bucket name or a list of names`);
}

function parseBucketList(value: unknown, key: string): string[] {
  if (typeof value === "string") return [value];
  if (isStringArray(value)) return value;
  throw new ConfigurationError(`Filter "${key}" must be a list of bucket names`);
}

// ── Public API ───────────────────────────────────────────────────────────────

function lookup(raw: Record<string, unknown>, field: FilterField): [string, unknown] | null {
  for (const key of FILTER_ALIASES[field]) {
    if (raw[key] !== undefined && raw[key] !== null) return [key, raw[key]];
  }
  return null;
}

/**
 * Validate caller-supplied filters. Unknown keys are reported back so the
 * caller can log them; malformed values throw ConfigurationError.
 */
export function parseFilters(raw: Record<string, unknown> | null | undefined): {
  filters: SearchFilters;
  unknownKeys: string[];
} {
  const filters: SearchFilters = {};
  if (!raw) return { filters, unknownKeys: [] };

  const known = new Set<string>(Object.values(FILTER_ALIASES).flat());
  const unknownKeys = Object.keys(raw).filter((k) => !known.has(k));

  const extensions = lookup(raw, "extensions");
  if (extensions) filters.extensions = parseExtensions(extensions[1], extensions[0]);

  const sizeMin = lookup(raw, "sizeMin");
  if (sizeMin) filters.sizeMin = parseSizeValue(sizeMin[1], sizeMin[0]);

  const sizeMax = lookup(raw, "sizeMax");
  if (sizeMax) filters.sizeMax = parseSizeValue(sizeMax[1], sizeMax[0]);

  if (filters.sizeMin !== undefined && filters.sizeMax !== undefined && filters.sizeMin > filters.sizeMax) {
    throw new ConfigurationError(
      `size_min (${filters.sizeMin}) is greater than size_max (${filters.sizeMax})`,
    );
  }

  const after = lookup(raw, "createdAfter");
  if (after) filters.createdAfter = parseDateValue(after[1], after[0]);

  const before = lookup(raw, "createdBefore");
  if (before) filters.createdBefore = parseDateValue(before[1], before[0]);

  const bucket = lookup(raw, "bucket");
  if (bucket) filters.bucket = parseBucketValue(bucket[1], bucket[0]);

  const buckets = lookup(raw, "buckets");
  if (buckets) filters.buckets = parseBucketList(buckets[1], buckets[0]);

  return { filters, unknownKeys };
}

/** Analyzer-derived filters overlaid by caller filters; the caller wins per field. */
export function mergeFilters(derived: AnalysisFilters, explicit: SearchFilters): SearchFilters {
  const merged: SearchFilters = { ...derived };
  for (const [key, value] of Object.entries(explicit)) {
    if (value !== undefined) Object.assign(merged, { [key]: value });
  }
  return merged;
}
