import type { AnalysisFilters, QueryAnalysis, QueryType } from "../search/types.js";

// ── Vocabulary ───────────────────────────────────────────────────────────────

const KNOWN_EXTENSIONS = new Set([
  "csv",
  "tsv",
  "json",
  "jsonl",
  "parquet",
  "txt",
  "pdf",
  "xlsx",
  "xls",
  "xml",
  "yaml",
  "yml",
  "h5",
  "hdf5",
  "bam",
  "vcf",
  "fastq",
  "fasta",
  "png",
  "jpg",
  "jpeg",
  "tif",
  "tiff",
  "zip",
  "gz",
  "ipynb",
  "md",
  "html",
]);

const OBJECT_NOUNS = new Set(["file", "files", "object", "objects"]);

const PACKAGE_WORDS = new Set(["package", "packages", "dataset", "datasets"]);

const ANALYTICAL_WORDS = new Set([
  "largest",
  "smallest",
  "biggest",
  "count",
  "total",
  "sum",
  "average",
  "mean",
  "stats",
  "statistics",
  "analyze",
  "analysis",
  "aggregate",
]);

const STOP_WORDS = new Set([
  "a",
  "an",
  "the",
  "and",
  "or",
  "of",
  "to",
  "in",
  "on",
  "for",
  "from",
  "with",
  "by",
  "about",
  "that",
  "this",
  "all",
  "any",
  "find",
  "search",
  "get",
  "show",
  "list",
  "me",
  "what",
  "which",
  "where",
  "have",
  "does",
  "file",
  "files",
  "object",
  "objects",
  "data",
  "package",
  "packages",
  "containing",
  "than",
  "larger",
  "smaller",
  "bigger",
  "greater",
  "less",
  "more",
  "between",
  "byte",
  "bytes",
  "last",
  "past",
  "since",
  "before",
  "day",
  "days",
  "week",
  "weeks",
  "month",
  "months",
  "year",
  "years",
]);

// ── Patterns ─────────────────────────────────────────────────────────────────

const WILDCARD_EXT_RE = /^\*\.([a-z0-9]{1,10})$/;
const DOT_EXT_RE = /^\.([a-z0-9]{1,10})$/;
const PACKAGE_NAME_RE = /^[a-z0-9][\w.-]*\/[a-z0-9][\w-]*$/;
const SIZE_TOKEN_RE = /^\d+(?:\.\d+)?(?:[kmgt]i?b|b)?$/;
const NUMERIC_RE = /^\d+$/;
const EDGE_PUNCTUATION_RE = /^[,;:!?()"'[\]]+|[,;:!?()"'[\]]+$/g;

const UNIT = String.raw`(bytes?|[kmgt]i?b|b)?`;
const NUMBER = String.raw`(\d+(?:\.\d+)?)`;
// "more than 3 days" is a time span, not a size.
const NOT_A_SPAN = String.raw`(?!\d|\.\d|\s*(?:seconds?|minutes?|hours?|days?|weeks?|months?|years?)\b)`;
const LOWER_BOUND_RE = new RegExp(
  String.raw`\b(?:larger|bigger|greater|more)\s+than\s+${NUMBER}${NOT_A_SPAN}\s*${UNIT}\b`,
);
const UPPER_BOUND_RE = new RegExp(
  String.raw`\b(?:smaller|less)\s+than\s+${NUMBER}${NOT_A_SPAN}\s*${UNIT}\b`,
);
const RANGE_RE = new RegExp(
  String.raw`\bbetween\s+${NUMBER}\s*${UNIT}\s+and\s+${NUMBER}\s*${UNIT}\b`,
);

const RELATIVE_N_RE = /\b(?:last|past)\s+(\d+)\s+(day|week|month|year)s?\b/;
const RELATIVE_ONE_RE = /\b(?:last|past)\s+(day|week|month|year)\b/;
const SINCE_RE = /\bsince\s+(\d{4}-\d{2}-\d{2})\b/;
const BEFORE_RE = /\bbefore\s+(\d{4}-\d{2}-\d{2})\b/;
const YEAR_RE = /\bin\s+((?:19|20)\d{2})\b/;

const UNIT_MULTIPLIERS: Record<string, number> = {
  b: 1,
  byte: 1,
  bytes: 1,
  kb: 1024,
  kib: 1024,
  mb: 1024 ** 2,
  mib: 1024 ** 2,
  gb: 1024 ** 3,
  gib: 1024 ** 3,
  tb: 1024 ** 4,
  tib: 1024 ** 4,
};

const PERIOD_DAYS: Record<string, number> = {
  day: 1,
  week: 7,
  month: 30,
  year: 365,
};

const DAY_MS = 24 * 60 * 60 * 1000;

// ── Scoring policy ───────────────────────────────────────────────────────────

/**
 * Vote weights per signal. An extension outweighs every other combination
 * (package max 4, analytical max 3), so extension queries are file searches.
 */
const WEIGHTS = {
  extension: 5,
  objectNoun: 1,
  size: 2,
  analyticalWord: 1,
  packageName: 3,
  packageWord: 1,
} as const;

/** Signal categories counted for confidence. */
const SIGNAL_CATEGORIES = 5;

const TIE_CONFIDENCE = 0.5;

// ── Helpers ──────────────────────────────────────────────────────────────────

function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/\s+/)
    .map((t) => t.replace(EDGE_PUNCTUATION_RE, ""))
    .filter((t) => t.length > 0);
}

function extensionOf(token: string): string | null {
  const wildcard = WILDCARD_EXT_RE.exec(token);
  if (wildcard) return wildcard[1];
  const dotted = DOT_EXT_RE.exec(token);
  if (dotted) return dotted[1];
  return KNOWN_EXTENSIONS.has(token) ? token : null;
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}

/** Convert a number + unit pair to bytes (1024-based). Missing unit means bytes. */
export function toBytes(value: string, unit: string | undefined): number {
  const multiplier = UNIT_MULTIPLIERS[unit ?? "b"] ?? 1;
  return Math.floor(Number.parseFloat(value) * multiplier);
}

/** Filters pulled from the text, plus the phrases they were read from. */
interface Extracted<T> {
  bounds: T;
  phrases: string[];
}

function extractSizeBounds(text: string): Extracted<Pick<AnalysisFilters, "sizeMin" | "sizeMax">> {
  const bounds: Pick<AnalysisFilters, "sizeMin" | "sizeMax"> = {};
  const phrases: string[] = [];

  const range = RANGE_RE.exec(text);
  if (range) {
    bounds.sizeMin = toBytes(range[1], range[2]);
    bounds.sizeMax = toBytes(range[3], range[4]);
    return { bounds, phrases: [range[0]] };
  }

  const lower = LOWER_BOUND_RE.exec(text);
  if (lower) {
    bounds.sizeMin = toBytes(lower[1], lower[2]);
    phrases.push(lower[0]);
  }

  const upper = UPPER_BOUND_RE.exec(text);
  if (upper) {
    bounds.sizeMax = toBytes(upper[1], upper[2]);
    phrases.push(upper[0]);
  }

  return { bounds, phrases };
}

function isoDate(day: string, endOfDay: boolean): string | undefined {
  const stamp = `${day}T${endOfDay ? "23:59:59.999" : "00:00:00.000"}Z`;
  return Number.isNaN(Date.parse(stamp)) ? undefined : stamp;
}

function extractDateBounds(
  text: string,
  now: Date,
): Extracted<Pick<AnalysisFilters, "createdAfter" | "createdBefore">> {
  const bounds: Pick<AnalysisFilters, "createdAfter" | "createdBefore"> = {};
  const phrases: string[] = [];

  const relative = RELATIVE_N_RE.exec(text);
  const relativeOne = RELATIVE_ONE_RE.exec(text);
  if (relative) {
    const days = Number.parseInt(relative[1], 10) * PERIOD_DAYS[relative[2]];
    bounds.createdAfter = new Date(now.getTime() - days * DAY_MS).toISOString();
    phrases.push(relative[0]);
  } else if (relativeOne) {
    const days = PERIOD_DAYS[relativeOne[1]];
    bounds.createdAfter = new Date(now.getTime() - days * DAY_MS).toISOString();
  }

  const since = SINCE_RE.exec(text);
  if (since && bounds.createdAfter === undefined) {
    bounds.createdAfter = isoDate(since[1], false);
  }

  const before = BEFORE_RE.exec(text);
  if (before) bounds.createdBefore = isoDate(before[1], true);

  const year = YEAR_RE.exec(text);
  if (year) {
    phrases.push(year[0]);
    if (bounds.createdAfter === undefined) bounds.createdAfter = `${year[1]}-01-01T00:00:00.000Z`;
    if (bounds.createdBefore === undefined) bounds.createdBefore = `${year[1]}-12-31T23:59:59.999Z`;
  }

  if (bounds.createdAfter === undefined) delete bounds.createdAfter;
  if (bounds.createdBefore === undefined) delete bounds.createdBefore;
  return { bounds, phrases };
}

/**
 * Keywords are the tokens left after stop words. Numbers are kept unless
 * they belong to a size or date phrase that became a filter.
 */
function extractKeywords(tokens: string[], filterPhrases: string[]): string[] {
  const consumed = new Set(filterPhrases.flatMap((p) => p.split(" ")));
  const keywords: string[] = [];
  for (const token of tokens) {
    const ext = extensionOf(token);
    if (ext) {
      keywords.push(ext);
      continue;
    }
    if (STOP_WORDS.has(token)) continue;
    if (SIZE_TOKEN_RE.test(token) && consumed.has(token)) continue;
    if (token.length <= 2 && !NUMERIC_RE.test(token)) continue;
    keywords.push(token);
  }
  return unique(keywords);
}

type VotedType = Exclude<QueryType, "natural_language">;

/** Highest-scoring type, or null when nothing scored or the top score is shared. */
function pickQueryType(scores: Array<[VotedType, number]>): VotedType | null {
  const ranked = [...scores].sort((a, b) => b[1] - a[1]);
  const top = ranked[0];
  const second = ranked[1];
  if (top[1] === 0) return null;
  if (second !== undefined && second[1] === top[1]) return null;
  return top[0];
}

// ── Analyzer ─────────────────────────────────────────────────────────────────

/** Empty-input analysis: natural language with zero confidence. */
export function emptyAnalysis(): QueryAnalysis {
  return { queryType: "natural_language", confidence: 0, keywords: [], filters: {} };
}

/**
 * Classify free text into a query type and extract structured filters.
 * Pure apart from `now`, which anchors relative dates ("last 7 days").
 */
export function analyzeQuery(text: string, now: Date = new Date()): QueryAnalysis {
  const tokens = tokenize(text);
  if (tokens.length === 0) return emptyAnalysis();

  const normalized = tokens.join(" ");
  const extensions = unique(
    tokens.map(extensionOf).filter((e): e is string => e !== null),
  );
  const hasObjectNoun = tokens.some((t) => OBJECT_NOUNS.has(t));
  const hasAnalyticalWord = tokens.some((t) => ANALYTICAL_WORDS.has(t));
  const hasPackageName = tokens.some(
    (t) => PACKAGE_NAME_RE.test(t) && extensionOf(t) === null,
  );
  const hasPackageWord = tokens.some((t) => PACKAGE_WORDS.has(t));

  const sizeMatch = extractSizeBounds(normalized);
  const dateMatch = extractDateBounds(normalized, now);
  const size = sizeMatch.bounds;
  const dates = dateMatch.bounds;
  const hasSize = size.sizeMin !== undefined || size.sizeMax !== undefined;
  const hasDates = dates.createdAfter !== undefined || dates.createdBefore !== undefined;

  const filters: AnalysisFilters = { ...size, ...dates };
  if (extensions.length > 0) filters.extensions = extensions;

  const scores: Array<[VotedType, number]> = [
    [
      "file_search",
      (extensions.length > 0 ? WEIGHTS.extension : 0) + (hasObjectNoun ? WEIGHTS.objectNoun : 0),
    ],
    [
      "analytical",
      (hasSize ? WEIGHTS.size : 0) + (hasAnalyticalWord ? WEIGHTS.analyticalWord : 0),
    ],
    [
      "package_search",
      (hasPackageName ? WEIGHTS.packageName : 0) + (hasPackageWord ? WEIGHTS.packageWord : 0),
    ],
  ];

  const matched = [
    extensions.length > 0,
    hasObjectNoun,
    hasSize || hasAnalyticalWord,
    hasDates,
    hasPackageName || hasPackageWord,
  ].filter(Boolean).length;

  const queryType = pickQueryType(scores);
  const keywords = extractKeywords(tokens, [...sizeMatch.phrases, ...dateMatch.phrases]);

  if (queryType === null) {
    return { queryType: "natural_language", confidence: TIE_CONFIDENCE, keywords, filters };
  }

  const confidence = Math.min(1, Math.max(0, matched / SIGNAL_CATEGORIES));
  return { queryType, confidence, keywords, filters };
}

/**
 * Free text sent to a backend: the analysis keywords minus the extensions
 * already expressed as filters. `*` when nothing is left.
 */
export function searchTextFor(analysis: QueryAnalysis): string {
  const extensions = new Set(analysis.filters.extensions ?? []);
  const terms = analysis.keywords.filter((k) => !extensions.has(k));
  return terms.length > 0 ? terms.join(" ") : "*";
}
