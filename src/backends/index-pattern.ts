import type { SearchScope } from "../search/types.js";
import { SEARCH_SCOPES, isSearchScope } from "../search/types.js";
import { ConfigurationError } from "../utils/errors.js";

/** Suffix naming a bucket's package index. */
export const PACKAGE_INDEX_SUFFIX = "_packages";

/** Index families a document-search hit can come from. */
export type IndexKind = "file" | "packageEntry";

/** Throw ConfigurationError unless `scope` is a known scope. */
export function assertSearchScope(scope: string): asserts scope is SearchScope {
  if (!isSearchScope(scope)) {
    throw new ConfigurationError(
      `Invalid scope "${scope}". Expected one of: ${SEARCH_SCOPES.join(", ")}`,
    );
  }
}

/** Reduce `s3://bucket/some/path`, `bucket/`, or `bucket` to `bucket`. */
export function normalizeBucketName(value: string): string {
  const withoutScheme = value.trim().replace(/^s3:\/\//i, "");
  const [name] = withoutScheme.replace(/^\/+/, "").split("/");
  return name ?? "";
}

/** Normalize, drop empties and de-duplicate, keeping first-seen order. */
export function normalizeBucketList(values: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const value of values) {
    const name = normalizeBucketName(value);
    if (name) seen.add(name);
  }
  return [...seen];
}

/**
 * Comma-separated index pattern for a scope. Empty string when no buckets
 * are given; callers treat that as "nothing to search".
 */
export function buildIndexPatternForScope(
  scope: string,
  buckets: readonly string[],
  suffix: string = PACKAGE_INDEX_SUFFIX,
): string {
  assertSearchScope(scope);
  if (buckets.length === 0) return "";

  const packageIndexes = buckets.map((b) => `${b}${suffix}`);
  switch (scope) {
    case "file":
      return buckets.join(",");
    case "package":
    case "packageEntry":
      return packageIndexes.join(",");
    case "global":
      return [...buckets, ...packageIndexes].join(",");
  }
}

export function classifyIndexName(index: string, suffix: string = PACKAGE_INDEX_SUFFIX): IndexKind {
  return index.endsWith(suffix) ? "packageEntry" : "file";
}

/** Bucket that owns an index: the index name minus the package suffix. */
export function bucketFromIndexName(index: string, suffix: string = PACKAGE_INDEX_SUFFIX): string {
  return index.endsWith(suffix) ? index.slice(0, -suffix.length) : index;
}
