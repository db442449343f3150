import type { ResultType, SearchResult, SearchScope } from "../search/types.js";
import type { IndexKind } from "./index-pattern.js";
import { PACKAGE_INDEX_SUFFIX, bucketFromIndexName, classifyIndexName } from "./index-pattern.js";
import { isRecord, readNumber, readRecord, readString, readText } from "../utils/guards.js";
import type { Logger } from "../utils/logger.js";
import { silentLogger } from "../utils/logger.js";

// ── Types ────────────────────────────────────────────────────────────────────

export interface HitContext {
  packageIndexSuffix: string;
  /** Key prefix under which package manifests live, e.g. `.quilt/packages`. */
  manifestPrefix: string;
  logger: Logger;
}

type HitNormalizer = (hit: Record<string, unknown>, ctx: HitContext) => SearchResult | null;

export const DEFAULT_MANIFEST_PREFIX = ".quilt/packages";

const STORAGE_SCHEME = "s3://";

export function defaultHitContext(overrides: Partial<HitContext> = {}): HitContext {
  return {
    packageIndexSuffix: PACKAGE_INDEX_SUFFIX,
    manifestPrefix: DEFAULT_MANIFEST_PREFIX,
    logger: silentLogger,
    ...overrides,
  };
}

// ── Field helpers ────────────────────────────────────────────────────────────

/** Lower-case extension of the last path segment, without the dot. */
export function extensionFromKey(key: string): string {
  const base = key.slice(key.lastIndexOf("/") + 1);
  const dot = base.lastIndexOf(".");
  if (dot <= 0 || dot === base.length - 1) return "";
  return base.slice(dot + 1).toLowerCase();
}

export function storageLocation(bucket: string, key: string): string | null {
  if (!bucket || !key) return null;
  return `${STORAGE_SCHEME}${bucket}/${key.replace(/^\/+/, "")}`;
}

export function manifestLocation(
  bucket: string,
  packageName: string,
  hash: string | null,
  manifestPrefix: string,
): string | null {
  if (!bucket || !packageName || !hash) return null;
  const prefix = manifestPrefix.replace(/^\/+|\/+$/g, "");
  return storageLocation(bucket, `${prefix}/${packageName}/${hash}.jsonl`);
}

interface HitEnvelope {
  id: string | null;
  index: string;
  score: number;
  source: Record<string, unknown>;
}

function envelopeOf(hit: Record<string, unknown>): HitEnvelope {
  return {
    id: readText(hit, "_id"),
    index: readString(hit, "_index") ?? "",
    score: readNumber(hit, "_score") ?? 0,
    source: readRecord(hit, "_source") ?? {},
  };
}

// ── Normalizers ──────────────────────────────────────────────────────────────

/** Object hit from a bucket's file index. Requires `key`. */
export const normalizeFileHit: HitNormalizer = (hit, ctx) => {
  const { id, index, score, source } = envelopeOf(hit);
  const key = readText(source, "key");
  if (!key) {
    ctx.logger.debug(`Skipping file hit without key in index "${index}"`);
    return null;
  }

  const bucket = bucketFromIndexName(index, ctx.packageIndexSuffix);
  const extFromSource = (readString(source, "ext") ?? "").replace(/^\.+/, "").toLowerCase();

  return {
    id: id ?? `${index}/${key}`,
    type: "file",
    name: key,
    bucket,
    storageLocation: storageLocation(bucket, key),
    size: readNumber(source, "size"),
    extension: extensionFromKey(key) || extFromSource,
    score,
    backend: "document_search",
    lastModified: readString(source, "last_modified"),
    metadata: { ...source, index },
  };
};

/** Logical-key entry inside a package. Requires `entry_pk`. */
export const normalizePackageEntryHit: HitNormalizer = (hit, ctx) => {
  const { id, index, score, source } = envelopeOf(hit);
  const entryPk = readText(source, "entry_pk");
  if (!entryPk) {
    ctx.logger.debug(`Skipping package entry hit without entry_pk in index "${index}"`);
    return null;
  }

  const bucket = bucketFromIndexName(index, ctx.packageIndexSuffix);
  const logicalKey = readText(source, "entry_lk");
  const name = logicalKey ?? entryPk;
  const packageName = entryPk.split("@")[0] ?? entryPk;
  const entryMetadata = readRecord(source, "entry_metadata") ?? {};

  return {
    id: id ?? `${index}/${entryPk}`,
    type: "packageEntry",
    name,
    bucket,
    storageLocation: logicalKey ? storageLocation(bucket, logicalKey) : null,
    size: readNumber(source, "entry_size"),
    extension: extensionFromKey(name),
    score,
    backend: "document_search",
    lastModified:
      readString(entryMetadata, "last_modified") ?? readString(source, "last_modified"),
    metadata: { ...source, index, package_name: packageName },
  };
};

/** Package manifest document. Requires `ptr_name` or `mnfst_name`. */
export const normalizePackageManifestHit: HitNormalizer = (hit, ctx) => {
  const { id, index, score, source } = envelopeOf(hit);
  const name = readText(source, "ptr_name") ?? readText(source, "mnfst_name");
  if (!name) {
    ctx.logger.debug(`Skipping package hit without a name in index "${index}"`);
    return null;
  }

  const bucket = bucketFromIndexName(index, ctx.packageIndexSuffix);
  const hash = readText(source, "mnfst_hash");
  const stats = readRecord(source, "mnfst_stats") ?? {};
  const location = manifestLocation(bucket, name, hash, ctx.manifestPrefix);

  return {
    id: id ?? `${index}/${name}`,
    type: "package",
    name,
    bucket,
    storageLocation: location,
    size: readNumber(stats, "total_bytes"),
    extension: location ? "jsonl" : "",
    score,
    backend: "document_search",
    lastModified: readString(source, "mnfst_last_modified"),
    metadata: { ...source, index },
  };
};

/** Hit from a package index: entry documents carry `entry_pk`, manifests do not. */
export const normalizePackageIndexHit: HitNormalizer = (hit, ctx) => {
  const source = readRecord(hit, "_source") ?? {};
  return "entry_pk" in source || "entry_lk" in source
    ? normalizePackageEntryHit(hit, ctx)
    : normalizePackageManifestHit(hit, ctx);
};

// ── Dispatch tables ──────────────────────────────────────────────────────────

const SCOPE_HANDLERS: Record<ResultType, HitNormalizer> = {
  file: normalizeFileHit,
  package: normalizePackageManifestHit,
  packageEntry: normalizePackageEntryHit,
};

const INDEX_KIND_HANDLERS: Record<IndexKind, HitNormalizer> = {
  file: normalizeFileHit,
  packageEntry: normalizePackageIndexHit,
};

function handlerFor(scope: SearchScope, hit: Record<string, unknown>, ctx: HitContext): HitNormalizer {
  if (scope !== "global") return SCOPE_HANDLERS[scope];
  const index = readString(hit, "_index") ?? "";
  return INDEX_KIND_HANDLERS[classifyIndexName(index, ctx.packageIndexSuffix)];
}

/**
 * Convert raw hits to SearchResults. Global scope dispatches per hit by
 * index name. Hits missing their required field are dropped.
 */
export function normalizeHits(
  hits: readonly unknown[],
  scope: SearchScope,
  ctx: HitContext = defaultHitContext(),
): SearchResult[] {
  const results: SearchResult[] = [];
  for (const hit of hits) {
    if (!isRecord(hit)) continue;
    const result = handlerFor(scope, hit, ctx)(hit, ctx);
    if (result) results.push(result);
  }
  return results;
}
