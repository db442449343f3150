import { describe, it, expect } from "vitest";
import {
  defaultHitContext,
  extensionFromKey,
  manifestLocation,
  normalizeHits,
  storageLocation,
} from "../../src/backends/scope-handlers.js";

const ctx = defaultHitContext();

const fileHit = {
  _index: "alpha",
  _id: "alpha-1",
  _score: 2.5,
  _source: { key: "data/Report.CSV", size: 10, last_modified: "2025-03-01T00:00:00Z", ext: ".csv" },
};

const entryHit = {
  _index: "alpha_packages",
  _score: 1.5,
  _source: {
    entry_pk: "team/genomics@abc123",
    entry_lk: "raw/reads.fastq",
    entry_size: 42,
    entry_metadata: { last_modified: "2025-02-01T00:00:00Z" },
  },
};

const manifestHit = {
  _index: "alpha_packages",
  _id: "m1",
  _score: 3,
  _source: {
    ptr_name: "team/genomics",
    mnfst_hash: "abc123",
    mnfst_stats: { total_bytes: 2048 },
    mnfst_last_modified: "2025-01-15T00:00:00Z",
  },
};

describe("field helpers", () => {
  it("extensionFromKey reads the last segment", () => {
    expect(extensionFromKey("dir.v2/file.TSV")).toBe("tsv");
    expect(extensionFromKey("dir/.env")).toBe("");
    expect(extensionFromKey("dir/trailing.")).toBe("");
    expect(extensionFromKey("README")).toBe("");
  });

  it("storageLocation needs both bucket and key", () => {
    expect(storageLocation("alpha", "/data/a.csv")).toBe("s3://alpha/data/a.csv");
    expect(storageLocation("", "a.csv")).toBeNull();
  });

  it("manifestLocation joins prefix, name and hash", () => {
    expect(manifestLocation("alpha", "team/genomics", "abc123", "/.quilt/packages/")).toBe(
      "s3://alpha/.quilt/packages/team/genomics/abc123.jsonl",
    );
    expect(manifestLocation("alpha", "team/genomics", null, ".quilt/packages")).toBeNull();
  });
});

describe("normalizeHits", () => {
  it("maps file hits to the canonical shape", () => {
    const [result] = normalizeHits([fileHit], "file", ctx);

    expect(result).toEqual({
      id: "alpha-1",
      type: "file",
      name: "data/Report.CSV",
      bucket: "alpha",
      storageLocation: "s3://alpha/data/Report.CSV",
      size: 10,
      extension: "csv",
      score: 2.5,
      backend: "document_search",
      lastModified: "2025-03-01T00:00:00Z",
      metadata: { ...fileHit._source, index: "alpha" },
    });
  });

  it("maps package entries with a synthesized id and package name", () => {
    const [result] = normalizeHits([entryHit], "packageEntry", ctx);

    expect(result?.id).toBe("alpha_packages/team/genomics@abc123");
    expect(result?.name).toBe("raw/reads.fastq");
    expect(result?.extension).toBe("fastq");
    expect(result?.size).toBe(42);
    expect(result?.lastModified).toBe("2025-02-01T00:00:00Z");
    expect(result?.metadata["package_name"]).toBe("team/genomics");
  });

  it("maps manifests to packages with a manifest location", () => {
    const [result] = normalizeHits([manifestHit], "package", ctx);

    expect(result?.type).toBe("package");
    expect(result?.storageLocation).toBe("s3://alpha/.quilt/packages/team/genomics/abc123.jsonl");
    expect(result?.extension).toBe("jsonl");
    expect(result?.size).toBe(2048);
  });

  it("dispatches global hits by index name", () => {
    const results = normalizeHits([fileHit, entryHit, manifestHit], "global", ctx);

    expect(results.map((r) => r.type)).toEqual(["file", "packageEntry", "package"]);
  });

  it("drops hits missing their required field", () => {
    const results = normalizeHits(
      [{ _index: "alpha", _source: { size: 1 } }, "not a hit", { _index: "alpha_packages", _source: {} }],
      "global",
      ctx,
    );

    expect(results).toEqual([]);
  });
});
