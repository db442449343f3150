import { describe, it, expect } from "vitest";
import {
  formatCountText,
  formatSearchText,
  parseFilterOption,
  runSearch,
} from "../../src/cli/commands/search.js";
import type { SearchOptions } from "../../src/cli/commands/search.js";
import { BackendRegistry } from "../../src/backends/registry.js";
import { SearchOrchestrator } from "../../src/search/orchestrator.js";
import type { SearchResponse } from "../../src/search/orchestrator.js";
import { ConfigurationError } from "../../src/utils/errors.js";
import { CountingBackend, FakeBackend, makeResult } from "../helpers/fake-backend.js";

// ── Helpers ──────────────────────────────────────────────────────────────────

function orchestratorWith(...backends: FakeBackend[]): SearchOrchestrator {
  const registry = new BackendRegistry();
  for (const backend of backends) registry.register(backend);
  return new SearchOrchestrator({ registry });
}

function options(overrides: Partial<SearchOptions> = {}): SearchOptions {
  return { metadata: false, explain: false, count: false, format: "json", ...overrides };
}

const results = [
  makeResult({ name: "data/a.csv", size: 10, score: 3 }),
  makeResult({ name: "data/b.csv", size: 3, score: 2 }),
];

// ── Tests ────────────────────────────────────────────────────────────────────

describe("csearch search", () => {
  it("returns the JSON response and no text by default", async () => {
    const orchestrator = orchestratorWith(new FakeBackend("document_search", { kind: "results", results }));

    const output = await runSearch(orchestrator, "csv files", options());

    expect(output.success).toBe(true);
    expect(output.text).toBeUndefined();
    expect("results" in output.response ? output.response.results.map((r) => r.name) : []).toEqual([
      "data/a.csv",
      "data/b.csv",
    ]);
  });

  it("passes the filter option through to the search", async () => {
    const orchestrator = orchestratorWith(new FakeBackend("document_search", { kind: "results", results }));

    const output = await runSearch(orchestrator, "csv files", options({ filter: '{"size_min": 5}', format: "text" }));

    expect(output.text?.split("\n")).toContain("1. data/a.csv [file] (score: 1)");
    expect(output.text?.split("\n")).toContain("   bucket: alpha  size: 10 B  ext: csv");
    expect(output.text).not.toContain("data/b.csv");
  });

  it("formats the header with backend, count and timing", async () => {
    const orchestrator = orchestratorWith(new FakeBackend("document_search", { kind: "results", results }));

    const output = await runSearch(orchestrator, "csv files", options({ format: "text" }));

    expect(output.text).toMatch(/^Results for "csv files" \(document_search, 2 results, \d+ms\):\n/);
  });

  it("reports failures with their category", async () => {
    const output = await runSearch(orchestratorWith(), "csv files", options({ format: "text" }));

    expect(output.success).toBe(false);
    expect(output.text).toBe("Search failed [not_applicable]: No backend is registered");
  });

  it("counts instead of searching with --count", async () => {
    const backend = new CountingBackend("document_search");
    backend.total = 42;

    const output = await runSearch(orchestratorWith(backend), "csv files", options({ count: true, format: "text" }));

    expect(output.text).toBe('42 match(es) for "csv files" in scope global');
    expect(backend.calls).toHaveLength(0);
  });

  it("rejects a filter that is not a JSON object", () => {
    expect(parseFilterOption(undefined)).toBeNull();
    expect(parseFilterOption('{"ext":"csv"}')).toEqual({ ext: "csv" });
    expect(() => parseFilterOption("[1]")).toThrow("--filter must be a JSON object");
    expect(() => parseFilterOption("{")).toThrow(ConfigurationError);
  });
});

describe("formatSearchText", () => {
  const base: SearchResponse = {
    success: true,
    query: "reports",
    scope: "global",
    target: "",
    results: [],
    total_results: 0,
    query_time_ms: 4,
    backend_used: "document_search",
    backend_status: {},
  };

  it("says so when nothing matched", () => {
    expect(formatSearchText(base)).toBe('No results for "reports"');
  });

  it("lists skipped buckets and storage locations", () => {
    const text = formatSearchText({
      ...base,
      results: [
        {
          name: "r.csv",
          type: "file",
          bucket: "alpha",
          size: 2048,
          extension: "csv",
          score: 1,
          backend: "document_search",
          relevance: 1,
          storage_location: "s3://alpha/r.csv",
        },
      ],
      total_results: 1,
      backend_status: {
        document_search: { status: "available", result_count: 1, query_time_ms: 3, excluded_buckets: ["beta"] },
      },
    });

    expect(text).toBe(
      [
        'Results for "reports" (document_search, 1 results, 4ms):\n',
        "1. r.csv [file] (score: 1)",
        "   bucket: alpha  size: 2.0 KB  ext: csv",
        "   s3://alpha/r.csv",
        "",
        "Skipped unreadable bucket(s): beta",
      ].join("\n"),
    );
  });
});

describe("formatCountText", () => {
  it("reports count failures", () => {
    expect(
      formatCountText({
        success: false,
        query: "x",
        scope: "global",
        total_count: 0,
        backend_used: null,
        error: "Counting requires the document_search backend",
        error_category: "not_applicable",
      }),
    ).toBe("Count failed [not_applicable]: Counting requires the document_search backend");
  });
});
