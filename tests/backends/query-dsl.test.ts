import { describe, it, expect } from "vitest";
import {
  buildDocumentQuery,
  buildFilterClauses,
  escapeQueryString,
  toExtensionTerm,
} from "../../src/backends/query-dsl.js";

describe("escapeQueryString", () => {
  it("escapes reserved characters so package names match literally", () => {
    expect(escapeQueryString("team/dataset")).toBe("team\\/dataset");
    expect(escapeQueryString("a:b (c)")).toBe("a\\:b \\(c\\)");
  });

  it("keeps wildcards live", () => {
    expect(escapeQueryString("report*.csv")).toBe("report*.csv");
  });
});

describe("toExtensionTerm", () => {
  it("normalizes to a single leading dot", () => {
    expect(toExtensionTerm("CSV")).toBe(".csv");
    expect(toExtensionTerm(".parquet")).toBe(".parquet");
  });
});

describe("buildFilterClauses", () => {
  it("returns nothing for empty filters", () => {
    expect(buildFilterClauses({})).toEqual([]);
  });

  it("builds extension terms, size and date ranges", () => {
    expect(
      buildFilterClauses({
        extensions: ["csv", ".CSV", "json"],
        sizeMin: 5,
        createdAfter: "2025-01-01T00:00:00.000Z",
      }),
    ).toEqual([
      { terms: { ext: [".csv", ".json"] } },
      { range: { size: { gte: 5 } } },
      { range: { last_modified: { gte: "2025-01-01T00:00:00.000Z" } } },
    ]);
  });
});

describe("buildDocumentQuery", () => {
  it("wraps escaped text and filters in a bool query", () => {
    expect(buildDocumentQuery("team/dataset", { sizeMax: 10 })).toEqual({
      query: {
        bool: {
          must: [{ query_string: { query: "team\\/dataset", analyze_wildcard: true } }],
          filter: [{ range: { size: { lte: 10 } } }],
        },
      },
    });
  });

  it("matches everything for blank text", () => {
    expect(buildDocumentQuery("  ", {}).query.bool.must[0].query_string.query).toBe("*");
  });
});
