import { describe, it, expect } from "vitest";
import {
  CatalogQueryBackend,
  SEARCH_PACKAGES_QUERY,
  buildPackagesFilter,
  buildSearchVariables,
  bucketsFromFilters,
  parseSearchPackages,
} from "../../src/backends/catalog-query.js";
import type { GraphQLClient } from "../../src/clients/graphql.js";
import type { SessionProvider } from "../../src/session/session.js";
import { AuthenticationError, BackendTimeoutError } from "../../src/utils/errors.js";

// ── Fakes ────────────────────────────────────────────────────────────────────

interface RecordedCall {
  document: string;
  variables: Record<string, unknown>;
}

class FakeGraphQLClient implements GraphQLClient {
  readonly endpoint = "https://catalog.test/graphql";
  readonly calls: RecordedCall[] = [];

  constructor(private readonly reply: () => Promise<Record<string, unknown>>) {}

  query(document: string, variables: Record<string, unknown>): Promise<Record<string, unknown>> {
    this.calls.push({ document, variables });
    return this.reply();
  }
}

function session(available = true, buckets: string[] = ["alpha", "beta"]): SessionProvider {
  return {
    isAvailable: () => available,
    getAuthHeaders: () => ({}),
    listAccessibleBuckets: async () => buckets,
  };
}

function resultSet(nodes: Array<Record<string, unknown>>, total = nodes.length): Record<string, unknown> {
  return {
    searchPackages: {
      __typename: "PackagesSearchResultSet",
      total,
      page: {
        edges: nodes.map((node, i) => ({ cursor: `c${i}`, node })),
        pageInfo: { endCursor: "c-end", hasNextPage: false },
      },
    },
  };
}

const genomics = {
  bucket: "alpha",
  name: "team/genomics",
  hash: "abc123",
  modified: "2025-02-01T00:00:00Z",
  size: 2048,
  comment: "initial upload",
  score: 4.2,
};

// ── Variable builders ────────────────────────────────────────────────────────

describe("bucketsFromFilters", () => {
  it("treats bucket as a string, a one-element list, or buckets the same way", () => {
    expect(bucketsFromFilters({ bucket: "alpha" })).toEqual(["alpha"]);
    expect(bucketsFromFilters({ bucket: ["alpha"] })).toEqual(["alpha"]);
    expect(bucketsFromFilters({ buckets: ["alpha"] })).toEqual(["alpha"]);
  });

  it("returns null when no bucket filter is set", () => {
    expect(bucketsFromFilters({ extensions: ["csv"] })).toBeNull();
  });
});

describe("buildSearchVariables", () => {
  it("maps size and date bounds to the package filter", () => {
    expect(
      buildPackagesFilter({ sizeMin: 10, createdBefore: "2025-01-01T00:00:00.000Z" }),
    ).toEqual({ size: { gte: 10 }, modified: { lte: "2025-01-01T00:00:00.000Z" } });
    expect(buildPackagesFilter({ extensions: ["csv"] })).toBeNull();
  });

  it("sends a null search string for match-all", () => {
    expect(buildSearchVariables("*", ["alpha"], {}, 5)).toEqual({
      buckets: ["alpha"],
      searchString: null,
      filter: null,
      first: 5,
      after: null,
    });
    expect(buildSearchVariables(" genomics ", ["alpha"], {}, 5).searchString).toBe("genomics");
  });
});

// ── Response parsing ─────────────────────────────────────────────────────────

describe("parseSearchPackages", () => {
  it("converts nodes into package results", () => {
    const page = parseSearchPackages(resultSet([genomics], 3), ".quilt/packages");

    expect(page.total).toBe(3);
    expect(page.endCursor).toBe("c-end");
    expect(page.results).toEqual([
      {
        id: "alpha/team/genomics@abc123",
        type: "package",
        name: "team/genomics",
        bucket: "alpha",
        storageLocation: "s3://alpha/.quilt/packages/team/genomics/abc123.jsonl",
        size: 2048,
        extension: "",
        score: 4.2,
        backend: "catalog_query",
        lastModified: "2025-02-01T00:00:00Z",
        metadata: { revision: "abc123", comment: "initial upload" },
      },
    ]);
  });

  it("handles the empty and error union members", () => {
    expect(
      parseSearchPackages({ searchPackages: { __typename: "EmptySearchResultSet" } }, "p").results,
    ).toEqual([]);
    expect(() =>
      parseSearchPackages(
        {
          searchPackages: {
            __typename: "InvalidInput",
            errors: [{ path: "searchString", message: "Syntax error" }],
          },
        },
        "p",
      ),
    ).toThrow("Syntax error");
    expect(() =>
      parseSearchPackages({ searchPackages: { __typename: "OperationError", message: "Index missing" } }, "p"),
    ).toThrow("Index missing");
  });
});

// ── Backend ──────────────────────────────────────────────────────────────────

describe("CatalogQueryBackend", () => {
  it("queries every accessible bucket by default", async () => {
    const graphql = new FakeGraphQLClient(async () => resultSet([genomics]));
    const backend = new CatalogQueryBackend({ session: session(), graphql });

    const response = await backend.search("genomics", "package", "", {}, 10);

    expect(response.status).toBe("available");
    expect(response.results.map((r) => r.id)).toEqual(["alpha/team/genomics@abc123"]);
    expect(graphql.calls[0]?.document).toBe(SEARCH_PACKAGES_QUERY);
    expect(graphql.calls[0]?.variables["buckets"]).toEqual(["alpha", "beta"]);
  });

  it("sends the same bucket list for every bucket filter spelling", async () => {
    const graphql = new FakeGraphQLClient(async () => resultSet([]));
    const backend = new CatalogQueryBackend({ session: session(), graphql });

    await backend.search("*", "package", "", { bucket: "alpha" }, 10);
    await backend.search("*", "package", "", { bucket: ["alpha"] }, 10);
    await backend.search("*", "package", "", { buckets: ["alpha"] }, 10);

    expect(graphql.calls.map((c) => c.variables["buckets"])).toEqual([["alpha"], ["alpha"], ["alpha"]]);
  });

  it("prefers the target over filters", async () => {
    const graphql = new FakeGraphQLClient(async () => resultSet([]));
    const backend = new CatalogQueryBackend({ session: session(), graphql });

    await backend.search("*", "global", "s3://beta", { bucket: "alpha" }, 10);

    expect(graphql.calls[0]?.variables["buckets"]).toEqual(["beta"]);
  });

  it("returns nothing for file and entry scopes without querying", async () => {
    const graphql = new FakeGraphQLClient(async () => resultSet([genomics]));
    const backend = new CatalogQueryBackend({ session: session(), graphql });

    const response = await backend.search("genomics", "file", "", {}, 10);

    expect(response.status).toBe("available");
    expect(response.results).toEqual([]);
    expect(graphql.calls).toHaveLength(0);
  });

  it("truncates to the limit", async () => {
    const graphql = new FakeGraphQLClient(async () =>
      resultSet([genomics, { ...genomics, name: "team/other", hash: "def456" }]),
    );
    const backend = new CatalogQueryBackend({ session: session(), graphql });

    const response = await backend.search("team", "package", "", {}, 1);

    expect(response.results).toHaveLength(1);
  });

  it("reports unavailable with the auth marker without a session", async () => {
    const graphql = new FakeGraphQLClient(async () => resultSet([]));
    const backend = new CatalogQueryBackend({ session: session(false), graphql });

    const response = await backend.search("genomics", "package", "", {}, 10);

    expect(response.status).toBe("unavailable");
    expect(backend.authError).toBe(true);
  });

  it("maps transport failures to statuses", async () => {
    const rejected = new CatalogQueryBackend({
      session: session(),
      graphql: new FakeGraphQLClient(async () => {
        throw new AuthenticationError("GraphQL query not authorized");
      }),
    });
    const slow = new CatalogQueryBackend({
      session: session(),
      graphql: new FakeGraphQLClient(async () => {
        throw new BackendTimeoutError("catalog_query did not respond within 5ms", 5);
      }),
    });

    expect((await rejected.search("x", "package", "", {}, 10)).status).toBe("unavailable");
    expect((await slow.search("x", "package", "", {}, 10)).status).toBe("timeout");
  });
});
