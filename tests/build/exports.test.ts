import { describe, it, expect } from "vitest";

describe("library entry", () => {
  it("exports key functions and classes", async () => {
    const lib = await import("../../src/index.js");

    expect(typeof lib.SearchOrchestrator).toBe("function");
    expect(typeof lib.BackendRegistry).toBe("function");
    expect(typeof lib.DocumentSearchBackend).toBe("function");
    expect(typeof lib.CatalogQueryBackend).toBe("function");
    expect(typeof lib.analyzeQuery).toBe("function");
    expect(typeof lib.buildIndexPatternForScope).toBe("function");
    expect(typeof lib.createGraphQLClient).toBe("function");
    expect(typeof lib.createTokenSession).toBe("function");
    expect(typeof lib.createLogger).toBe("function");
    expect(lib.SEARCH_SCOPES).toEqual(["file", "package", "packageEntry", "global"]);
    expect(lib.DEFAULT_LIMIT).toBe(50);
  });
});
