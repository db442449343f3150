import { describe, it, expect } from "vitest";
import { runExplain } from "../../src/cli/commands/explain.js";
import { BackendRegistry } from "../../src/backends/registry.js";
import { SearchOrchestrator } from "../../src/search/orchestrator.js";
import { ConfigurationError } from "../../src/utils/errors.js";

describe("csearch explain", () => {
  const orchestrator = new SearchOrchestrator({ registry: new BackendRegistry() });

  it("formats the dry run as text", () => {
    const output = runExplain(orchestrator, "csv files", { format: "text" });

    expect(output.text).toBe(
      [
        'Query: "csv files"',
        "Type: file_search (confidence 0.4)",
        "Keywords: csv",
        "Search text: *",
        "Scope: global",
        "Complexity: moderate",
        "Filters:",
        "  extensions: csv",
        "Backend: none (No backend is registered)",
        "Suggestions:",
        '  - Add a size bound such as "larger than 100mb" to narrow file results',
        '  - Add a time window such as "last 30 days" to focus on recent data',
      ].join("\n"),
    );
  });

  it("returns the structured explanation for json", () => {
    const output = runExplain(orchestrator, "csv files", { format: "json", filter: '{"bucket":"alpha"}' });

    expect(output.text).toBeUndefined();
    expect(output.explanation.query_analysis.filters).toEqual({ extensions: ["csv"], bucket: "alpha" });
  });

  it("rejects an invalid scope", () => {
    expect(() => runExplain(orchestrator, "csv files", { format: "text", scope: "folder" })).toThrow(
      ConfigurationError,
    );
  });
});
