import type { Command } from "commander";
import type { SearchOrchestrator } from "../../search/orchestrator.js";
import type { DryRunExplanation } from "../../steering/explain.js";
import { handleCommandError } from "../../utils/error-boundary.js";
import { createLogger, LogLevel } from "../../utils/logger.js";
import { createEngine } from "../engine.js";
import { loadConfig } from "./config.js";
import { parseFilterOption } from "./search.js";

// ── Types ────────────────────────────────────────────────────────────────────

export interface ExplainOptions {
  scope?: string;
  backend?: string;
  filter?: string;
  format: "json" | "text";
}

export interface ExplainOutput {
  explanation: DryRunExplanation;
  text?: string;
}

// ── Formatting ───────────────────────────────────────────────────────────────

export function formatExplainText(query: string, e: DryRunExplanation): string {
  const analysis = e.query_analysis;
  const lines = [
    `Query: "${query}"`,
    `Type: ${analysis.query_type} (confidence ${analysis.confidence})`,
    `Keywords: ${analysis.keywords.length > 0 ? analysis.keywords.join(", ") : "(none)"}`,
    `Search text: ${e.search_text}`,
    `Scope: ${e.scope}`,
    `Complexity: ${e.complexity}`,
  ];

  const filters = Object.entries(analysis.filters);
  if (filters.length > 0) {
    lines.push("Filters:");
    for (const [key, value] of filters) {
      lines.push(`  ${key}: ${Array.isArray(value) ? value.join(", ") : String(value)}`);
    }
  }

  lines.push(`Backend: ${e.backend_selection.selected ?? "none"} (${e.backend_selection.rationale})`);

  if (e.suggestions.length > 0) {
    lines.push("Suggestions:");
    for (const s of e.suggestions) lines.push(`  - ${s}`);
  }
  return lines.join("\n");
}

// ── Main explain function ────────────────────────────────────────────────────

/** Explain how a query would be run, without running it. */
export function runExplain(
  orchestrator: SearchOrchestrator,
  query: string,
  options: ExplainOptions,
): ExplainOutput {
  const explanation = orchestrator.explain({
    query,
    scope: options.scope,
    backend: options.backend,
    filters: parseFilterOption(options.filter),
  });
  return {
    explanation,
    text: options.format === "text" ? formatExplainText(query, explanation) : undefined,
  };
}

// ── CLI registration ─────────────────────────────────────────────────────────

export function registerExplainCommand(program: Command): void {
  program
    .command("explain <query>")
    .description("Show how a query would be classified and routed")
    .option("-s, --scope <scope>", "file, package, packageEntry or global")
    .option("-b, --backend <backend>", "auto, document_search or catalog_query")
    .option("--filter <json>", "Filters as a JSON object")
    .option("-f, --format <fmt>", "Output format: json|text", "text")
    .action((query: string, opts: Record<string, string | undefined>) => {
      const verbose = program.opts()["verbose"] === true;
      const logger = createLogger({ level: verbose ? LogLevel.DEBUG : LogLevel.INFO });

      try {
        const config = loadConfig(process.cwd());
        const { orchestrator } = createEngine(config, { logger });
        const output = runExplain(orchestrator, query, {
          scope: opts["scope"] ?? config.search.defaultScope,
          backend: opts["backend"] ?? config.search.backend,
          filter: opts["filter"],
          format: opts["format"] === "json" ? "json" : "text",
        });
        console.log(output.text ?? JSON.stringify(output.explanation, null, 2));
      } catch (err) {
        process.exitCode = handleCommandError(err, logger, verbose);
      }
    });
}
