import type { Command } from "commander";
import type { CountResponse, SearchResponse, SearchOrchestrator } from "../../search/orchestrator.js";
import type { OutputResult } from "../../search/results.js";
import { ConfigurationError } from "../../utils/errors.js";
import { handleCommandError } from "../../utils/error-boundary.js";
import { isRecord } from "../../utils/guards.js";
import { createLogger, LogLevel } from "../../utils/logger.js";
import { createEngine } from "../engine.js";
import { loadConfig } from "./config.js";

// ── Types ────────────────────────────────────────────────────────────────────

/** Options for the search command. */
export interface SearchOptions {
  scope?: string;
  target?: string;
  backend?: string;
  limit?: number;
  /** JSON object of filters, e.g. `{"extensions":["csv"]}`. */
  filter?: string;
  metadata: boolean;
  explain: boolean;
  count: boolean;
  format: "json" | "text";
}

export interface SearchOutput {
  response: SearchResponse | CountResponse;
  success: boolean;
  text?: string;
}

// ── Helpers ──────────────────────────────────────────────────────────────────

/** Parse the `--filter` JSON argument. */
export function parseFilterOption(raw: string | undefined): Record<string, unknown> | null {
  if (raw === undefined || raw.trim() === "") return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigurationError(
      `--filter must be a JSON object: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  if (!isRecord(parsed)) {
    throw new ConfigurationError("--filter must be a JSON object");
  }
  return parsed;
}

function formatSize(size: number | null): string {
  if (size === null) return "?";
  if (size < 1024) return `${size} B`;
  if (size < 1024 * 1024) return `${(size / 1024).toFixed(1)} KB`;
  if (size < 1024 ** 3) return `${(size / (1024 * 1024)).toFixed(1)} MB`;
  return `${(size / 1024 ** 3).toFixed(1)} GB`;
}

function formatResult(r: OutputResult, index: number): string[] {
  const lines = [`${index + 1}. ${r.name} [${r.type}] (score: ${r.relevance ?? r.score})`];
  const ext = r.extension ? `  ext: ${r.extension}` : "";
  lines.push(`   bucket: ${r.bucket}  size: ${formatSize(r.size)}${ext}`);
  if (r.storage_location) lines.push(`   ${r.storage_location}`);
  lines.push("");
  return lines;
}

export function formatSearchText(response: SearchResponse): string {
  if (!response.success) {
    return `Search failed [${response.error_category ?? "backend_error"}]: ${response.error ?? "unknown error"}`;
  }
  if (response.results.length === 0) {
    return `No results for "${response.query}"`;
  }

  const header =
    `Results for "${response.query}" ` +
    `(${response.backend_used ?? "no backend"}, ${response.total_results} results, ${response.query_time_ms}ms):\n`;
  const lines = [header];
  response.results.forEach((r, i) => lines.push(...formatResult(r, i)));

  const excluded = Object.values(response.backend_status).flatMap((s) => s?.excluded_buckets ?? []);
  if (excluded.length > 0) {
    lines.push(`Skipped unreadable bucket(s): ${excluded.join(", ")}`);
  }
  return lines.join("\n");
}

export function formatCountText(response: CountResponse): string {
  if (!response.success) {
    return `Count failed [${response.error_category ?? "backend_error"}]: ${response.error ?? "unknown error"}`;
  }
  return `${response.total_count} match(es) for "${response.query}" in scope ${response.scope}`;
}

// ── Main search function ─────────────────────────────────────────────────────

/** Run one search (or count) and shape it for output. */
export async function runSearch(
  orchestrator: SearchOrchestrator,
  query: string,
  options: SearchOptions,
): Promise<SearchOutput> {
  const request = {
    query,
    scope: options.scope,
    target: options.target,
    backend: options.backend,
    filters: parseFilterOption(options.filter),
    limit: options.limit,
    includeMetadata: options.metadata,
    explainQuery: options.explain,
  };

  if (options.count) {
    const response = await orchestrator.count(request);
    return {
      response,
      success: response.success,
      text: options.format === "text" ? formatCountText(response) : undefined,
    };
  }

  const response = await orchestrator.search(request);
  return {
    response,
    success: response.success,
    text: options.format === "text" ? formatSearchText(response) : undefined,
  };
}

// ── CLI registration ─────────────────────────────────────────────────────────

function parseLimit(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) {
    throw new ConfigurationError(`--limit must be an integer, got "${value}"`);
  }
  return n;
}

export function registerSearchCommand(program: Command): void {
  program
    .command("search <query>")
    .alias("find")
    .description("Search files and packages across the catalog")
    .option("-s, --scope <scope>", "file, package, packageEntry or global")
    .option("-t, --target <bucket>", "Restrict to one bucket")
    .option("-b, --backend <backend>", "auto, document_search or catalog_query")
    .option("-l, --limit <n>", "Maximum number of results")
    .option("--filter <json>", "Filters as a JSON object")
    .option("-m, --metadata", "Include ids, locations, metadata and analysis", false)
    .option("--explain", "Include an explanation of how the query ran", false)
    .option("--count", "Return only the number of matches", false)
    .option("-f, --format <fmt>", "Output format: json|text", "json")
    .action(async (query: string, opts: Record<string, string | boolean | undefined>) => {
      const verbose = program.opts()["verbose"] === true;
      const logger = createLogger({ level: verbose ? LogLevel.DEBUG : LogLevel.INFO });

      try {
        const config = loadConfig(process.cwd());
        const { orchestrator } = createEngine(config, { logger });
        const str = (key: string): string | undefined => {
          const value = opts[key];
          return typeof value === "string" ? value : undefined;
        };
        const limitRaw = str("limit");

        const output = await runSearch(orchestrator, query, {
          scope: str("scope") ?? config.search.defaultScope,
          target: str("target"),
          backend: str("backend") ?? config.search.backend,
          limit: limitRaw === undefined ? config.search.defaultLimit : parseLimit(limitRaw),
          filter: str("filter"),
          metadata: opts["metadata"] === true,
          explain: opts["explain"] === true,
          count: opts["count"] === true,
          format: str("format") === "text" ? "text" : "json",
        });

        console.log(output.text ?? JSON.stringify(output.response, null, 2));
        if (!output.success) process.exitCode = 1;
      } catch (err) {
        process.exitCode = handleCommandError(err, logger, verbose);
      }
    });
}
