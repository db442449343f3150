import type { Command } from "commander";
import type { BackendRegistry, BackendStatusSnapshot } from "../../backends/registry.js";
import type { BackendType } from "../../search/types.js";
import { handleCommandError } from "../../utils/error-boundary.js";
import { createLogger, LogLevel } from "../../utils/logger.js";
import { createEngine } from "../engine.js";
import type { CatalogSearchConfig } from "./config.js";
import { loadConfig } from "./config.js";

// ── Types ────────────────────────────────────────────────────────────────────

/** Structured output from the status command. */
export interface StatusOutput {
  catalogUrl: string | null;
  tokenConfigured: boolean;
  backends: Record<BackendType, BackendStatusSnapshot>;
  authError: boolean;
  text: string;
}

export interface StatusOptions {
  /** Run a health check on every backend before reporting. */
  check: boolean;
  env?: NodeJS.ProcessEnv;
}

// ── Helpers ──────────────────────────────────────────────────────────────────

function capitalize(s: string): string {
  return s.charAt(0).toUpperCase() + s.slice(1);
}

function formatBackendLine(
  type: BackendType,
  snapshot: BackendStatusSnapshot,
  checked: boolean,
): string {
  const label = type.replace("_", " ");
  const detail = snapshot.lastError ? ` (${snapshot.lastError})` : "";
  const probed =
    checked || snapshot.initialized || snapshot.status === "not_registered" ? "" : " [not checked]";
  return `  ${capitalize(label)}: ${snapshot.status}${probed}${detail}`;
}

// ── Main status function ─────────────────────────────────────────────────────

export async function runStatus(
  config: CatalogSearchConfig,
  registry: BackendRegistry,
  options: StatusOptions,
): Promise<StatusOutput> {
  const env = options.env ?? process.env;
  if (options.check) await registry.healthCheckAll();

  const catalogUrl = env["CSEARCH_CATALOG_URL"]?.trim() || config.catalog.url || null;
  const backends = registry.getBackendStatuses();
  const tokenConfigured = Boolean(env["CSEARCH_TOKEN"]?.trim());
  const authError = registry.hasAuthError();

  const lines = [
    "catalog-search status",
    "",
    `  Catalog:  ${catalogUrl ?? "not configured"}`,
    `  Token:    ${tokenConfigured ? "set (CSEARCH_TOKEN)" : "not set"}`,
    "",
    "Backends:",
    formatBackendLine("document_search", backends.document_search, options.check),
    formatBackendLine("catalog_query", backends.catalog_query, options.check),
  ];
  if (authError) {
    lines.push("", "Authentication failed for at least one backend. Check CSEARCH_TOKEN.");
  }

  return {
    catalogUrl,
    tokenConfigured,
    backends,
    authError,
    text: lines.join("\n"),
  };
}

// ── CLI registration ─────────────────────────────────────────────────────────

export function registerStatusCommand(program: Command): void {
  program
    .command("status")
    .description("Show catalog connection and backend status")
    .option("--check", "Probe every backend before reporting", false)
    .action(async (opts: Record<string, boolean | undefined>) => {
      const verbose = program.opts()["verbose"] === true;
      const logger = createLogger({ level: verbose ? LogLevel.DEBUG : LogLevel.INFO });

      try {
        const config = loadConfig(process.cwd());
        const { registry } = createEngine(config, { logger });
        const output = await runStatus(config, registry, { check: opts["check"] === true });
        console.log(output.text);
      } catch (err) {
        process.exitCode = handleCommandError(err, logger, verbose);
      }
    });
}
