import type { Command } from "commander";
import fs from "node:fs";
import path from "node:path";
import type { BackendPreference, SearchScope } from "../../search/types.js";
import { isBackendPreference, isSearchScope } from "../../search/types.js";
import { ConfigurationError } from "../../utils/errors.js";
import { handleCommandError } from "../../utils/error-boundary.js";
import { isRecord } from "../../utils/guards.js";
import { createLogger, LogLevel } from "../../utils/logger.js";

// ── Types ────────────────────────────────────────────────────────────────────

/** Project-level configuration stored in .csearch/config.json. */
export interface CatalogSearchConfig {
  catalog: {
    /** Catalog base URL. `CSEARCH_CATALOG_URL` overrides it. */
    url: string | null;
    graphqlPath: string;
    searchPath: string;
  };
  search: {
    defaultLimit: number;
    defaultScope: SearchScope;
    backend: BackendPreference;
    timeoutMs: number;
  };
  documentSearch: {
    packageIndexSuffix: string;
    manifestPrefix: string;
    maxNarrowingRetries: number;
  };
  cache: {
    bucketTtlMs: number;
  };
}

export interface ConfigShowOutput {
  config: CatalogSearchConfig;
  text: string;
}

// ── Constants ────────────────────────────────────────────────────────────────

export const CONFIG_DIR = ".csearch";
const CONFIG_FILENAME = "config.json";

/** Default configuration values for a new project. */
export const DEFAULT_CONFIG: CatalogSearchConfig = {
  catalog: {
    url: null,
    graphqlPath: "/graphql",
    searchPath: "/api/search",
  },
  search: {
    defaultLimit: 50,
    defaultScope: "global",
    backend: "auto",
    timeoutMs: 30_000,
  },
  documentSearch: {
    packageIndexSuffix: "_packages",
    manifestPrefix: ".quilt/packages",
    maxNarrowingRetries: 3,
  },
  cache: {
    bucketTtlMs: 5 * 60 * 1000,
  },
};

// ── Validation ───────────────────────────────────────────────────────────────

const isPositiveInt = (v: unknown): v is number =>
  typeof v === "number" && Number.isInteger(v) && v > 0;
const isNonNegativeInt = (v: unknown): v is number =>
  typeof v === "number" && Number.isInteger(v) && v >= 0;
const isNonEmptyString = (v: unknown): v is string => typeof v === "string" && v.trim().length > 0;
const isPath = (v: unknown): v is string => typeof v === "string" && v.startsWith("/");
const isNullableUrl = (v: unknown): v is string | null =>
  v === null || (typeof v === "string" && /^https?:\/\/\S+$/.test(v));

interface ValidationRule {
  validate: (value: unknown) => boolean;
  message: string;
}

/** Every settable key. Keys absent here are rejected by `config set`. */
const VALIDATION_RULES: Record<string, ValidationRule> = {
  "catalog.url": { validate: isNullableUrl, message: "Must be null or an http(s) URL" },
  "catalog.graphqlPath": { validate: isPath, message: "Must be a path starting with /" },
  "catalog.searchPath": { validate: isPath, message: "Must be a path starting with /" },
  "search.defaultLimit": { validate: isPositiveInt, message: "Must be a positive integer" },
  "search.defaultScope": {
    validate: isSearchScope,
    message: "Must be one of: file, package, packageEntry, global",
  },
  "search.backend": {
    validate: isBackendPreference,
    message: "Must be one of: auto, document_search, catalog_query",
  },
  "search.timeoutMs": { validate: isPositiveInt, message: "Must be a positive integer" },
  "documentSearch.packageIndexSuffix": {
    validate: isNonEmptyString,
    message: "Must be a non-empty string",
  },
  "documentSearch.manifestPrefix": { validate: isNonEmptyString, message: "Must be a non-empty string" },
  "documentSearch.maxNarrowingRetries": {
    validate: isNonNegativeInt,
    message: "Must be a non-negative integer",
  },
  "cache.bucketTtlMs": { validate: isNonNegativeInt, message: "Must be a non-negative integer" },
};

// ── Helpers ──────────────────────────────────────────────────────────────────

function resolveConfigDir(projectPath: string): string {
  return path.join(path.resolve(projectPath), CONFIG_DIR);
}

function configPath(configDir: string): string {
  return path.join(configDir, CONFIG_FILENAME);
}

function getNestedValue(obj: unknown, key: string): unknown {
  let current: unknown = obj;
  for (const part of key.split(".")) {
    if (!isRecord(current)) return undefined;
    current = current[part];
  }
  return current;
}

function setNestedValue(obj: Record<string, unknown>, key: string, value: unknown): void {
  const parts = key.split(".");
  let current = obj;

  for (const part of parts.slice(0, -1)) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]] = value;
}

/** Value at `key` in `raw`, or `fallback` when absent. Present-but-invalid values throw. */
function pick<T>(raw: unknown, key: string, fallback: T, guard: (v: unknown) => v is T): T {
  const value = getNestedValue(raw, key);
  if (value === undefined) return fallback;
  if (!guard(value)) {
    const rule = VALIDATION_RULES[key];
    throw new ConfigurationError(
      `Invalid value for "${key}" in ${CONFIG_DIR}/${CONFIG_FILENAME}: ${rule?.message ?? "wrong type"}`,
    );
  }
  return value;
}

/** Merge a parsed config file over the defaults, validating every known key. */
export function mergeWithDefaults(raw: unknown): CatalogSearchConfig {
  const d = DEFAULT_CONFIG;
  return {
    catalog: {
      url: pick(raw, "catalog.url", d.catalog.url, isNullableUrl),
      graphqlPath: pick(raw, "catalog.graphqlPath", d.catalog.graphqlPath, isPath),
      searchPath: pick(raw, "catalog.searchPath", d.catalog.searchPath, isPath),
    },
    search: {
      defaultLimit: pick(raw, "search.defaultLimit", d.search.defaultLimit, isPositiveInt),
      defaultScope: pick(raw, "search.defaultScope", d.search.defaultScope, isSearchScope),
      backend: pick(raw, "search.backend", d.search.backend, isBackendPreference),
      timeoutMs: pick(raw, "search.timeoutMs", d.search.timeoutMs, isPositiveInt),
    },
    documentSearch: {
      packageIndexSuffix: pick(
        raw,
        "documentSearch.packageIndexSuffix",
        d.documentSearch.packageIndexSuffix,
        isNonEmptyString,
      ),
      manifestPrefix: pick(
        raw,
        "documentSearch.manifestPrefix",
        d.documentSearch.manifestPrefix,
        isNonEmptyString,
      ),
      maxNarrowingRetries: pick(
        raw,
        "documentSearch.maxNarrowingRetries",
        d.documentSearch.maxNarrowingRetries,
        isNonNegativeInt,
      ),
    },
    cache: {
      bucketTtlMs: pick(raw, "cache.bucketTtlMs", d.cache.bucketTtlMs, isNonNegativeInt),
    },
  };
}

function readRawConfig(configDir: string): Record<string, unknown> {
  const filePath = configPath(configDir);
  if (!fs.existsSync(filePath)) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new ConfigurationError(
      `${CONFIG_DIR}/${CONFIG_FILENAME} is not valid JSON`,
      err instanceof Error ? err : undefined,
    );
  }
  if (!isRecord(parsed)) {
    throw new ConfigurationError(`${CONFIG_DIR}/${CONFIG_FILENAME} must contain a JSON object`);
  }
  return parsed;
}

function writeConfig(configDir: string, config: CatalogSearchConfig): void {
  fs.mkdirSync(configDir, { recursive: true });
  fs.writeFileSync(configPath(configDir), JSON.stringify(config, null, 2) + "\n");
}

function parseValue(rawValue: string): unknown {
  if (rawValue === "null") return null;

  if (rawValue === "true") return true;
  if (rawValue === "false") return false;

  const num = Number(rawValue);
  if (!Number.isNaN(num) && rawValue.trim() !== "") return num;

  if (rawValue.startsWith("[") || rawValue.startsWith("{")) {
    try {
      const parsed: unknown = JSON.parse(rawValue);
      return parsed;
    } catch {
      return rawValue;
    }
  }

  return rawValue;
}

// ── Public API ───────────────────────────────────────────────────────────────

/** Load the project configuration, or the defaults when no file exists. Never writes. */
export function loadConfig(projectPath: string): CatalogSearchConfig {
  return mergeWithDefaults(readRawConfig(resolveConfigDir(projectPath)));
}

/** Read and return the full project configuration. */
export function runConfigShow(projectPath: string): ConfigShowOutput {
  const config = loadConfig(projectPath);
  return {
    config,
    text: JSON.stringify(config, null, 2),
  };
}

/** Get a config value by dot-notation key (e.g., "search.defaultLimit"). */
export function runConfigGet(projectPath: string, key: string): unknown {
  return getNestedValue(loadConfig(projectPath), key);
}

/** Set a config value by dot-notation key. Unknown keys and invalid values are rejected. */
export function runConfigSet(projectPath: string, key: string, rawValue: string): void {
  const rule = VALIDATION_RULES[key];
  if (!rule) {
    throw new ConfigurationError(
      `Unknown config key "${key}". Known keys: ${Object.keys(VALIDATION_RULES).join(", ")}`,
    );
  }

  const value = parseValue(rawValue);
  if (!rule.validate(value)) {
    throw new ConfigurationError(`Invalid value for "${key}": ${rule.message}`);
  }

  const configDir = resolveConfigDir(projectPath);
  const raw = readRawConfig(configDir);
  setNestedValue(raw, key, value);
  writeConfig(configDir, mergeWithDefaults(raw));
}

/** Reset all configuration to defaults. */
export function runConfigReset(projectPath: string): void {
  writeConfig(resolveConfigDir(projectPath), structuredClone(DEFAULT_CONFIG));
}

// ── CLI registration ─────────────────────────────────────────────────────────

export function registerConfigCommand(program: Command): void {
  const cmd = program
    .command("config")
    .description("Show or modify configuration");

  function configErrorHandler(err: unknown): void {
    const verbose = program.opts()["verbose"] === true;
    const logger = createLogger({ level: verbose ? LogLevel.DEBUG : LogLevel.INFO });
    process.exitCode = handleCommandError(err, logger, verbose);
  }

  cmd
    .command("show")
    .description("Show current configuration")
    .action(() => {
      try {
        const output = runConfigShow(process.cwd());
        console.log(output.text);
      } catch (err) {
        configErrorHandler(err);
      }
    });

  cmd
    .command("get <key>")
    .description("Get a configuration value (dot notation)")
    .action((key: string) => {
      try {
        const value = runConfigGet(process.cwd(), key);
        console.log(
          typeof value === "object" && value !== null
            ? JSON.stringify(value, null, 2)
            : String(value),
        );
      } catch (err) {
        configErrorHandler(err);
      }
    });

  cmd
    .command("set <key> <value>")
    .description("Set a configuration value (dot notation)")
    .action((key: string, value: string) => {
      try {
        runConfigSet(process.cwd(), key, value);
        console.log(`Set ${key} = ${value}`);
      } catch (err) {
        configErrorHandler(err);
      }
    });

  cmd
    .command("reset")
    .description("Reset configuration to defaults")
    .action(() => {
      try {
        runConfigReset(process.cwd());
        console.log("Configuration reset to defaults.");
      } catch (err) {
        configErrorHandler(err);
      }
    });
}
