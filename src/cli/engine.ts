import { CatalogQueryBackend } from "../backends/catalog-query.js";
import { DocumentSearchBackend } from "../backends/document-search.js";
import { BackendRegistry } from "../backends/registry.js";
import { createGraphQLClient } from "../clients/graphql.js";
import { joinUrl } from "../clients/http.js";
import { SearchOrchestrator } from "../search/orchestrator.js";
import type { SessionProvider } from "../session/session.js";
import { createTokenSession } from "../session/session.js";
import type { Logger } from "../utils/logger.js";
import { TtlCache } from "../utils/ttl-cache.js";
import type { CatalogSearchConfig } from "./commands/config.js";

// ── Types ────────────────────────────────────────────────────────────────────

export interface Engine {
  config: CatalogSearchConfig;
  registry: BackendRegistry;
  orchestrator: SearchOrchestrator;
}

export interface EngineOptions {
  logger: Logger;
  env?: NodeJS.ProcessEnv;
  /** Replaces the token session, e.g. with an in-process fake. */
  session?: SessionProvider;
}

export interface CatalogEndpoints {
  graphql: string;
  search: string;
}

// ── Wiring ───────────────────────────────────────────────────────────────────

/** Catalog URL from `CSEARCH_CATALOG_URL`, else `catalog.url`. */
export function resolveEndpoints(
  config: CatalogSearchConfig,
  env: NodeJS.ProcessEnv,
): CatalogEndpoints | null {
  const base = env["CSEARCH_CATALOG_URL"]?.trim() || config.catalog.url;
  if (!base) return null;
  return {
    graphql: joinUrl(base, config.catalog.graphqlPath),
    search: joinUrl(base, config.catalog.searchPath),
  };
}

/**
 * Build the registry and orchestrator for one CLI invocation. With no
 * catalog URL the registry stays empty and searches report not_applicable.
 */
export function createEngine(config: CatalogSearchConfig, options: EngineOptions): Engine {
  const env = options.env ?? process.env;
  const { logger } = options;
  const registry = new BackendRegistry(logger);
  const endpoints = resolveEndpoints(config, env);

  if (endpoints) {
    const session =
      options.session ??
      createTokenSession({
        graphqlEndpoint: endpoints.graphql,
        token: env["CSEARCH_TOKEN"]?.trim() || null,
      });
    const bucketCache = new TtlCache<string[]>({ ttlMs: config.cache.bucketTtlMs });

    registry.register(
      new DocumentSearchBackend({
        session,
        endpoint: endpoints.search,
        bucketCache,
        packageIndexSuffix: config.documentSearch.packageIndexSuffix,
        manifestPrefix: config.documentSearch.manifestPrefix,
        maxNarrowingRetries: config.documentSearch.maxNarrowingRetries,
        logger,
      }),
    );
    registry.register(
      new CatalogQueryBackend({
        session,
        graphql: createGraphQLClient({
          endpoint: endpoints.graphql,
          headers: () => session.getAuthHeaders(),
        }),
        bucketCache,
        manifestPrefix: config.documentSearch.manifestPrefix,
        logger,
      }),
    );
  } else {
    logger.debug("No catalog URL configured; no backends registered");
  }

  const orchestrator = new SearchOrchestrator({
    registry,
    logger,
    timeoutMs: config.search.timeoutMs,
  });

  return { config, registry, orchestrator };
}
