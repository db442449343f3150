export { SearchOrchestrator, DEFAULT_LIMIT, DEFAULT_TIMEOUT_MS } from "./search/orchestrator.js";
export type {
  CountResponse,
  OrchestratorOptions,
  SearchRequest,
  SearchResponse,
  BackendStatusEntry,
} from "./search/orchestrator.js";
export type { OutputResult } from "./search/results.js";
export * from "./search/types.js";

export { analyzeQuery, searchTextFor } from "./steering/analyze.js";
export type { DryRunExplanation, Explanation } from "./steering/explain.js";

export type { BackendAdapter, BackendSearchOptions } from "./backends/base.js";
export { BaseBackend } from "./backends/base.js";
export { BackendRegistry } from "./backends/registry.js";
export type { BackendStatusSnapshot } from "./backends/registry.js";
export { DocumentSearchBackend } from "./backends/document-search.js";
export type { DocumentSearchBackendOptions } from "./backends/document-search.js";
export { CatalogQueryBackend } from "./backends/catalog-query.js";
export type { CatalogQueryBackendOptions } from "./backends/catalog-query.js";
export { buildIndexPatternForScope, normalizeBucketName } from "./backends/index-pattern.js";

export { createGraphQLClient } from "./clients/graphql.js";
export type { GraphQLClient } from "./clients/graphql.js";
export { createTokenSession } from "./session/session.js";
export type { SessionProvider } from "./session/session.js";

export { TtlCache } from "./utils/ttl-cache.js";
export { createLogger, LogLevel, silentLogger } from "./utils/logger.js";
export type { Logger } from "./utils/logger.js";
export * from "./utils/errors.js";
