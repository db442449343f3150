import { createGraphQLClient } from "../clients/graphql.js";
import { AuthenticationError, BackendQueryError } from "../utils/errors.js";
import { isRecord, readArray, readText } from "../utils/guards.js";

// ── Types ────────────────────────────────────────────────────────────────────

/**
 * Authentication/session collaborator. Supplies request headers for a
 * validated session and the buckets that session may read.
 */
export interface SessionProvider {
  isAvailable(): boolean;
  getAuthHeaders(): Record<string, string>;
  listAccessibleBuckets(signal?: AbortSignal): Promise<string[]>;
}

export interface TokenSessionOptions {
  /** Catalog GraphQL endpoint used to enumerate buckets. */
  graphqlEndpoint: string | null;
  /** Bearer token. Read from the environment, never from config files. */
  token: string | null;
}

// ── Constants ────────────────────────────────────────────────────────────────

export const LIST_BUCKETS_QUERY = `query ListBuckets {
  bucketConfigs {
    name
  }
}`;

// ── Parsing ──────────────────────────────────────────────────────────────────

/** Extract bucket names from a `bucketConfigs` response, skipping unnamed entries. */
export function parseBucketConfigs(data: Record<string, unknown>): string[] {
  const configs = readArray(data, "bucketConfigs");
  if (configs === null) {
    throw new BackendQueryError("bucketConfigs missing from catalog response");
  }

  const names: string[] = [];
  for (const entry of configs) {
    if (!isRecord(entry)) continue;
    const name = readText(entry, "name");
    if (name) names.push(name);
  }
  return names;
}

// ── Token session ────────────────────────────────────────────────────────────

/** Session backed by a static bearer token; buckets come from the catalog's `bucketConfigs`. */
export function createTokenSession(options: TokenSessionOptions): SessionProvider {
  const { graphqlEndpoint, token } = options;
  const headers = (): Record<string, string> =>
    token ? { Authorization: `Bearer ${token}` } : {};

  const client = graphqlEndpoint
    ? createGraphQLClient({ endpoint: graphqlEndpoint, headers })
    : null;

  return {
    isAvailable(): boolean {
      return Boolean(token) && client !== null;
    },

    getAuthHeaders(): Record<string, string> {
      return headers();
    },

    async listAccessibleBuckets(signal?: AbortSignal): Promise<string[]> {
      if (!token || client === null) {
        throw new AuthenticationError("No catalog session: set CSEARCH_TOKEN and catalog.url");
      }
      const data = await client.query(LIST_BUCKETS_QUERY, {}, signal);
      return parseBucketConfigs(data);
    },
  };
}
