import { postJson } from "./http.js";
import {
  AuthenticationError,
  BackendQueryError,
  HttpStatusError,
} from "../utils/errors.js";
import { isRecord, readArray, readString } from "../utils/guards.js";

// ── Types ────────────────────────────────────────────────────────────────────

/** Minimal GraphQL transport: returns the `data` object or throws. */
export interface GraphQLClient {
  readonly endpoint: string;
  query(
    document: string,
    variables: Record<string, unknown>,
    signal?: AbortSignal,
  ): Promise<Record<string, unknown>>;
}

export interface GraphQLClientOptions {
  endpoint: string;
  /** Called per request so refreshed credentials are picked up. */
  headers: () => Record<string, string>;
}

// ── Helpers ──────────────────────────────────────────────────────────────────

function formatGraphQLErrors(errors: unknown[]): string {
  return errors
    .map((e) => (isRecord(e) ? readString(e, "message") : null) ?? JSON.stringify(e))
    .join("; ");
}

// ── Factory ──────────────────────────────────────────────────────────────────

export function createGraphQLClient(options: GraphQLClientOptions): GraphQLClient {
  return {
    endpoint: options.endpoint,

    async query(document, variables, signal) {
      let payload: unknown;
      try {
        payload = await postJson(
          options.endpoint,
          { query: document, variables },
          { headers: options.headers(), signal },
        );
      } catch (err) {
        if (err instanceof HttpStatusError && (err.status === 401 || err.status === 403)) {
          throw new AuthenticationError("GraphQL query not authorized", err);
        }
        throw err;
      }

      if (!isRecord(payload)) {
        throw new BackendQueryError("GraphQL response was not a JSON object");
      }

      const errors = readArray(payload, "errors");
      if (errors && errors.length > 0) {
        throw new BackendQueryError(`GraphQL query failed: ${formatGraphQLErrors(errors)}`);
      }

      const data = payload["data"];
      if (!isRecord(data)) {
        throw new BackendQueryError("GraphQL response has no data");
      }
      return data;
    },
  };
}
