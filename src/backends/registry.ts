import type { BackendAdapter } from "./base.js";
import type { BackendStatus, BackendType } from "../search/types.js";
import { errorMessage } from "../utils/errors.js";
import type { Logger } from "../utils/logger.js";
import { silentLogger } from "../utils/logger.js";

export interface BackendStatusSnapshot {
  status: BackendStatus;
  initialized: boolean;
  authError: boolean;
  lastError: string | null;
}

/** Auto-selection order: full-text first, package catalog second. */
export const SELECTION_ORDER: readonly BackendType[] = ["document_search", "catalog_query"];

/** Statuses a fresh health check may clear. */
export const REPROBE_STATUSES: readonly BackendStatus[] = ["error", "timeout"];

/** Holds the registered backends and picks the primary one. */
export class BackendRegistry {
  private readonly backends = new Map<BackendType, BackendAdapter>();
  private readonly logger: Logger;

  constructor(logger: Logger = silentLogger) {
    this.logger = logger;
  }

  register(backend: BackendAdapter): void {
    if (this.backends.has(backend.backendType)) {
      this.logger.warn(`Replacing registered backend ${backend.backendType}`);
    }
    this.backends.set(backend.backendType, backend);
  }

  get(type: BackendType): BackendAdapter | undefined {
    return this.backends.get(type);
  }

  get size(): number {
    return this.backends.size;
  }

  registeredTypes(): BackendType[] {
    return SELECTION_ORDER.filter((t) => this.backends.has(t));
  }

  /**
   * First backend in selection order that is available after initialization.
   * Backends whose last health check errored or timed out are probed again.
   */
  async selectPrimary(): Promise<BackendAdapter | null> {
    for (const type of SELECTION_ORDER) {
      const backend = this.backends.get(type);
      if (!backend) continue;
      await backend.ensureInitialized();
      if (REPROBE_STATUSES.includes(backend.status)) await this.refreshStatus(backend);
      if (backend.status === "available") return backend;
      this.logger.debug(`Skipping ${type}: ${backend.status}`);
    }
    return null;
  }

  /** Snapshot of every backend type, `not_registered` for absent ones. Does not probe. */
  getBackendStatuses(): Record<BackendType, BackendStatusSnapshot> {
    return {
      document_search: this.snapshotOf("document_search"),
      catalog_query: this.snapshotOf("catalog_query"),
    };
  }

  /** True when any registered backend carries the auth-error marker. */
  hasAuthError(): boolean {
    return [...this.backends.values()].some((b) => b.authError);
  }

  /** Probe every registered backend concurrently. */
  async healthCheckAll(): Promise<Partial<Record<BackendType, boolean>>> {
    const results: Partial<Record<BackendType, boolean>> = {};
    await Promise.all(
      [...this.backends.entries()].map(async ([type, backend]) => {
        try {
          results[type] = await backend.healthCheck();
        } catch (err) {
          this.logger.warn(`Health check for ${type} threw: ${errorMessage(err)}`);
          results[type] = false;
        }
      }),
    );
    return results;
  }

  private async refreshStatus(backend: BackendAdapter): Promise<void> {
    this.logger.debug(`Re-probing ${backend.backendType} after status ${backend.status}`);
    try {
      await backend.healthCheck();
    } catch (err) {
      this.logger.warn(`Health check for ${backend.backendType} threw: ${errorMessage(err)}`);
    }
  }

  private snapshotOf(type: BackendType): BackendStatusSnapshot {
    const backend = this.backends.get(type);
    if (!backend) {
      return { status: "not_registered", initialized: false, authError: false, lastError: null };
    }
    return {
      status: backend.status,
      initialized: backend.initialized,
      authError: backend.authError,
      lastError: backend.lastError,
    };
  }
}
