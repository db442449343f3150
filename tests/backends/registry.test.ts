import { describe, it, expect, vi, afterEach, type MockInstance } from "vitest";
import { BackendRegistry } from "../../src/backends/registry.js";
import { createLogger, LogLevel } from "../../src/utils/logger.js";
import { FakeBackend } from "../helpers/fake-backend.js";

describe("BackendRegistry", () => {
  let stderrSpy: MockInstance<typeof process.stderr.write> | undefined;

  afterEach(() => {
    stderrSpy?.mockRestore();
  });

  it("reports every backend type, not_registered when absent", () => {
    const registry = new BackendRegistry();
    registry.register(new FakeBackend("catalog_query"));

    expect(registry.getBackendStatuses()).toEqual({
      document_search: { status: "not_registered", initialized: false, authError: false, lastError: null },
      catalog_query: { status: "unavailable", initialized: false, authError: false, lastError: null },
    });
    expect(registry.registeredTypes()).toEqual(["catalog_query"]);
  });

  it("prefers document_search when it is available", async () => {
    const registry = new BackendRegistry();
    registry.register(new FakeBackend("catalog_query"));
    registry.register(new FakeBackend("document_search"));

    const primary = await registry.selectPrimary();

    expect(primary?.backendType).toBe("document_search");
  });

  it("falls back to catalog_query when document_search is unavailable", async () => {
    const registry = new BackendRegistry();
    registry.register(new FakeBackend("document_search", undefined, false));
    registry.register(new FakeBackend("catalog_query"));

    const primary = await registry.selectPrimary();

    expect(primary?.backendType).toBe("catalog_query");
    expect(registry.hasAuthError()).toBe(true);
  });

  it("returns null when nothing is available", async () => {
    const registry = new BackendRegistry();
    registry.register(new FakeBackend("document_search", undefined, false));

    expect(await registry.selectPrimary()).toBeNull();
    expect(registry.getBackendStatuses().document_search.initialized).toBe(true);
  });

  it("probes a backend again after its health check errored", async () => {
    const registry = new BackendRegistry();
    const backend = new FakeBackend("document_search");
    backend.healthError = "catalog down";
    registry.register(backend);

    expect(await registry.selectPrimary()).toBeNull();
    expect(backend.status).toBe("error");

    backend.healthError = null;
    const primary = await registry.selectPrimary();

    expect(primary?.backendType).toBe("document_search");
    expect(backend.healthChecks).toBe(3);
  });

  it("does not probe again for a missing session", async () => {
    const registry = new BackendRegistry();
    const backend = new FakeBackend("document_search", undefined, false);
    registry.register(backend);

    await registry.selectPrimary();
    await registry.selectPrimary();

    expect(backend.healthChecks).toBe(1);
  });

  it("warns when a backend type is replaced", () => {
    stderrSpy = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    const registry = new BackendRegistry(createLogger({ level: LogLevel.WARN, scope: "registry" }));

    registry.register(new FakeBackend("document_search"));
    registry.register(new FakeBackend("document_search"));

    expect(registry.size).toBe(1);
    expect(stderrSpy).toHaveBeenCalledWith("[warn] registry: Replacing registered backend document_search\n");
  });

  it("health-checks every backend", async () => {
    const registry = new BackendRegistry();
    registry.register(new FakeBackend("document_search"));
    registry.register(new FakeBackend("catalog_query", undefined, false));

    expect(await registry.healthCheckAll()).toEqual({ document_search: true, catalog_query: false });
    expect(registry.getBackendStatuses().catalog_query.status).toBe("unavailable");
  });
});
