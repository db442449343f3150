import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { createLogger, LogLevel, silentLogger } from "../../src/utils/logger.js";

describe("createLogger", () => {
  let stderrSpy: MockInstance<typeof process.stderr.write>;

  beforeEach(() => {
    stderrSpy = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
  });

  afterEach(() => {
    stderrSpy.mockRestore();
    delete process.env["CSEARCH_DEBUG"];
  });

  function collected(): string {
    return stderrSpy.mock.calls.map((c: unknown[]) => String(c[0])).join("");
  }

  it("writes one line per call with a level prefix", () => {
    const logger = createLogger({ level: LogLevel.DEBUG });
    logger.info("hello");

    expect(collected()).toBe("[info] hello\n");
  });

  it("includes the scope after the level tag", () => {
    const logger = createLogger({ level: LogLevel.DEBUG, scope: "registry" });
    logger.warn("replacing backend");

    expect(collected()).toBe("[warn] registry: replacing backend\n");
  });

  it("debug only shows in verbose mode", () => {
    const quiet = createLogger({ level: LogLevel.INFO });
    quiet.debug("should not appear");

    expect(stderrSpy).not.toHaveBeenCalled();

    const verbose = createLogger({ level: LogLevel.DEBUG });
    verbose.debug("should appear");

    expect(collected()).toBe("[debug] should appear\n");
  });

  it("defaults to INFO level", () => {
    const logger = createLogger();

    logger.debug("hidden");
    logger.info("visible");

    expect(collected()).toBe("[info] visible\n");
  });

  it("respects CSEARCH_DEBUG env var", () => {
    process.env["CSEARCH_DEBUG"] = "1";
    const logger = createLogger();

    logger.debug("env debug");

    expect(collected()).toBe("[debug] env debug\n");
  });

  it("formats extra arguments: objects as JSON, errors by message", () => {
    const logger = createLogger({ level: LogLevel.DEBUG });
    logger.debug("state:", { buckets: 2 }, new Error("boom"), 42);

    expect(collected()).toBe('[debug] state: {"buckets":2} boom 42\n');
  });

  it("error level hides everything below it", () => {
    const logger = createLogger({ level: LogLevel.ERROR });

    logger.debug("nope");
    logger.info("nope");
    logger.warn("nope");
    logger.error("critical");

    expect(collected()).toBe("[error] critical\n");
  });

  it("silentLogger writes nothing", () => {
    silentLogger.debug("nope");
    silentLogger.info("nope");
    silentLogger.warn("nope");
    silentLogger.error("nope");

    expect(stderrSpy).not.toHaveBeenCalled();
  });
});
