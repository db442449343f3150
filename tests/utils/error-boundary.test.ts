import { describe, it, expect, vi, afterEach, type MockInstance } from "vitest";
import {
  AuthenticationError,
  BackendQueryError,
  ConfigurationError,
} from "../../src/utils/errors.js";
import { handleCommandError } from "../../src/utils/error-boundary.js";
import { createLogger, LogLevel } from "../../src/utils/logger.js";

describe("handleCommandError", () => {
  let stderrSpy: MockInstance<typeof process.stderr.write>;

  afterEach(() => {
    stderrSpy?.mockRestore();
  });

  function capturedStderr(): string {
    return stderrSpy.mock.calls.map((c: unknown[]) => String(c[0])).join("");
  }

  it("formats CatalogSearchError with code", () => {
    stderrSpy = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    const logger = createLogger({ level: LogLevel.ERROR });
    const err = new ConfigurationError('Invalid scope "bogus"');

    const exitCode = handleCommandError(err, logger, false);

    expect(exitCode).toBe(1);
    expect(capturedStderr()).toBe('[error] Invalid scope "bogus" [CONFIG_INVALID]\n');
  });

  it("shows cause in verbose mode", () => {
    stderrSpy = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    const logger = createLogger({ level: LogLevel.DEBUG });
    const cause = new Error("HTTP 401");
    const err = new AuthenticationError("session rejected", cause);

    const exitCode = handleCommandError(err, logger, true);

    expect(exitCode).toBe(1);
    expect(capturedStderr()).toContain("session rejected [NOT_AUTHENTICATED]");
    expect(capturedStderr()).toContain("Cause: Error: HTTP 401");
  });

  it("hides cause in non-verbose mode", () => {
    stderrSpy = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    const logger = createLogger({ level: LogLevel.ERROR });
    const err = new BackendQueryError("query failed", new Error("secret detail"));

    handleCommandError(err, logger, false);

    expect(capturedStderr()).not.toContain("secret detail");
  });

  it("returns 2 for unexpected errors", () => {
    stderrSpy = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    const logger = createLogger({ level: LogLevel.ERROR });

    const exitCode = handleCommandError(new TypeError("undefined is not a function"), logger, false);

    expect(exitCode).toBe(2);
    expect(capturedStderr()).toBe("[error] Unexpected error: undefined is not a function\n");
  });

  it("handles non-Error values", () => {
    stderrSpy = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    const logger = createLogger({ level: LogLevel.ERROR });

    expect(handleCommandError("string thrown", logger, false)).toBe(2);
    expect(capturedStderr()).toBe("[error] Unexpected error: string thrown\n");
  });
});
