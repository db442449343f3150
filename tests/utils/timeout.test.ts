import { describe, it, expect } from "vitest";
import { BackendTimeoutError } from "../../src/utils/errors.js";
import { isAbortError, withTimeout } from "../../src/utils/timeout.js";

describe("withTimeout", () => {
  it("resolves with the task's value when it finishes in time", async () => {
    const value = await withTimeout(async () => "done", 1_000, "backend");

    expect(value).toBe("done");
  });

  it("rejects with BackendTimeoutError and aborts the task's signal", async () => {
    let seen: AbortSignal | undefined;
    const task = (signal: AbortSignal): Promise<string> => {
      seen = signal;
      return new Promise<string>(() => undefined);
    };

    const err = await withTimeout(task, 10, "document_search").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(BackendTimeoutError);
    expect(err instanceof Error ? err.message : "").toBe(
      "document_search did not respond within 10ms",
    );
    expect(seen?.aborted).toBe(true);
  });

  it("propagates task errors unchanged", async () => {
    const failure = new Error("boom");

    await expect(
      withTimeout(async () => {
        throw failure;
      }, 1_000, "backend"),
    ).rejects.toBe(failure);
  });

  it("forwards an already-aborted outer signal", async () => {
    const outer = new AbortController();
    outer.abort();

    const aborted = await withTimeout(async (signal) => signal.aborted, 1_000, "backend", outer.signal);

    expect(aborted).toBe(true);
  });
});

describe("isAbortError", () => {
  it("recognizes abort and timeout shapes", () => {
    const abort = new Error("aborted");
    abort.name = "AbortError";

    expect(isAbortError(abort)).toBe(true);
    expect(isAbortError(new BackendTimeoutError("slow", 5))).toBe(true);
    expect(isAbortError(new Error("other"))).toBe(false);
    expect(isAbortError("AbortError")).toBe(false);
  });
});
