import { describe, it, expect, vi } from "vitest";
import { TtlCache } from "../../src/utils/ttl-cache.js";

function clock(start = 1_000): { now: () => number; advance: (ms: number) => void } {
  let t = start;
  return {
    now: () => t,
    advance: (ms: number) => {
      t += ms;
    },
  };
}

describe("TtlCache", () => {
  it("returns stored values until they expire", () => {
    const c = clock();
    const cache = new TtlCache<string[]>({ ttlMs: 100, now: c.now });

    cache.set("buckets", ["alpha"]);
    c.advance(99);
    expect(cache.peek("buckets")).toEqual(["alpha"]);

    c.advance(1);
    expect(cache.peek("buckets")).toBeUndefined();
  });

  it("getOrLoad runs the loader once while the entry is fresh", async () => {
    const c = clock();
    const cache = new TtlCache<string[]>({ ttlMs: 100, now: c.now });
    const loader = vi.fn().mockResolvedValue(["alpha", "beta"]);

    expect(await cache.getOrLoad("k", loader)).toEqual(["alpha", "beta"]);
    expect(await cache.getOrLoad("k", loader)).toEqual(["alpha", "beta"]);
    expect(loader).toHaveBeenCalledTimes(1);

    c.advance(100);
    await cache.getOrLoad("k", loader);
    expect(loader).toHaveBeenCalledTimes(2);
  });

  it("forceRefresh bypasses a fresh entry", async () => {
    const cache = new TtlCache<number>({ ttlMs: 1_000 });
    cache.set("k", 1);

    const value = await cache.getOrLoad("k", async () => 2, { forceRefresh: true });

    expect(value).toBe(2);
    expect(cache.peek("k")).toBe(2);
  });

  it("does not cache loader failures", async () => {
    const cache = new TtlCache<number>({ ttlMs: 1_000 });

    await expect(
      cache.getOrLoad("k", async () => {
        throw new Error("catalog down");
      }),
    ).rejects.toThrow("catalog down");
    expect(cache.size).toBe(0);

    expect(await cache.getOrLoad("k", async () => 7)).toBe(7);
  });
});
