import { describe, expect, it, vi } from "vitest";
import { memoize, TtlCache } from "../../src/cache/ttlCache";

describe("TtlCache", () => {
  it("returns a value before the ttl and drops it at the ttl", () => {
    let clock = 1_000;
    const cache = new TtlCache<string>({ ttlMs: 500, now: () => clock });
    cache.set("k", "v");

    clock = 1_499;
    expect(cache.get("k")).toBe("v");
    clock = 1_500;
    expect(cache.get("k")).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it("overwriting refreshes the timestamp", () => {
    let clock = 0;
    const cache = new TtlCache<number>({ ttlMs: 100, now: () => clock });
    cache.set("k", 1);
    clock = 90;
    cache.set("k", 2);
    clock = 150;
    expect(cache.get("k")).toBe(2);
  });

  it("deletes and clears", () => {
    const cache = new TtlCache<number>({ ttlMs: 1_000 });
    cache.set("a", 1);
    cache.set("b", 2);
    expect(cache.delete("a")).toBe(true);
    expect(cache.get("a")).toBeUndefined();
    cache.clear();
    expect(cache.size).toBe(0);
  });
});

describe("memoize", () => {
  it("calls through once per argument list within the ttl", () => {
    let clock = 0;
    const cache = new TtlCache<string>({ ttlMs: 1_000, now: () => clock });
    const fn = vi.fn((name: string, n: number) => `${name}:${n}`);
    const cached = memoize(cache, "fmt:", fn);

    expect(cached("a", 1)).toBe("a:1");
    expect(cached("a", 1)).toBe("a:1");
    expect(cached("a", 2)).toBe("a:2");
    expect(fn).toHaveBeenCalledTimes(2);
    expect(cache.get('fmt:["a",1]')).toBe("a:1");

    clock = 1_000;
    cached("a", 1);
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("does not store undefined results", () => {
    const cache = new TtlCache<string>({ ttlMs: 1_000 });
    const fn = vi.fn((): string | undefined => undefined);
    const cached = memoize(cache, "none:", fn);

    cached();
    cached();
    expect(fn).toHaveBeenCalledTimes(2);
    expect(cache.size).toBe(0);
  });
});
