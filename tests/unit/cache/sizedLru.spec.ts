import { describe, it, expect, vi } from "vitest";
import { SizedLru, SizedLruError, newSizedLru, newSizedLruWithTtl } from "../../../src/cache/index.js";

type Evicted = [string, string, number];

function tracked(sizeLimit: number) {
  const evicted: Evicted[] = [];
  const lru = newSizedLru<string, string>(sizeLimit, (k, v, s) => evicted.push([k, v, s]));
  return { lru, evicted };
}

describe("SizedLru construction", () => {
  it.each([0, -1, Number.NaN])("rejects sizeLimit %s", (sizeLimit) => {
    expect(() => new SizedLru({ sizeLimit })).toThrow(SizedLruError);
    expect(() => newSizedLru(sizeLimit)).toThrow(
      expect.objectContaining({ code: "invalid_configuration", details: { size_limit: sizeLimit } }),
    );
  });

  it.each([Number.POSITIVE_INFINITY, Number.NaN])("rejects ttlMs %s", (ttlMs) => {
    expect(() => new SizedLru({ sizeLimit: 1, ttlMs })).toThrow(SizedLruError);
    expect(() => newSizedLruWithTtl(1, ttlMs)).toThrow(
      expect.objectContaining({ code: "invalid_configuration", details: { ttl_ms: ttlMs } }),
    );
  });

  it("accepts any positive sizeLimit", () => {
    const lru = newSizedLru<string, number>(1);
    expect(lru.stats()).toEqual({ entries: 0, size: 0, size_limit: 1, ttl_ms: 0 });
    expect(newSizedLruWithTtl(5, 100).stats().ttl_ms).toBe(100);
  });
});

describe("SizedLru add/get", () => {
  it("returns the value right after add", () => {
    const { lru } = tracked(10);
    expect(lru.add("k", "v", 3)).toBe(false);
    expect(lru.get("k")).toBe("v");
    expect(lru.len()).toBe(1);
    expect(lru.size()).toBe(3);
  });

  it("evicts the oldest entry when over budget", () => {
    const { lru, evicted } = tracked(10);
    expect(lru.add("a", "A", 5)).toBe(false);
    expect(lru.add("b", "B", 5)).toBe(false);
    expect(lru.add("c", "C", 5)).toBe(true);

    expect(evicted).toEqual([["a", "A", 5]]);
    expect(lru.len()).toBe(2);
    expect(lru.size()).toBe(10);
    expect(lru.keys()).toEqual(["b", "c"]);
  });

  it("get promotes so the other entry is evicted next", () => {
    const { lru, evicted } = tracked(10);
    lru.add("a", "A", 5);
    lru.add("b", "B", 5);
    lru.add("c", "C", 5);

    expect(lru.get("b")).toBe("B");
    expect(lru.add("d", "D", 5)).toBe(true);
    expect(evicted.map(([k]) => k)).toEqual(["a", "c"]);
    expect(lru.keys()).toEqual(["b", "d"]);
  });

  it("evicts several entries for one large insert", () => {
    const { lru, evicted } = tracked(10);
    lru.add("a", "A", 3);
    lru.add("b", "B", 3);
    lru.add("c", "C", 3);

    expect(lru.add("d", "D", 8)).toBe(true);
    expect(evicted.map(([k]) => k)).toEqual(["a", "b", "c"]);
    expect(lru.keys()).toEqual(["d"]);
    expect(lru.size()).toBe(8);
  });

  it("an oversized entry evicts everything including itself", () => {
    const { lru, evicted } = tracked(10);
    lru.add("a", "A", 4);

    expect(lru.add("k", "V", 20)).toBe(true);
    expect(lru.len()).toBe(0);
    expect(lru.size()).toBe(0);
    expect(evicted).toEqual([
      ["a", "A", 4],
      ["k", "V", 20],
    ]);
    expect(lru.get("k")).toBeUndefined();
  });

  it("updating an existing key replaces value and size and never reports eviction", () => {
    const { lru, evicted } = tracked(10);
    lru.add("a", "A", 2);
    lru.add("b", "B", 2);

    expect(lru.add("a", "A2", 7)).toBe(false);
    expect(lru.size()).toBe(9);
    expect(lru.len()).toBe(2);
    expect(lru.keys()).toEqual(["b", "a"]);
    expect(lru.peek("a")).toBe("A2");

    // Growing past the limit on update does not run the eviction loop.
    expect(lru.add("b", "B2", 5)).toBe(false);
    expect(lru.size()).toBe(12);
    expect(evicted).toEqual([]);
  });

  it("the eviction callback sees the most recently set size", () => {
    const { lru, evicted } = tracked(10);
    lru.add("a", "A", 2);
    lru.add("a", "A2", 6);
    lru.add("b", "B", 6);

    expect(evicted).toEqual([["a", "A2", 6]]);
  });

  it("get on a missing key is a miss", () => {
    const { lru } = tracked(10);
    expect(lru.get("nope")).toBeUndefined();
    expect(lru.lookup("nope")).toEqual({ found: false });
  });

  it("lookup distinguishes a stored undefined from a miss", () => {
    const lru = newSizedLru<string, string | undefined>(10);
    lru.add("u", undefined, 1);
    expect(lru.lookup("u")).toEqual({ found: true, value: undefined });
    expect(lru.contains("u")).toBe(true);
  });

  it("zero-size entries never trigger eviction", () => {
    const { lru } = tracked(1);
    for (let i = 0; i < 5; i += 1) expect(lru.add(`z${i}`, "Z", 0)).toBe(false);
    expect(lru.len()).toBe(5);
    expect(lru.size()).toBe(0);
  });
});

describe("SizedLru read paths that keep recency", () => {
  it("contains and peek do not promote", () => {
    const { lru, evicted } = tracked(10);
    lru.add("a", "A", 5);
    lru.add("b", "B", 5);

    expect(lru.contains("a")).toBe(true);
    expect(lru.peek("a")).toBe("A");
    expect(lru.contains("zzz")).toBe(false);
    expect(lru.peek("zzz")).toBeUndefined();

    lru.add("c", "C", 5);
    expect(evicted.map(([k]) => k)).toEqual(["a"]);
  });
});

describe("SizedLru removal", () => {
  it("remove reports presence and fires the callback once", () => {
    const { lru, evicted } = tracked(10);
    lru.add("a", "A", 4);

    expect(lru.remove("a")).toBe(true);
    expect(lru.remove("a")).toBe(false);
    expect(evicted).toEqual([["a", "A", 4]]);
    expect(lru.size()).toBe(0);
  });

  it("removeOldest returns the back entry", () => {
    const { lru, evicted } = tracked(10);
    lru.add("a", "A", 1);
    lru.add("b", "B", 2);

    expect(lru.removeOldest()).toEqual({ key: "a", value: "A", size: 1 });
    expect(lru.keys()).toEqual(["b"]);
    expect(lru.size()).toBe(2);
    expect(evicted).toEqual([["a", "A", 1]]);
  });

  it("removeOldest on an empty cache leaves state unchanged", () => {
    const onEvict = vi.fn();
    const lru = newSizedLru<string, string>(10, onEvict);

    expect(lru.removeOldest()).toBeUndefined();
    expect(lru.len()).toBe(0);
    expect(lru.size()).toBe(0);
    expect(onEvict).not.toHaveBeenCalled();
  });

  it("getOldest returns without removing or promoting", () => {
    const { lru, evicted } = tracked(10);
    expect(lru.getOldest()).toBeUndefined();
    lru.add("a", "A", 1);
    lru.add("b", "B", 1);

    expect(lru.getOldest()).toEqual({ key: "a", value: "A", size: 1 });
    expect(lru.keys()).toEqual(["a", "b"]);
    expect(evicted).toEqual([]);
  });

  it("purge fires the callback once per entry and resets size", () => {
    const { lru, evicted } = tracked(100);
    lru.add("a", "A", 1);
    lru.add("b", "B", 2);
    lru.add("c", "C", 3);

    lru.purge();
    expect(evicted.map(([k]) => k).sort()).toEqual(["a", "b", "c"]);
    expect(lru.len()).toBe(0);
    expect(lru.size()).toBe(0);
    expect(lru.keys()).toEqual([]);

    lru.add("d", "D", 4);
    expect(lru.keys()).toEqual(["d"]);
    expect(lru.size()).toBe(4);
  });

  it("size equals the sum of live entry sizes after mixed operations", () => {
    const { lru } = tracked(20);
    const sizes: Record<string, number> = { a: 3, b: 7, c: 5, d: 9, e: 2 };
    for (const [k, s] of Object.entries(sizes)) lru.add(k, k.toUpperCase(), s);
    lru.remove("c");
    lru.add("f", "F", 6);

    const live = Object.keys({ ...sizes, f: 6 }).filter((k) => lru.contains(k));
    const expected = live.reduce((acc, k) => acc + (k === "f" ? 6 : sizes[k]), 0);
    expect(lru.size()).toBe(expected);
    expect(lru.size()).toBeLessThanOrEqual(20);
  });

  it("purge removes each entry before its callback, so a throwing callback leaves the rest cached", () => {
    const seen: string[] = [];
    const lru = newSizedLru<string, string>(100, (k) => {
      seen.push(k);
      if (k === "b") throw new Error("evict failed");
    });
    lru.add("a", "A", 1);
    lru.add("b", "B", 2);
    lru.add("c", "C", 3);

    expect(() => lru.purge()).toThrow("evict failed");
    expect(seen).toEqual(["a", "b"]);
    expect(lru.keys()).toEqual(["c"]);
    expect(lru.size()).toBe(3);
  });
});

describe("SizedLru eviction callback errors", () => {
  it("propagate from add after the entry has left both structures", () => {
    const lru = newSizedLru<string, number>(10, () => {
      throw new Error("evict failed");
    });
    lru.add("a", 1, 6);

    expect(() => lru.add("b", 2, 6)).toThrow("evict failed");
    expect(lru.keys()).toEqual(["b"]);
    expect(lru.size()).toBe(6);
    expect(lru.len()).toBe(1);
    expect(lru.contains("a")).toBe(false);
  });
});

describe("SizedLru size normalization", () => {
  it("counts NaN and negative sizes as zero", () => {
    const { lru, evicted } = tracked(10);
    lru.add("a", "A", Number.NaN);
    lru.add("n", "N", -4);
    expect(lru.size()).toBe(0);
    lru.remove("a");

    expect(lru.add("b", "B", 5)).toBe(false);
    expect(lru.add("c", "C", 50)).toBe(true);
    expect(lru.size()).toBe(0);
    expect(lru.len()).toBe(0);
    expect(evicted).toEqual([
      ["a", "A", 0],
      ["n", "N", 0],
      ["b", "B", 5],
      ["c", "C", 50],
    ]);
  });

  it("truncates fractional sizes and treats infinity as never fitting", () => {
    const { lru, evicted } = tracked(10);
    lru.add("f", "F", 2.9);
    expect(lru.size()).toBe(2);

    expect(lru.add("inf", "I", Number.POSITIVE_INFINITY)).toBe(true);
    expect(lru.size()).toBe(0);
    expect(evicted).toEqual([
      ["f", "F", 2],
      ["inf", "I", 11],
    ]);
  });
});
