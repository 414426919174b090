import { afterEach, expect, test } from "vitest";
import { ContentCache, decodeCache, decodeCached } from "../ContentCache.js";
import { fingerprint } from "../Fingerprint.js";
import { decodeMappings } from "../Mappings.js";

afterEach(() => {
  decodeCache.clear();
});

test("decoding the same text twice shares the table", () => {
  const a = decodeCached("AAAA;AACA");
  const b = decodeCached("AAAA;AACA");
  expect(b).toBe(a);
  expect(decodeCache.size).eq(1);
  expect(decodeCache.stats).toEqual({ hits: 1, misses: 1 });
});

test("shared tables are frozen", () => {
  const table = decodeCached("AAAA");
  expect(Object.isFrozen(table)).true;
  expect(Object.isFrozen(table[0])).true;
  expect(Object.isFrozen(table[0].original)).true;
});

test("decode errors are not cached", () => {
  expect(() => decodeCached("AA")).toThrow("segment has 2 fields");
  expect(decodeCache.size).eq(0);
});

test("racing computation keeps the first inserted value", () => {
  const cache = new ContentCache<string[]>();
  const key = fingerprint("k");
  let computations = 0;

  // the outer computation is interrupted by a second caller for the same key
  let inner: string[] | undefined;
  const outer = cache.getOrCompute(key, () => {
    computations++;
    inner = cache.getOrCompute(key, () => {
      computations++;
      return ["inner"];
    });
    return ["outer"];
  });

  expect(computations).eq(2);
  expect(outer).toBe(inner);
  expect(outer).deep.equals(["inner"]);
  expect(cache.get(key)).toBe(inner);
});

test("concurrent callers decode equal tables", async () => {
  const text = "AAAA,SAAS;ACCC,GAAG";
  const caller = async (): Promise<unknown> => {
    await Promise.resolve();
    return decodeCached(text);
  };
  const [a, b] = await Promise.all([caller(), caller()]);
  expect(a).toBe(b);
  expect(a).toEqual(decodeMappings(text));
});

test("insertIfAbsent returns the existing value", () => {
  const cache = new ContentCache<number>();
  const key = fingerprint("n");
  expect(cache.insertIfAbsent(key, 1)).eq(1);
  expect(cache.insertIfAbsent(key, 2)).eq(1);
  cache.clear();
  expect(cache.get(key)).undefined;
  expect(cache.size).eq(0);
});

test("fingerprints are length prefixed", () => {
  expect(fingerprint("ab", "c")).not.eq(fingerprint("a", "bc"));
  expect(fingerprint("ab", "c")).eq(fingerprint("ab", "c"));
  expect(fingerprint("x")).toMatch(/^sha256:[0-9a-f]{64}$/);
});
