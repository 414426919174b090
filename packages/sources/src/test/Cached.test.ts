import { beforeEach, expect, test } from "vitest";
import { compose, composeCache, ResolutionError } from "../Compose.js";
import {
  buffer,
  fingerprintSource,
  map,
  size,
  text,
  writeTo,
} from "../Queries.js";
import {
  cached,
  concat,
  original,
  raw,
  type Source,
  withMap,
} from "../Source.js";

beforeEach(() => {
  composeCache.clear();
});

test("cached source remembers text and size", () => {
  const c = cached(original("a;b", "a.js"));
  expect(c.cell.filled()).deep.equals([]);
  expect(text(c)).eq("a;b");
  expect(c.cell.filled()).deep.equals(["text"]);
  expect(size(c)).eq(3);
  expect(Array.from(buffer(c))).deep.equals([97, 59, 98]);
  expect(c.cell.filled()).deep.equals(["text", "size", "buffer"]);
});

test("cached source has its child's fingerprint", () => {
  const child = concat(original("a;b", "a.js"), "c");
  const c = cached(child);
  expect(fingerprintSource(c)).eq(fingerprintSource(child));
  expect(c.cell.filled()).deep.equals(["fingerprint"]);
});

test("maps are stored per columns setting", () => {
  const c = cached(original("a;b", "a.js"));
  const withColumns = map(c);
  expect(map(c)).toBe(withColumns);
  expect(withColumns?.mappings).eq("AAAA,EAAE");

  const lines = map(c, { columns: false });
  expect(lines?.mappings).eq("AAAA");
  expect(map(c, { columns: false })).toBe(lines);
  expect(c.cell.filled()).deep.equals([
    "fingerprint",
    "composed",
    "map",
    "linesMap",
  ]);
});

test("file and sourceRoot apply to a stored map", () => {
  const c = cached(original("x", "a.js"));
  expect(map(c, { file: "out.js" })?.file).eq("out.js");
  expect(map(c)?.file).undefined;
});

test("cached sources with identical content share a composed table", () => {
  const c1 = cached(original("a;b", "a.js"));
  const c2 = cached(original("a;b", "a.js"));
  const composed = compose(c1);
  expect(compose(c2)).toBe(composed);
  expect(composeCache.stats).toEqual({ hits: 1, misses: 1 });
  expect(composeCache.size).eq(1);
});

/** three mapped sources, each mapping its text to the one before */
function chainOfThree(): Source {
  let src: Source = original("a", "s0");
  for (const i of [1, 2, 3]) {
    const prev = `s${i - 1}`;
    src = withMap({
      text: "a",
      name: `s${i}`,
      map: { version: 3, sources: [prev], names: [], mappings: "AAAA" },
      upstream: { [prev]: src },
    });
  }
  return src;
}

test("a stored map still checks the depth limit", () => {
  const c = cached(chainOfThree());
  expect(map(c)?.sources).deep.equals(["s0"]);
  expect(() => map(c, { maxChainDepth: 2 })).toThrow(
    "source map chain through 's1' exceeds 2 levels"
  );
  expect(map(c, { maxChainDepth: 3 })?.sources).deep.equals(["s0"]);
});

test("a shared composed table still checks the depth limit", () => {
  expect(compose(cached(chainOfThree())).text).eq("a");
  expect(composeCache.size).eq(1);

  let caught: unknown;
  try {
    compose(cached(chainOfThree()), { maxChainDepth: 2 });
  } catch (e) {
    caught = e;
  }
  expect(caught).toBeInstanceOf(ResolutionError);
  expect(caught).toHaveProperty("sourceName", "s1");
  expect(caught).toHaveProperty("depth", 3);
  expect(composeCache.stats.hits).eq(1);
});

test("interleaved callers see the same results", async () => {
  const child = concat(original("a;\n", "a.js"), original("b;", "b.js"));
  const callers = [1, 2, 3, 4].map(async (i) => {
    await new Promise((resolve) => setTimeout(resolve, 4 - i));
    return map(cached(child))?.toString();
  });
  const results = await Promise.all(callers);
  expect(new Set(results).size).eq(1);
  expect(composeCache.size).eq(1);
});

test("a leading cached newline shifts the mapped lines by one", () => {
  const src = concat(
    cached(raw("\n")),
    withMap({
      text: "\nconsole.log(1);\n",
      name: "index.js",
      map: {
        version: 3,
        sources: ["index.js"],
        sourcesContent: ["// DELETE IT\nconsole.log(1)"],
        names: [],
        mappings: ";AACA",
      },
    })
  );
  expect(text(src)).eq("\n\nconsole.log(1);\n");
  expect(map(src)?.toJSON()).toEqual({
    version: 3,
    sources: ["index.js"],
    sourcesContent: ["// DELETE IT\nconsole.log(1)"],
    names: [],
    mappings: ";;AACA",
  });
});

test("writeTo a cached source", () => {
  const c = cached(concat("a", "b"));
  const chunks: string[] = [];
  writeTo(c, { write: (chunk: string) => chunks.push(chunk) });
  expect(chunks).deep.equals(["ab"]);
  expect(c.cell.filled()).deep.equals(["text"]);
});
