import { originalPositionFor, type SourceMap } from "mapping-codec";
import { mappingTuples } from "mapping-codec/test-util";
import { expect, test } from "vitest";
import { compose } from "../Compose.js";
import { map, size, text } from "../Queries.js";
import { concat, original, raw, withMap } from "../Source.js";

function expectMap(sourceMap: SourceMap | undefined): SourceMap {
  expect(sourceMap).toBeDefined();
  if (!sourceMap) throw new Error("no map");
  return sourceMap;
}

test("concat two originals", () => {
  const src = concat(original("a\nb", "a.js"), original("c\nd", "c.js"));
  expect(text(src)).eq("a\nbc\nd");
  expect(size(src)).eq(6);

  const sourceMap = expectMap(map(src));
  expect(sourceMap.toJSON()).toEqual({
    version: 3,
    sources: ["a.js", "c.js"],
    sourcesContent: ["a\nb", "c\nd"],
    names: [],
    mappings: "AAAA;AACA,CCDA;AACA",
  });
  expect(originalPositionFor(sourceMap, 1, 0)).toEqual({
    source: "a.js",
    line: 1,
    column: 0,
  });
  expect(originalPositionFor(sourceMap, 1, 1)).toEqual({
    source: "c.js",
    line: 0,
    column: 0,
  });
});

test("concatenated originals map every position to itself", () => {
  const src = concat(original("ab;cd", "a.js"), original("ef;\ngh", "e.js"));
  const sourceMap = expectMap(map(src));
  expect(originalPositionFor(sourceMap, 0, 4)).toEqual({
    source: "a.js",
    line: 0,
    column: 4,
  });
  expect(originalPositionFor(sourceMap, 0, 6)).toEqual({
    source: "e.js",
    line: 0,
    column: 1,
  });
  expect(originalPositionFor(sourceMap, 1, 1)).toEqual({
    source: "e.js",
    line: 1,
    column: 1,
  });
});

test("size of concat", () => {
  const parts = [raw("é"), original("ab\n", "a.js"), raw("")];
  const joined = concat(...parts);
  const sum = parts.reduce((total, p) => total + size(p), 0);
  expect(size(joined)).eq(sum);
  expect(size(joined)).eq(5);
});

test("unmapped text after a mapped child gets a boundary", () => {
  const composed = compose(concat(original("ab", "a.js"), raw("cd")));
  expect(mappingTuples(composed.mappings)).toEqual([
    [0, 0, 0, 0, 0],
    [0, 2],
  ]);
  expect(expectMap(map(concat(original("ab", "a.js"), raw("cd")))).mappings).eq(
    "AAAA,E"
  );
});

test("map entries past the end of a child's text are dropped", () => {
  const ab = withMap({
    text: "ab",
    name: "ab.js",
    map: {
      version: 3,
      sources: ["a.ts"],
      names: [],
      mappings: "AAAA,UAAU;AACA",
    },
  });
  const src = concat(ab, "cdefghijklmn\nxyz");
  expect(mappingTuples(compose(src).mappings)).toEqual([
    [0, 0, 0, 0, 0],
    [0, 2],
  ]);
  expect(expectMap(map(src)).mappings).eq("AAAA,E");
});

test("mapped child after unmapped text", () => {
  const composed = compose(concat("x = ", original("1;", "n.js")));
  expect(composed.text).eq("x = 1;");
  expect(mappingTuples(composed.mappings)).toEqual([[0, 4, 0, 0, 0]]);
});

test("concat of raw text has no map", () => {
  expect(map(concat("a", raw("b\n"), "c"))).undefined;
});

test("shared children are composed once per call", () => {
  const shared = original("x;", "x.js");
  const src = concat(shared, "\n", shared);
  const composed = compose(src);
  expect(composed.text).eq("x;\nx;");
  expect(mappingTuples(composed.mappings)).toEqual([
    [0, 0, 0, 0, 0],
    [0, 2],
    [1, 0, 0, 0, 0],
  ]);
  expect(composed.sources.values()).deep.equals(["x.js"]);
});
