import { logCatch } from "mapping-codec/test-util";
import { afterEach, expect, test } from "vitest";
import {
  _withBaseLogger,
  enableTracing,
  lineIndex,
  lineStarts,
  srcContext,
  srcLine,
  srcLog,
  srcTrace,
} from "../Logging.js";

afterEach(() => {
  enableTracing(false);
});

const src = "first line\nsecond line\n\nfourth";

test("line starts", () => {
  expect(lineStarts(src)).deep.equals([0, 11, 23, 24]);
  expect(lineStarts("")).deep.equals([0]);
});

test("line index", () => {
  const starts = lineStarts(src);
  const positions = [0, 10, 11, 22, 23, 24, 29];
  const lines = positions.map((p) => lineIndex(starts, p));
  expect(lines).deep.equals([0, 0, 1, 1, 2, 3, 3]);
});

test("srcLine", () => {
  expect(srcLine(src, 14)).toEqual({
    line: "second line",
    linePos: 3,
    linePos2: undefined,
    lineNum: 2,
  });
  expect(srcLine(src, [11, 17]).linePos2).eq(6);
  expect(srcLine(src, 25).line).eq("fourth");
});

test("srcContext carets", () => {
  expect(srcContext(src, [18, 22])).deep.equals([
    "second line  Ln 2",
    "       ^   ^",
  ]);
});

test("srcLog", () => {
  const { log, logged } = logCatch();
  _withBaseLogger(log, () => srcLog(src, 2, "look", "here"));
  expect(logged()).eq("look here\nfirst line  Ln 1\n  ^");
});

test("srcTrace only logs while tracing", () => {
  const { log, logged } = logCatch();
  _withBaseLogger(log, () => {
    srcTrace(src, 0, "hidden");
    enableTracing();
    srcTrace(src, 0, "shown");
  });
  expect(logged()).eq("shown\nfirst line  Ln 1\n^");
});
