import {
  _withBaseLogger,
  type Mapping,
  type MappingTable,
  type OriginalLocation,
} from "mapping-codec";
import { expect } from "vitest";
import { logCatch } from "./LogCatcher.js";

/**
 * compact form of a mapping entry for test assertions:
 * [generatedLine, generatedColumn] for generated only entries,
 * or [generatedLine, generatedColumn, sourceIndex, line, column, nameIndex?]
 */
export type MappingTuple =
  | [number, number]
  | [number, number, number, number, number]
  | [number, number, number, number, number, number];

export function mappingTuples(table: MappingTable): MappingTuple[] {
  return table.map(toTuple);
}

function toTuple(m: Mapping): MappingTuple {
  const { generatedLine: line, generatedColumn: col, original } = m;
  if (!original) return [line, col];
  const { sourceIndex, line: oLine, column: oCol, nameIndex } = original;
  if (nameIndex === undefined) return [line, col, sourceIndex, oLine, oCol];
  return [line, col, sourceIndex, oLine, oCol, nameIndex];
}

/** build a mapping table from tuples */
export function tuplesToMappings(tuples: MappingTuple[]): Mapping[] {
  return tuples.map((t) => {
    if (t.length === 2) return { generatedLine: t[0], generatedColumn: t[1] };
    const [generatedLine, generatedColumn, sourceIndex, line, column] = t;
    const original: OriginalLocation = { sourceIndex, line, column };
    if (t.length === 6) original.nameIndex = t[5];
    return { generatedLine, generatedColumn, original };
  });
}

/** run a test function and expect that no error logs are produced */
export function expectNoLogErr<T>(fn: () => T): T {
  const { log, logged } = logCatch();
  const result = _withBaseLogger(log, fn);
  expect(logged()).eq("");
  return result;
}
