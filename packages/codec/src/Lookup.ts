import type { Mapping, MappingTable } from "./Mappings.js";

/**
 * Find the entry covering a generated position: the entry on the same line
 * with the greatest generated column not after the requested column.
 *
 * @return the covering entry,
 *  or undefined if no entry on the line starts at or before column
 */
export function findMapping(
  table: MappingTable,
  line: number,
  column: number
): Mapping | undefined {
  // binary search for the last entry at or before (line, column)
  let lo = 0;
  let hi = table.length;
  while (lo < hi) {
    const mid = (lo + hi) >> 1;
    const m = table[mid];
    const before =
      m.generatedLine < line ||
      (m.generatedLine === line && m.generatedColumn <= column);
    if (before) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  const found = table[lo - 1];
  if (found && found.generatedLine === line) return found;
  return undefined;
}

/** a generated position traced to its original source */
export interface TracedPosition {
  sourceIndex: number;
  line: number;
  column: number;
  /** reported only at the exact start of a named entry */
  nameIndex?: number;
}

/**
 * Trace a generated position to its original position.
 * Positions after the start of an entry are offset
 * by the same number of columns in the original.
 *
 * @return the original position, or undefined if the position is unmapped
 */
export function tracePosition(
  table: MappingTable,
  line: number,
  column: number
): TracedPosition | undefined {
  const found = findMapping(table, line, column);
  const original = found?.original;
  if (!found || !original) return undefined;

  const offset = column - found.generatedColumn;
  const traced: TracedPosition = {
    sourceIndex: original.sourceIndex,
    line: original.line,
    column: original.column + offset,
  };
  if (offset === 0 && original.nameIndex !== undefined) {
    traced.nameIndex = original.nameIndex;
  }
  return traced;
}
