import { compareGenerated, type Mapping } from "mapping-codec";

/**
 * Put mapping entries in generated order and remove entries with no effect.
 *
 *  . entries are sorted by generated position
 *    (stable, insertion order otherwise)
 *  . of entries at an identical generated position, the last inserted is kept
 *  . generated only entries at a line start, or following another
 *    generated only entry on the same line, are dropped
 *
 * @param entries - in insertion order
 */
export function normalizeMappings(entries: Mapping[]): Mapping[] {
  const sorted = [...entries].sort(compareGenerated);
  const result: Mapping[] = [];

  for (const m of sorted) {
    const prev = result[result.length - 1];
    if (prev && compareGenerated(prev, m) === 0) {
      result.pop(); // later entry replaces the earlier one
    }
    result.push(m);
  }

  return result.filter((m, i) => {
    if (m.original) return true;
    if (m.generatedColumn === 0) return false;
    const prev = result[i - 1];
    return prev?.generatedLine === m.generatedLine && !!prev.original;
  });
}

/**
 * Reduce mapping entries to one per generated line, at column 0,
 * pointing at the start of the original line
 * of the first mapped entry on the line.
 */
export function linesOnly(table: readonly Mapping[]): Mapping[] {
  const result: Mapping[] = [];
  let line = -1;
  for (const m of table) {
    const { original } = m;
    if (!original || m.generatedLine === line) continue;
    line = m.generatedLine;
    result.push({
      generatedLine: line,
      generatedColumn: 0,
      original: {
        sourceIndex: original.sourceIndex,
        line: original.line,
        column: 0,
      },
    });
  }
  return result;
}
