import { DecodeError, encodeVlq, isSeparator, VlqReader } from "./Vlq.js";

/** position in an original source that a generated position maps to */
export interface OriginalLocation {
  /** index into the sources table */
  sourceIndex: number;
  line: number;
  column: number;
  /** index into the names table */
  nameIndex?: number;
}

/**
 * One entry in a mapping table. Lines and columns are zero based,
 * columns count utf16 code units.
 *
 * An entry without an original location is 'generated only':
 * it ends the range of the previous entry on the line.
 */
export interface Mapping {
  generatedLine: number;
  generatedColumn: number;
  original?: OriginalLocation;
}

/** mapping entries ordered by generated line, then generated column */
export type MappingTable = readonly Mapping[];

/** order mappings by generated position */
export function compareGenerated(a: Mapping, b: Mapping): number {
  return (
    a.generatedLine - b.generatedLine || a.generatedColumn - b.generatedColumn
  );
}

/** @return true if the table is ordered by generated position */
export function isOrdered(table: MappingTable): boolean {
  for (let i = 1; i < table.length; i++) {
    if (compareGenerated(table[i - 1], table[i]) > 0) return false;
  }
  return true;
}

/**
 * Encode a mapping table into the source map 'mappings' text.
 *
 * Generated columns are deltas from the previous segment on the same line,
 * the other fields are deltas from their previous occurrence
 * anywhere in the text.
 */
export function encodeMappings(table: MappingTable): string {
  let out = "";
  let line = 0;
  let lineHasSegment = false;
  let prevColumn = 0;
  let prevSource = 0;
  let prevOrigLine = 0;
  let prevOrigColumn = 0;
  let prevName = 0;

  for (const m of table) {
    if (m.generatedLine < line) {
      const { generatedLine, generatedColumn } = m;
      throw new Error(
        `mappings out of order at line ${generatedLine} ` +
          `column ${generatedColumn}`
      );
    }
    if (m.generatedLine > line) {
      out += ";".repeat(m.generatedLine - line);
      line = m.generatedLine;
      prevColumn = 0;
      lineHasSegment = false;
    }
    if (lineHasSegment) out += ",";
    lineHasSegment = true;

    out += encodeVlq(m.generatedColumn - prevColumn);
    prevColumn = m.generatedColumn;

    const { original } = m;
    if (original) {
      out += encodeVlq(original.sourceIndex - prevSource);
      prevSource = original.sourceIndex;
      out += encodeVlq(original.line - prevOrigLine);
      prevOrigLine = original.line;
      out += encodeVlq(original.column - prevOrigColumn);
      prevOrigColumn = original.column;
      if (original.nameIndex !== undefined) {
        out += encodeVlq(original.nameIndex - prevName);
        prevName = original.nameIndex;
      }
    }
  }
  return out;
}

/**
 * Decode the source map 'mappings' text into a mapping table.
 * @throws DecodeError for malformed text
 */
export function decodeMappings(text: string): Mapping[] {
  const reader = new VlqReader(text);
  const table: Mapping[] = [];
  const fields: number[] = [];
  let line = 0;
  let column = 0;
  let source = 0;
  let origLine = 0;
  let origColumn = 0;
  let name = 0;

  while (!reader.done()) {
    const c = text.charCodeAt(reader.pos);
    if (c === 59 /* ; */) {
      line++;
      column = 0;
      reader.pos++;
      continue;
    }
    if (c === 44 /* , */) {
      throw new DecodeError("empty segment", reader.pos);
    }

    const segmentStart = reader.pos;
    fields.length = 0;
    while (!reader.done() && !isSeparator(text, reader.pos)) {
      fields.push(reader.read());
    }
    const n = fields.length;
    if (n !== 1 && n !== 4 && n !== 5) {
      throw new DecodeError(`segment has ${n} fields`, segmentStart);
    }

    column += fields[0];
    checkNonNegative(column, "generated column", segmentStart);
    const mapping: Mapping = { generatedLine: line, generatedColumn: column };
    if (n > 1) {
      source += fields[1];
      origLine += fields[2];
      origColumn += fields[3];
      checkNonNegative(source, "source index", segmentStart);
      checkNonNegative(origLine, "original line", segmentStart);
      checkNonNegative(origColumn, "original column", segmentStart);
      const original: OriginalLocation = {
        sourceIndex: source,
        line: origLine,
        column: origColumn,
      };
      if (n === 5) {
        name += fields[4];
        checkNonNegative(name, "name index", segmentStart);
        original.nameIndex = name;
      }
      mapping.original = original;
    }
    table.push(mapping);

    if (text.charCodeAt(reader.pos) === 44 /* , */) {
      reader.pos++;
      if (reader.done() || isSeparator(text, reader.pos)) {
        throw new DecodeError("empty segment", reader.pos);
      }
    }
  }

  // segments within a line may arrive unordered, the table is always ordered
  if (!isOrdered(table)) table.sort(compareGenerated);
  return table;
}

function checkNonNegative(value: number, field: string, pos: number): void {
  if (value < 0) {
    throw new DecodeError(`negative ${field} ${value}`, pos);
  }
}
