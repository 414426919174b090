import {
  lineIndex,
  lineStarts,
  type Mapping,
  type OriginalLocation,
  tracePosition,
} from "mapping-codec";
import type { Composed } from "./Composed.js";
import { normalizeMappings } from "./Normalize.js";
import type { ReplaceSource, Replacement, Source } from "./Source.js";

/**
 * Split a text into the pieces of its replaced version:
 * copied stretches of the base text alternating with replacement contents.
 *
 * example:
 * base:
 *  aaabbbbbc
 *     ^    ^
 *     St   End content='XXX'
 *
 * pieces: 'aaa', 'XXX', 'c'
 *
 * @param replacements sorted by start, non overlapping
 */
export function splicedPieces(
  baseText: string,
  replacements: readonly Replacement[]
): string[] {
  const pieces: string[] = [];
  let srcPos = 0;
  for (const { start, end, content } of replacements) {
    if (start > srcPos) pieces.push(baseText.slice(srcPos, start));
    if (content) pieces.push(content);
    srcPos = end;
  }
  if (srcPos < baseText.length) pieces.push(baseText.slice(srcPos));
  return pieces;
}

/** @return the base text with replacements applied */
export function spliceText(
  baseText: string,
  replacements: readonly Replacement[]
): string {
  return splicedPieces(baseText, replacements).join("");
}

/**
 * Compose a replace source: splice its text, and move the base's mappings
 * to their positions in the spliced text.
 *
 *  . base entries inside a replaced range are dropped
 *  . base entries outside replaced ranges shift by the length change of
 *    the replacements before them
 *  . replacement text starts with an entry of its own
 *    (carrying the name, if any)
 *  . text following a replacement continues the base's mapping
 *    at the replacement's end
 *
 * @param composeBase compose the base source
 */
export function composeReplace(
  source: ReplaceSource,
  composeBase: (base: Source) => Composed
): Composed {
  const base = composeBase(source.base);
  const { replacements } = source;
  const baseText = base.text;
  const baseStarts = lineStarts(baseText);
  const text = spliceText(baseText, replacements);
  const textStarts = lineStarts(text);
  const names = base.names.clone();
  const entries: Mapping[] = [];

  /** add an entry at an offset in the spliced text */
  function addEntry(textPos: number, original?: OriginalLocation): void {
    const generatedLine = lineIndex(textStarts, textPos);
    const generatedColumn = textPos - textStarts[generatedLine];
    entries.push(
      original
        ? { generatedLine, generatedColumn, original }
        : { generatedLine, generatedColumn }
    );
  }

  /** original location of an offset in the base text */
  function lookupBase(basePos: number): OriginalLocation | undefined {
    const line = lineIndex(baseStarts, basePos);
    return tracePosition(base.mappings, line, basePos - baseStarts[line]);
  }

  // base entries, moved to their spliced positions
  let next = 0; // index of the first replacement not entirely before the entry
  let shift = 0; // length change from replacements before the entry
  for (const m of base.mappings) {
    const basePos = baseOffset(baseText, baseStarts, m);
    if (basePos === undefined) continue;
    while (next < replacements.length && replacements[next].end <= basePos) {
      shift += lengthChange(replacements[next]);
      next++;
    }
    const covering = replacements[next];
    if (covering && covering.start < basePos && basePos < covering.end) {
      continue; // replaced
    }
    addEntry(basePos + shift, m.original);
  }

  // entries for replacement text and the text that follows it
  let outShift = 0;
  for (const r of replacements) {
    const { start, end, content, name } = r;
    if (content) {
      let named: OriginalLocation | undefined;
      if (name !== undefined) {
        const found = lookupBase(start);
        if (found) named = { ...found, nameIndex: names.intern(name) };
      }
      addEntry(start + outShift, named);
    }
    outShift += lengthChange(r);
    if (end < baseText.length) {
      addEntry(end + outShift, lookupBase(end));
    }
  }

  return {
    text,
    mappings: normalizeMappings(entries),
    sources: base.sources,
    names,
    chainDepth: base.chainDepth,
  };
}

function lengthChange(r: Replacement): number {
  return r.content.length - (r.end - r.start);
}

/** @return offset of an entry's generated position in the text,
 * or undefined if the entry is beyond the last line */
function baseOffset(
  text: string,
  starts: number[],
  m: Mapping
): number | undefined {
  const { generatedLine, generatedColumn } = m;
  if (generatedLine >= starts.length) return undefined;
  const lineStart = starts[generatedLine];
  const lineEnd =
    generatedLine + 1 < starts.length
      ? starts[generatedLine + 1] - 1
      : text.length;
  return Math.min(lineStart + generatedColumn, lineEnd);
}
