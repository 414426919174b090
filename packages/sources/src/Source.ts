import { SourceMap, srcContext } from "mapping-codec";
import { CacheCell } from "./CacheCell.js";
import { text } from "./Queries.js";

/**
 * A composable text source. Sources are immutable once constructed
 * and may be shared by any number of parents.
 */
export type Source =
  | RawSource
  | OriginalSource
  | MappedSource
  | ConcatSource
  | ReplaceSource
  | CachedSource;

/** text without any mapping */
export interface RawSource {
  readonly kind: "raw";
  readonly text: string;
}

/** text of an original file, which maps to itself */
export interface OriginalSource {
  readonly kind: "original";
  readonly text: string;
  /** source identifier, e.g. a file path */
  readonly name: string;
}

/** generated text, with a source map to the text it was generated from */
export interface MappedSource {
  readonly kind: "mapped";
  readonly text: string;
  /** source identifier for the text the map points to */
  readonly name: string;
  readonly map: SourceMap;

  /** content of the source called 'name', if the map doesn't contain it */
  readonly originalSource?: string;

  /** sources referenced by the map that are themselves generated,
   * positions in these are traced further through the upstream source */
  readonly upstream: Readonly<Record<string, Source>>;

  /** omit content of the source called 'name' from the composed map */
  readonly removeOriginalSource: boolean;
}

/** sources joined end to end */
export interface ConcatSource {
  readonly kind: "concat";
  readonly children: readonly Source[];
}

/** replace a range [start, end) of the base text */
export interface Replacement {
  start: number;
  end: number;
  content: string;
  /** identifier name for the replaced text, e.g. for a renamed variable */
  name?: string;
}

/** a base source with some ranges of its text replaced */
export interface ReplaceSource {
  readonly kind: "replace";
  readonly base: Source;
  /** sorted by start, non overlapping */
  readonly replacements: readonly Readonly<Replacement>[];
}

/** wraps a source to remember its text, size, maps and fingerprint */
export interface CachedSource {
  readonly kind: "cached";
  readonly child: Source;
  readonly cell: CacheCell;
}

/** thrown when a source is constructed with inconsistent arguments */
export class ConstructionError extends Error {
  constructor(msg: string) {
    super(msg);
    this.name = "ConstructionError";
  }
}

/** @return a source for text with no mapping */
export function raw(text: string): RawSource {
  return Object.freeze({ kind: "raw", text });
}

/** @return a source for the text of an original file */
export function original(text: string, name: string): OriginalSource {
  return Object.freeze({ kind: "original", text, name });
}

export interface WithMapArgs {
  text: string;
  /** source identifier for the text the map points to */
  name: string;
  map: SourceMap | string | object;

  /** content of the source called 'name' */
  originalSource?: string;

  /** source map from originalSource to the texts it was generated from.
   * (shorthand for an upstream entry for 'name') */
  innerMap?: SourceMap | string | object;

  /** generated sources referenced by the map */
  upstream?: Record<string, Source>;

  removeOriginalSource?: boolean;
}

/**
 * @return a source for generated text with a source map
 * @throws ConstructionError if the map's mappings refer
 *  to missing sources or names
 */
export function withMap(args: WithMapArgs): MappedSource {
  const { text, name, originalSource, innerMap } = args;
  const map = asSourceMap(args.map);
  validateIndices(map, name);

  const upstream: Record<string, Source> = { ...args.upstream };
  if (innerMap !== undefined) {
    if (originalSource === undefined) {
      throw new ConstructionError(
        `innerMap for '${name}' requires originalSource`
      );
    }
    upstream[name] = withMap({
      text: originalSource,
      name,
      map: innerMap,
    });
  }

  return Object.freeze({
    kind: "mapped",
    text,
    name,
    map,
    originalSource,
    upstream: Object.freeze(upstream),
    removeOriginalSource: args.removeOriginalSource ?? false,
  });
}

/** @return a source joining the provided sources
 * (strings become raw sources) */
export function concat(...children: (Source | string)[]): ConcatSource {
  const flat = children.flatMap((c) => {
    if (typeof c === "string") return [raw(c)];
    if (c.kind === "concat") return c.children;
    return [c];
  });
  return Object.freeze({ kind: "concat", children: Object.freeze(flat) });
}

/**
 * @return a source with ranges of the base text replaced
 * @throws ConstructionError if replacements overlap, are out of order,
 *  or extend outside the base text
 */
export function replace(
  base: Source,
  replacements: Replacement[]
): ReplaceSource {
  const baseText = text(base);
  let prevEnd = 0;
  let prevStart = 0;
  const checked = replacements.map((r) => {
    const { start, end } = r;
    if (!Number.isInteger(start) || !Number.isInteger(end) || start < 0) {
      rangeError(baseText, r, "is not a valid range");
    }
    if (end < start) {
      rangeError(baseText, r, "ends before it starts");
    }
    if (end > baseText.length) {
      const len = baseText.length;
      rangeError(baseText, r, `extends past the end of the text (${len})`);
    }
    if (start < prevStart) {
      const problem = `starts before the previous replacement (${prevStart})`;
      rangeError(baseText, r, problem);
    }
    if (start < prevEnd) {
      const problem = `overlaps the previous replacement ending at ${prevEnd}`;
      rangeError(baseText, r, problem);
    }
    prevStart = start;
    prevEnd = end;
    return Object.freeze({ ...r });
  });

  return Object.freeze({
    kind: "replace",
    base,
    replacements: Object.freeze(checked),
  });
}

/** @return a replacement that inserts content before a position,
 * replacing nothing */
export function insertion(
  position: number,
  content: string,
  name?: string
): Replacement {
  return name === undefined
    ? { start: position, end: position, content }
    : { start: position, end: position, content, name };
}

/** @return a source that remembers the results of queries to the child */
export function cached(child: Source): CachedSource {
  if (child.kind === "cached") return child;
  return Object.freeze({ kind: "cached", child, cell: new CacheCell() });
}

function rangeError(baseText: string, r: Replacement, problem: string): never {
  const { start, end } = r;
  const msg = `replacement [${start}, ${end}) ${problem}`;
  const inText =
    Number.isInteger(start) && start >= 0 && start <= baseText.length;
  if (!inText) throw new ConstructionError(msg);

  const last = end - 1;
  const pos: number | [number, number] =
    last > start && end <= baseText.length ? [start, last] : start;
  throw new ConstructionError([msg, ...srcContext(baseText, pos)].join("\n"));
}

function asSourceMap(map: SourceMap | string | object): SourceMap {
  return map instanceof SourceMap ? map : SourceMap.fromJson(map);
}

/** verify that mapping entries refer to existing sources and names */
function validateIndices(map: SourceMap, name: string): void {
  const sourceCount = map.sources.length;
  const nameCount = map.names.length;
  for (const m of map.decodedMappings()) {
    const { original } = m;
    if (!original) continue;
    const { sourceIndex, nameIndex } = original;
    const at = `line ${m.generatedLine} column ${m.generatedColumn}`;
    if (sourceIndex >= sourceCount) {
      throw new ConstructionError(
        `map for '${name}' refers to source ${sourceIndex} at ${at}, ` +
          `but has ${sourceCount} sources`
      );
    }
    if (nameIndex !== undefined && nameIndex >= nameCount) {
      throw new ConstructionError(
        `map for '${name}' refers to name ${nameIndex} at ${at}, ` +
          `but has ${nameCount} names`
      );
    }
  }
}
