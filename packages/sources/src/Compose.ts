import {
  ContentCache,
  lineStarts,
  logger,
  type Mapping,
  type OriginalLocation,
  SourceTable,
  srcTrace,
  StringTable,
  tracePosition,
  tracing,
} from "mapping-codec";
import {
  type Composed,
  defaultMaxChainDepth,
  type MapOptions,
} from "./Composed.js";
import { normalizeMappings } from "./Normalize.js";
import { fingerprintSource } from "./Queries.js";
import { composeReplace } from "./Slicer.js";
import type {
  CachedSource,
  ConcatSource,
  MappedSource,
  OriginalSource,
  RawSource,
  Source,
} from "./Source.js";
import { identityMappings } from "./Tokens.js";

/** thrown when a chain of source maps is longer than allowed */
export class ResolutionError extends Error {
  constructor(
    /** source whose map chain exceeded the limit */
    readonly sourceName: string,
    readonly depth: number
  ) {
    super(
      `source map chain through '${sourceName}' exceeds ${depth - 1} levels`
    );
    this.name = "ResolutionError";
  }
}

/** composed results of cached sources,
 * shared by cached sources with equal content */
export const composeCache = new ContentCache<Composed>();

interface ComposeContext {
  maxChainDepth: number;

  /** results for sources already composed during this walk */
  memo: Map<Source, Composed>;
}

/**
 * Compute the text and merged mapping table for a source tree,
 * tracing through any nested source maps.
 */
export function compose(source: Source, options: MapOptions = {}): Composed {
  const ctx: ComposeContext = {
    maxChainDepth: options.maxChainDepth ?? defaultMaxChainDepth,
    memo: new Map(),
  };
  return composeNode(source, ctx, 0);
}

/** @param depth - number of source maps traced through to reach this source */
function composeNode(
  source: Source,
  ctx: ComposeContext,
  depth: number
): Composed {
  const found = ctx.memo.get(source);
  if (found && withinDepth(found, ctx, depth)) return found;

  const composed = composeKind(source, ctx, depth);
  ctx.memo.set(source, composed);
  return composed;
}

function composeKind(
  source: Source,
  ctx: ComposeContext,
  depth: number
): Composed {
  switch (source.kind) {
    case "raw":
      return composeRaw(source);
    case "original":
      return composeOriginal(source);
    case "mapped":
      return composeMapped(source, ctx, depth);
    case "concat":
      return composeConcat(source, ctx, depth);
    case "replace":
      return composeReplace(source, (base) => composeNode(base, ctx, depth));
    case "cached":
      return composeCached(source, ctx, depth);
  }
}

/**
 * A stored result can be reused at a depth only if its own chains of
 * source maps still fit under the limit from there.
 * (otherwise the source is composed again, to report the chain that's too long)
 */
function withinDepth(
  composed: Composed,
  ctx: ComposeContext,
  depth: number
): boolean {
  return depth + composed.chainDepth <= ctx.maxChainDepth;
}

function composeRaw(source: RawSource): Composed {
  return {
    text: source.text,
    mappings: [],
    sources: new SourceTable(),
    names: new StringTable(),
    chainDepth: 0,
  };
}

function composeOriginal(source: OriginalSource): Composed {
  const { text, name } = source;
  const sources = new SourceTable([name], [text]);
  return {
    text,
    mappings: identityMappings(text, 0),
    sources,
    names: new StringTable(),
    chainDepth: 0,
  };
}

function composeCached(
  source: CachedSource,
  ctx: ComposeContext,
  depth: number
): Composed {
  const { cell, child } = source;
  const stored = cell.composed(() =>
    composeCache.getOrCompute(fingerprintSource(source), () =>
      composeNode(child, ctx, depth)
    )
  );
  if (withinDepth(stored, ctx, depth)) return stored;
  return composeNode(child, ctx, depth);
}

/**
 * Join the children's text and mappings, shifting each child's mappings
 * by the lines and columns of the text before it.
 */
function composeConcat(
  source: ConcatSource,
  ctx: ComposeContext,
  depth: number
): Composed {
  const sources = new SourceTable();
  const names = new StringTable();
  const entries: Mapping[] = [];
  const texts: string[] = [];
  let line = 0;
  let column = 0;
  let chainDepth = 0;

  for (const child of source.children) {
    const c = composeNode(child, ctx, depth);
    chainDepth = Math.max(chainDepth, c.chainDepth);

    // end the previous child's last mapping where this child starts
    if (column > 0) {
      entries.push({ generatedLine: line, generatedColumn: column });
    }

    const sourceIndices = c.sources
      .values()
      .map((s, i) => sources.intern(s, c.sources.content(i)));
    const nameIndices = c.names.values().map((n) => names.intern(n));

    for (const m of c.mappings) {
      const firstLine = m.generatedLine === 0;
      const shifted: Mapping = {
        generatedLine: m.generatedLine + line,
        generatedColumn: m.generatedColumn + (firstLine ? column : 0),
      };
      if (m.original) {
        shifted.original = reindex(m.original, sourceIndices, nameIndices);
      }
      entries.push(shifted);
    }

    texts.push(c.text);
    const lastNl = c.text.lastIndexOf("\n");
    if (lastNl === -1) {
      column += c.text.length;
    } else {
      line += countNewlines(c.text);
      column = c.text.length - lastNl - 1;
    }
  }

  return {
    text: texts.join(""),
    mappings: normalizeMappings(entries),
    sources,
    names,
    chainDepth,
  };
}

/**
 * Map the text's mappings into the parent's tables.
 * Entries pointing into upstream sources are traced through the upstream
 * source's own mappings.
 */
function composeMapped(
  source: MappedSource,
  ctx: ComposeContext,
  depth: number
): Composed {
  const { map, name, text, upstream } = source;
  const rooted = map.rootedSources();
  const sources = new SourceTable();
  const names = new StringTable();
  const nameIndices = map.names.map((n) => names.intern(n));

  checkUpstreamReferenced(source, rooted);
  let chainDepth = 0;

  // for each source in the map, either a local index or a composed upstream
  const resolvers = rooted.map((sourceName, i) => {
    const up = upstream[sourceName] ?? upstream[map.sources[i]];
    if (up) {
      if (depth + 1 > ctx.maxChainDepth) {
        throw new ResolutionError(name, depth + 1);
      }
      const composed = composeNode(up, ctx, depth + 1);
      chainDepth = Math.max(chainDepth, composed.chainDepth + 1);
      return { sourceName, composed };
    }
    const content = sourceContent(source, i, sourceName);
    return sources.intern(sourceName, content);
  });

  const starts = lineStarts(text);
  const inText = map
    .decodedMappings()
    .filter((m) => withinText(text, starts, m));

  const entries = inText.map((m) => {
    const { generatedLine, generatedColumn, original } = m;
    const entry: Mapping = { generatedLine, generatedColumn };
    if (!original) return entry;

    const resolver = resolvers[original.sourceIndex];
    const nameIndex =
      original.nameIndex === undefined
        ? undefined
        : nameIndices[original.nameIndex];

    const { line, column } = original;
    if (typeof resolver === "number") {
      entry.original = location(resolver, line, column, nameIndex);
      return entry;
    }

    const { sourceName, composed } = resolver;
    const traced = tracePosition(composed.mappings, line, column);
    if (!traced) {
      // gap in the upstream mappings, keep the intermediate position
      traceGap(composed.text, original, sourceName);
      const content = sourceContent(source, original.sourceIndex, sourceName);
      const index = sources.intern(sourceName, content ?? composed.text);
      entry.original = location(index, line, column, nameIndex);
      return entry;
    }

    const upSources = composed.sources;
    const index = sources.intern(
      upSources.get(traced.sourceIndex),
      upSources.content(traced.sourceIndex)
    );
    const tracedName =
      traced.nameIndex === undefined
        ? nameIndex
        : names.intern(composed.names.get(traced.nameIndex));
    entry.original = location(index, traced.line, traced.column, tracedName);
    return entry;
  });

  const mappings = normalizeMappings(entries);
  return { text, mappings, sources, names, chainDepth };
}

/** @return true if an entry's generated position is inside the text */
function withinText(text: string, starts: number[], m: Mapping): boolean {
  const { generatedLine, generatedColumn } = m;
  if (generatedLine >= starts.length) return false;
  const lineEnd =
    generatedLine + 1 < starts.length
      ? starts[generatedLine + 1] - 1
      : text.length;
  return starts[generatedLine] + generatedColumn <= lineEnd;
}

/** content for a source in a mapped source's map */
function sourceContent(
  source: MappedSource,
  index: number,
  sourceName: string
): string | undefined {
  const { map, name, originalSource, removeOriginalSource } = source;
  if (sourceName === name) {
    if (removeOriginalSource) return undefined;
    return map.sourcesContent?.[index] ?? originalSource;
  }
  return map.sourcesContent?.[index] ?? undefined;
}

/** warn about upstream sources that the map never refers to */
function checkUpstreamReferenced(source: MappedSource, rooted: string[]): void {
  const { map, name, upstream } = source;
  for (const key of Object.keys(upstream)) {
    if (!rooted.includes(key) && !map.sources.includes(key)) {
      logger(
        `upstream source '${key}' is not referenced by the map for '${name}'`
      );
    }
  }
}

function traceGap(
  upstreamText: string,
  original: OriginalLocation,
  sourceName: string
): void {
  if (!tracing) return;
  const { line, column } = original;
  const starts = lineStarts(upstreamText);
  const lineStart = starts[Math.min(line, starts.length - 1)];
  const pos = Math.min(lineStart + column, upstreamText.length);
  srcTrace(
    upstreamText,
    pos,
    `no mapping in '${sourceName}' at line ${line} column ${column}`
  );
}

function location(
  sourceIndex: number,
  line: number,
  column: number,
  nameIndex: number | undefined
): OriginalLocation {
  return nameIndex === undefined
    ? { sourceIndex, line, column }
    : { sourceIndex, line, column, nameIndex };
}

function reindex(
  original: OriginalLocation,
  sourceIndices: number[],
  nameIndices: number[]
): OriginalLocation {
  const { line, column, nameIndex } = original;
  return location(
    sourceIndices[original.sourceIndex],
    line,
    column,
    nameIndex === undefined ? undefined : nameIndices[nameIndex]
  );
}

function countNewlines(text: string): number {
  let count = 0;
  for (let i = text.indexOf("\n"); i !== -1; i = text.indexOf("\n", i + 1)) {
    count++;
  }
  return count;
}
