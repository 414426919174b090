import {
  encodeMappings,
  type Mapping,
  type MappingTable,
  SourceMap,
  type SourceTable,
  type StringTable,
} from "mapping-codec";
import { linesOnly } from "./Normalize.js";

/** options for producing a source map */
export interface MapOptions {
  /** map each generated column (true), or only generated lines (false).
   * default true */
  columns?: boolean;

  /** 'file' field for the produced source map */
  file?: string;

  /** 'sourceRoot' field for the produced source map */
  sourceRoot?: string;

  /** maximum length of a chain of source maps to resolve through. default 32 */
  maxChainDepth?: number;
}

export const defaultMaxChainDepth = 32;

/**
 * Text and mapping table of a source,
 * in the source's own generated coordinates.
 * Composed results may be shared between parents and caches,
 * so they're never modified.
 */
export interface Composed {
  readonly text: string;
  readonly mappings: MappingTable;
  readonly sources: SourceTable;
  readonly names: StringTable;

  /** longest chain of source maps traced through to compose this result */
  readonly chainDepth: number;
}

/**
 * @return a source map for composed text,
 *  or undefined if there are no mappings to an original source
 */
export function toSourceMap(
  composed: Composed,
  options: MapOptions = {}
): SourceMap | undefined {
  const { columns = true, file, sourceRoot } = options;
  const table = columns ? composed.mappings : linesOnly(composed.mappings);
  if (!table.some((m) => m.original)) return undefined;

  const { mappings, sourceIndices, nameIndices } = compactIndices(table);
  const { sources, names } = composed;
  const contents = sourceIndices.map((i) => sources.content(i));
  const sourcesContent = contents.some((c) => c !== undefined)
    ? contents.map((c) => c ?? null)
    : undefined;

  return new SourceMap({
    sources: sourceIndices.map((i) => sources.get(i)),
    sourcesContent,
    names: nameIndices.map((i) => names.get(i)),
    mappings: encodeMappings(mappings),
    file,
    sourceRoot,
  });
}

interface Compacted {
  mappings: Mapping[];
  /** original source index for each compacted index */
  sourceIndices: number[];
  /** original name index for each compacted index */
  nameIndices: number[];
}

/** renumber source and name indices to include only those referenced,
 * in order of first reference */
function compactIndices(table: MappingTable): Compacted {
  const sourceMap = new Map<number, number>();
  const nameMap = new Map<number, number>();
  const mappings = table.map((m) => {
    const { original } = m;
    if (!original) return m;
    const sourceIndex = renumber(sourceMap, original.sourceIndex);
    const { line, column, nameIndex } = original;
    const renumbered =
      nameIndex === undefined
        ? { sourceIndex, line, column }
        : {
            sourceIndex,
            line,
            column,
            nameIndex: renumber(nameMap, nameIndex),
          };
    return { ...m, original: renumbered };
  });
  return {
    mappings,
    sourceIndices: [...sourceMap.keys()],
    nameIndices: [...nameMap.keys()],
  };
}

function renumber(indices: Map<number, number>, index: number): number {
  const found = indices.get(index);
  if (found !== undefined) return found;
  const next = indices.size;
  indices.set(index, next);
  return next;
}
