import { decodeCached } from "./ContentCache.js";
import { logger } from "./Logging.js";
import { tracePosition } from "./Lookup.js";
import type { MappingTable } from "./Mappings.js";

/** source map document, as serialized in json */
export interface RawSourceMap {
  version: 3;
  sources: string[];
  sourcesContent?: (string | null)[];
  names: string[];
  mappings: string;
  file?: string;
  sourceRoot?: string;
}

/** thrown for a source map document with missing or mistyped fields */
export class SourceMapFormatError extends Error {
  constructor(msg: string) {
    super(msg);
    this.name = "SourceMapFormatError";
  }
}

export interface SourceMapFields {
  sources: readonly string[];
  sourcesContent?: readonly (string | null)[];
  names: readonly string[];
  mappings: string;
  file?: string;
  sourceRoot?: string;
}

/** a version 3 source map */
export class SourceMap {
  readonly version = 3;
  readonly sources: readonly string[];
  readonly sourcesContent: readonly (string | null)[] | undefined;
  readonly names: readonly string[];
  readonly mappings: string;
  readonly file: string | undefined;
  readonly sourceRoot: string | undefined;

  constructor(fields: SourceMapFields) {
    this.sources = Object.freeze([...fields.sources]);
    this.names = Object.freeze([...fields.names]);
    this.mappings = fields.mappings;
    this.file = fields.file;
    this.sourceRoot = fields.sourceRoot;

    const { sourcesContent } = fields;
    if (sourcesContent && sourcesContent.length !== this.sources.length) {
      const count = this.sources.length;
      logger(
        `sourcesContent has ${sourcesContent.length} entries ` +
          `for ${count} sources`
      );
      const padded = this.sources.map((_, i) => sourcesContent[i] ?? null);
      this.sourcesContent = Object.freeze(padded);
    } else {
      this.sourcesContent =
        sourcesContent && Object.freeze([...sourcesContent]);
    }
    Object.freeze(this);
  }

  /** parse and validate a source map,
   * from json text or an already parsed object */
  static fromJson(json: unknown): SourceMap {
    const obj: unknown = typeof json === "string" ? parseJson(json) : json;
    if (!isRecord(obj)) {
      throw new SourceMapFormatError("source map is not an object");
    }
    if (obj.version !== 3) {
      throw new SourceMapFormatError(
        `unsupported source map version: ${String(obj.version)}`
      );
    }
    const { sources, sourcesContent, names = [], mappings } = obj;
    if (!isStringArray(sources)) {
      throw new SourceMapFormatError("'sources' must be an array of strings");
    }
    if (!isStringArray(names)) {
      throw new SourceMapFormatError("'names' must be an array of strings");
    }
    if (typeof mappings !== "string") {
      throw new SourceMapFormatError("'mappings' must be a string");
    }
    if (sourcesContent !== undefined && !isContentArray(sourcesContent)) {
      throw new SourceMapFormatError(
        "'sourcesContent' must be an array of strings or nulls"
      );
    }
    return new SourceMap({
      sources,
      sourcesContent,
      names,
      mappings,
      file: optionalString(obj, "file"),
      sourceRoot: optionalString(obj, "sourceRoot"),
    });
  }

  /** decoded mapping entries
   * (shared with other maps that have identical mappings) */
  decodedMappings(): MappingTable {
    return decodeCached(this.mappings);
  }

  /** source identifiers, with sourceRoot applied */
  rootedSources(): string[] {
    const { sourceRoot } = this;
    if (!sourceRoot) return [...this.sources];
    const root = sourceRoot.endsWith("/") ? sourceRoot : sourceRoot + "/";
    return this.sources.map((s) => root + s);
  }

  toJSON(): RawSourceMap {
    const raw: RawSourceMap = {
      version: 3,
      sources: [...this.sources],
      names: [...this.names],
      mappings: this.mappings,
    };
    if (this.sourcesContent) raw.sourcesContent = [...this.sourcesContent];
    if (this.file !== undefined) raw.file = this.file;
    if (this.sourceRoot !== undefined) raw.sourceRoot = this.sourceRoot;
    return raw;
  }

  toString(): string {
    return JSON.stringify(this);
  }

  /** @return the map as a data: url, e.g. for a sourceMappingURL comment */
  toUrl(): string {
    const base64 = Buffer.from(this.toString(), "utf8").toString("base64");
    return `data:application/json;charset=utf-8;base64,${base64}`;
  }
}

/** an original position, as reported by originalPositionFor() */
export interface OriginalPosition {
  source: string;
  line: number;
  column: number;
  name?: string;
}

/**
 * Find the original position for a generated position in a source map.
 * (sourceRoot is applied to the reported source)
 *
 * @return the original position, or undefined if the position isn't mapped
 */
export function originalPositionFor(
  map: SourceMap,
  line: number,
  column: number
): OriginalPosition | undefined {
  const traced = tracePosition(map.decodedMappings(), line, column);
  if (!traced) return undefined;

  const source = map.rootedSources()[traced.sourceIndex];
  const position: OriginalPosition = {
    source,
    line: traced.line,
    column: traced.column,
  };
  if (traced.nameIndex !== undefined) {
    position.name = map.names[traced.nameIndex];
  }
  return position;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new SourceMapFormatError(`source map is not valid json: ${msg}`);
  }
}

function isRecord(obj: unknown): obj is Record<string, unknown> {
  return typeof obj === "object" && obj !== null && !Array.isArray(obj);
}

function isStringArray(a: unknown): a is string[] {
  return Array.isArray(a) && a.every((s) => typeof s === "string");
}

function isContentArray(a: unknown): a is (string | null)[] {
  return (
    Array.isArray(a) && a.every((s) => s === null || typeof s === "string")
  );
}

function optionalString(
  obj: Record<string, unknown>,
  field: string
): string | undefined {
  const value = obj[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw new SourceMapFormatError(`'${field}' must be a string`);
  }
  return value;
}
