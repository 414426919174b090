import { fingerprint, type Fingerprint, SourceMap } from "mapping-codec";
import { compose } from "./Compose.js";
import { type MapOptions, toSourceMap } from "./Composed.js";
import { splicedPieces, spliceText } from "./Slicer.js";
import type { CachedSource, Source } from "./Source.js";

/** destination for writeTo(), e.g. a node Writable */
export interface TextSink {
  write(chunk: string): unknown;
}

/** result of sourceAndMap() */
export interface SourceAndMap {
  source: string;
  /** undefined if the text has no mappings to an original source */
  map?: SourceMap;
}

/** @return the generated text of a source */
export function text(source: Source): string {
  switch (source.kind) {
    case "raw":
    case "original":
    case "mapped":
      return source.text;
    case "concat":
      return source.children.map(text).join("");
    case "replace":
      return spliceText(text(source.base), source.replacements);
    case "cached": {
      const { cell, child } = source;
      return cell.text(() => text(child));
    }
  }
}

/** @return the length of the generated text in utf8 bytes */
export function size(source: Source): number {
  switch (source.kind) {
    case "cached": {
      const { cell, child } = source;
      return cell.size(() => size(child));
    }
    default:
      return Buffer.byteLength(text(source), "utf8");
  }
}

/** @return the generated text, utf8 encoded */
export function buffer(source: Source): Uint8Array {
  if (source.kind === "cached") {
    return source.cell.buffer(() => Buffer.from(text(source), "utf8"));
  }
  return Buffer.from(text(source), "utf8");
}

/**
 * @return a source map from the generated text to the original sources,
 *  or undefined if the generated text has no mappings to an original source
 */
export function map(
  source: Source,
  options: MapOptions = {}
): SourceMap | undefined {
  if (source.kind === "cached") return cachedMap(source, options);
  return toSourceMap(compose(source, options), options);
}

/** @return the generated text and its source map */
export function sourceAndMap(
  source: Source,
  options: MapOptions = {}
): SourceAndMap {
  if (source.kind === "cached") {
    const sourceMap = cachedMap(source, options);
    return withMap(text(source), sourceMap);
  }
  const composed = compose(source, options);
  return withMap(composed.text, toSourceMap(composed, options));
}

/**
 * Write the generated text to a sink in pieces, without computing any mappings.
 * Errors thrown by the sink are passed through to the caller.
 */
export function writeTo(source: Source, sink: TextSink): void {
  switch (source.kind) {
    case "raw":
    case "original":
    case "mapped":
      writeChunk(sink, source.text);
      break;
    case "concat":
      source.children.forEach((c) => writeTo(c, sink));
      break;
    case "replace": {
      const pieces = splicedPieces(text(source.base), source.replacements);
      pieces.forEach((p) => writeChunk(sink, p));
      break;
    }
    case "cached":
      writeChunk(sink, text(source));
      break;
  }
}

/**
 * @return a hash of everything that determines a source's text and mappings.
 * Sources with equal fingerprints produce identical results.
 * (a cached source has the same fingerprint as its child)
 */
export function fingerprintSource(source: Source): Fingerprint {
  switch (source.kind) {
    case "raw":
      return fingerprint("raw", source.text);
    case "original":
      return fingerprint("original", source.name, source.text);
    case "mapped": {
      const { name, map, originalSource, removeOriginalSource } = source;
      const upstream = Object.entries(source.upstream)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .flatMap(([k, up]) => [k, fingerprintSource(up)]);
      return fingerprint(
        "mapped",
        name,
        source.text,
        map.toString(),
        optionalField(originalSource),
        removeOriginalSource ? "remove" : "keep",
        ...upstream
      );
    }
    case "concat":
      return fingerprint("concat", ...source.children.map(fingerprintSource));
    case "replace": {
      const replaced = source.replacements.flatMap((r) => [
        String(r.start),
        String(r.end),
        r.content,
        optionalField(r.name),
      ]);
      const base = fingerprintSource(source.base);
      return fingerprint("replace", base, ...replaced);
    }
    case "cached": {
      const { cell, child } = source;
      return cell.fingerprint(() => fingerprintSource(child));
    }
  }
}

/** maps from a cached source are stored per columns setting,
 * with file and sourceRoot applied afterwards */
function cachedMap(
  source: CachedSource,
  options: MapOptions
): SourceMap | undefined {
  const { columns = true, maxChainDepth } = options;
  // composing checks the chain depth, even when the map is already stored
  const composed = compose(source, { columns, maxChainDepth });
  const sourceMap = source.cell.map(columns, () =>
    toSourceMap(composed, { columns })
  );
  return sourceMap && withDocumentFields(sourceMap, options);
}

function withDocumentFields(
  sourceMap: SourceMap,
  options: MapOptions
): SourceMap {
  const { file, sourceRoot } = options;
  if (file === undefined && sourceRoot === undefined) return sourceMap;
  return new SourceMap({
    ...sourceMap.toJSON(),
    file: file ?? sourceMap.file,
    sourceRoot: sourceRoot ?? sourceMap.sourceRoot,
  });
}

function withMap(source: string, sourceMap?: SourceMap): SourceAndMap {
  return sourceMap ? { source, map: sourceMap } : { source };
}

function writeChunk(sink: TextSink, chunk: string): void {
  if (chunk) sink.write(chunk);
}

/** distinguish an absent field from an empty string */
function optionalField(s: string | undefined): string {
  return s === undefined ? "-" : "+" + s;
}
