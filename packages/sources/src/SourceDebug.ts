import { dlog } from "berry-pretty";
import type { Source } from "./Source.js";

/** log a summary of a source tree */
export function printSource(source: Source, msg = ""): void {
  dlog(msg, { kind: source.kind }, sourceToText(source));
}

/** @return a one line per node summary of a source tree */
export function sourceToText(source: Source, indent = ""): string {
  const header = indent + nodeText(source);
  const children = childSources(source).map((c) =>
    sourceToText(c, indent + "  ")
  );
  return [header, ...children].join("\n");
}

function nodeText(source: Source): string {
  switch (source.kind) {
    case "raw":
      return `raw ${quoted(source.text)}`;
    case "original":
      return `original '${source.name}' ${quoted(source.text)}`;
    case "mapped": {
      const { name, map, upstream } = source;
      const up = Object.keys(upstream);
      const upText = up.length ? ` upstream: [${up.join(", ")}]` : "";
      return `mapped '${name}' sources: [${map.sources.join(", ")}]${upText}`;
    }
    case "concat":
      return `concat (${source.children.length})`;
    case "replace": {
      const ranges = source.replacements.map(
        (r) => `[${r.start}, ${r.end}) ${quoted(r.content)}`
      );
      return `replace ${ranges.join(" ")}`;
    }
    case "cached":
      return `cached {${source.cell.filled().join(", ")}}`;
  }
}

function childSources(source: Source): readonly Source[] {
  switch (source.kind) {
    case "concat":
      return source.children;
    case "replace":
      return [source.base];
    case "cached":
      return [source.child];
    case "mapped":
      return Object.values(source.upstream);
    default:
      return [];
  }
}

const maxQuoted = 20;

function quoted(text: string): string {
  const short =
    text.length > maxQuoted ? text.slice(0, maxQuoted - 3) + "..." : text;
  return JSON.stringify(short);
}
