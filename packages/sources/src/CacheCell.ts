import type { Fingerprint, SourceMap } from "mapping-codec";
import type { Composed } from "./Composed.js";

/**
 * Lazily filled storage for the results derived from a cached source.
 * Sources are immutable, so a stored value stays valid for the cell's lifetime.
 */
export class CacheCell {
  private cachedText?: string;
  private cachedSize?: number;
  private cachedBuffer?: Uint8Array;
  private cachedFingerprint?: Fingerprint;
  private cachedComposed?: Composed;

  /** output maps, by columns option. null if the source has no mappings */
  private readonly maps = new Map<boolean, SourceMap | null>();

  text(compute: () => string): string {
    if (this.cachedText === undefined) this.cachedText = compute();
    return this.cachedText;
  }

  size(compute: () => number): number {
    if (this.cachedSize === undefined) this.cachedSize = compute();
    return this.cachedSize;
  }

  buffer(compute: () => Uint8Array): Uint8Array {
    if (this.cachedBuffer === undefined) this.cachedBuffer = compute();
    return this.cachedBuffer;
  }

  fingerprint(compute: () => Fingerprint): Fingerprint {
    if (this.cachedFingerprint === undefined) {
      this.cachedFingerprint = compute();
    }
    return this.cachedFingerprint;
  }

  composed(compute: () => Composed): Composed {
    if (this.cachedComposed === undefined) this.cachedComposed = compute();
    return this.cachedComposed;
  }

  map(
    columns: boolean,
    compute: () => SourceMap | undefined
  ): SourceMap | undefined {
    const found = this.maps.get(columns);
    if (found !== undefined) return found ?? undefined;
    const map = compute();
    this.maps.set(columns, map ?? null);
    return map;
  }

  /** @return the names of the results computed so far (for debugging) */
  filled(): string[] {
    const present: [string, unknown][] = [
      ["text", this.cachedText],
      ["size", this.cachedSize],
      ["buffer", this.cachedBuffer],
      ["fingerprint", this.cachedFingerprint],
      ["composed", this.cachedComposed],
    ];
    const names = present.filter(([, v]) => v !== undefined).map(([n]) => n);
    const maps = [...this.maps.keys()].map((c) => (c ? "map" : "linesMap"));
    return [...names, ...maps];
  }
}
