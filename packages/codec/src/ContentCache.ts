import { fingerprint, type Fingerprint } from "./Fingerprint.js";
import { decodeMappings, type MappingTable } from "./Mappings.js";

/**
 * Process wide store of derived values, keyed by a fingerprint of their inputs.
 *
 * Values are computed outside of the cache and then inserted if absent,
 * so two callers racing on the same key may both compute. The first value
 * inserted is kept and returned to every later caller.
 * Computations must be pure functions of the key's content.
 */
export class ContentCache<V> {
  private readonly entries = new Map<Fingerprint, V>();
  private hitCount = 0;
  private missCount = 0;

  get(key: Fingerprint): V | undefined {
    return this.entries.get(key);
  }

  /** store a value unless one is already present
   * @return the stored value */
  insertIfAbsent(key: Fingerprint, value: V): V {
    const found = this.entries.get(key);
    if (found !== undefined) return found;
    this.entries.set(key, value);
    return value;
  }

  /** @return the cached value for key, computing and inserting it on a miss */
  getOrCompute(key: Fingerprint, compute: () => V): V {
    const found = this.entries.get(key);
    if (found !== undefined) {
      this.hitCount++;
      return found;
    }
    this.missCount++;
    return this.insertIfAbsent(key, compute());
  }

  get size(): number {
    return this.entries.size;
  }

  /** hit and miss counts since the last clear() */
  get stats(): { hits: number; misses: number } {
    return { hits: this.hitCount, misses: this.missCount };
  }

  clear(): void {
    this.entries.clear();
    this.hitCount = 0;
    this.missCount = 0;
  }
}

/** decoded mapping tables, shared by every caller decoding the same text */
export const decodeCache = new ContentCache<MappingTable>();

/**
 * Decode a mappings string,
 * reusing a previously decoded table for identical text.
 * The returned table is frozen, since it's shared.
 */
export function decodeCached(mappings: string): MappingTable {
  return decodeCache.getOrCompute(fingerprint(mappings), () =>
    freezeTable(decodeMappings(mappings))
  );
}

function freezeTable(table: MappingTable): MappingTable {
  for (const m of table) {
    if (m.original) Object.freeze(m.original);
    Object.freeze(m);
  }
  return Object.freeze(table);
}
