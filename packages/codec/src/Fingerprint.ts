import { createHash } from "node:crypto";

/** stable content hash, used as a cache key */
export type Fingerprint = `sha256:${string}`;

/**
 * Hash a list of fields. Fields are length prefixed,
 * so ["ab", "c"] and ["a", "bc"] hash differently.
 */
export function fingerprint(...fields: readonly string[]): Fingerprint {
  const hash = createHash("sha256");
  for (const f of fields) {
    hash.update(`${f.length}:`);
    hash.update(f);
  }
  return `sha256:${hash.digest("hex")}`;
}
