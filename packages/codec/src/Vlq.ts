const base64Chars =
  "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789+/";

/** base64 char code to digit value, -1 for chars outside the alphabet */
const charToDigit = new Int8Array(128).fill(-1);
for (let i = 0; i < base64Chars.length; i++) {
  charToDigit[base64Chars.charCodeAt(i)] = i;
}

const continuationBit = 32;
const digitMask = 31;
const maxInt32 = 2 ** 31 - 1;

/** thrown when a mappings string can't be decoded */
export class DecodeError extends Error {
  /** character offset in the mappings string where decoding failed */
  position: number;

  constructor(msg: string, position: number) {
    super(`${msg} (at offset ${position})`);
    this.name = "DecodeError";
    this.position = position;
  }
}

/** encode a signed integer as base64 variable length quantity digits */
export function encodeVlq(value: number): string {
  // sign goes in the lowest bit
  let v = value < 0 ? (-value << 1) | 1 : value << 1;
  let out = "";
  do {
    let digit = v & digitMask;
    v >>>= 5;
    if (v > 0) digit |= continuationBit;
    out += base64Chars[digit];
  } while (v > 0);
  return out;
}

/** @return true if the char code at pos terminates a vlq field list */
export function isSeparator(text: string, pos: number): boolean {
  const c = text.charCodeAt(pos);
  return c === 44 /* , */ || c === 59 /* ; */;
}

/**
 * Reads vlq encoded integers from a mappings string.
 * The caller positions the reader at the start of a field.
 */
export class VlqReader {
  pos = 0;

  constructor(readonly text: string) {}

  /** @return true if there are no more characters to read */
  done(): boolean {
    return this.pos >= this.text.length;
  }

  /** read one signed vlq value starting at the current position */
  read(): number {
    const { text } = this;
    const start = this.pos;
    let result = 0;
    let shift = 0;
    let digit: number;
    do {
      if (this.pos >= text.length || isSeparator(text, this.pos)) {
        throw new DecodeError("truncated vlq continuation", this.pos);
      }
      const code = text.charCodeAt(this.pos);
      digit = code < 128 ? charToDigit[code] : -1;
      if (digit < 0) {
        throw new DecodeError(
          `invalid base64 character '${text[this.pos]}'`,
          this.pos
        );
      }
      this.pos++;
      result += (digit & digitMask) * 2 ** shift;
      shift += 5;
      if (result > 2 * maxInt32 + 1) {
        throw new DecodeError("vlq value exceeds 32 bits", start);
      }
    } while (digit & continuationBit);

    const magnitude = Math.floor(result / 2);
    return result % 2 === 1 ? -magnitude : magnitude;
  }
}
