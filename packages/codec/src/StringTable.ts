/**
 * Deduplicated strings, each assigned a stable index in insertion order.
 * Mapping entries refer to sources and names by these indices.
 */
export class StringTable {
  protected readonly strings: string[] = [];
  protected readonly indices = new Map<string, number>();

  constructor(initial: Iterable<string> = []) {
    for (const s of initial) this.intern(s);
  }

  /** @return the index of the string, adding it to the table if necessary */
  intern(s: string): number {
    const found = this.indices.get(s);
    if (found !== undefined) return found;
    const index = this.strings.length;
    this.strings.push(s);
    this.indices.set(s, index);
    return index;
  }

  /** @return the index of an exactly matching string, or undefined */
  indexOf(s: string): number | undefined {
    return this.indices.get(s);
  }

  get(index: number): string {
    const s = this.strings[index];
    if (s === undefined) {
      throw new RangeError(`no string at index ${index} (size ${this.size})`);
    }
    return s;
  }

  has(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.strings.length;
  }

  get size(): number {
    return this.strings.length;
  }

  values(): readonly string[] {
    return this.strings;
  }

  clone(): StringTable {
    return new StringTable(this.strings);
  }
}

/** A StringTable of source identifiers,
 * with optional content for each source */
export class SourceTable extends StringTable {
  private readonly contents: (string | undefined)[] = [];

  constructor(
    initial: Iterable<string> = [],
    contents: readonly (string | null | undefined)[] = []
  ) {
    super();
    let i = 0;
    for (const s of initial) {
      this.intern(s, contents[i++] ?? undefined);
    }
  }

  /** add a source if necessary, and record its content if none is known yet */
  intern(s: string, content?: string): number {
    const index = super.intern(s);
    if (content !== undefined && this.contents[index] === undefined) {
      this.contents[index] = content;
    }
    return index;
  }

  content(index: number): string | undefined {
    return this.contents[index];
  }

  hasContent(): boolean {
    return this.contents.some((c) => c !== undefined);
  }

  clone(): SourceTable {
    return new SourceTable(this.strings, this.contents);
  }
}
