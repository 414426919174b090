export let tracing = false;

/** enable (or disable) trace logging of mapping resolution */
export function enableTracing(enable = true): void {
  tracing = enable;
}

/** base logger. (can be overriden to a capturing logger for tests) */
export let logger: typeof console.log = console.log;

/** use temporary logger for tests */
export function _withBaseLogger<T>(logFn: typeof console.log, fn: () => T): T {
  const orig = logger;
  try {
    logger = logFn;
    return fn();
  } finally {
    logger = orig;
  }
}

/** log a message, then the source line and a caret under the position */
export function srcLog(
  src: string,
  pos: number | [number, number],
  ...msgs: unknown[]
): void {
  logger(...msgs);
  srcContext(src, pos).forEach((line) => logger(line));
}

/** log a message along with src line, but only if tracing is enabled */
export function srcTrace(
  src: string,
  pos: number | [number, number],
  ...msgs: unknown[]
): void {
  if (tracing) {
    srcLog(src, pos, ...msgs);
  }
}

/**
 * @return two lines of text: the src line containing the position
 * (with its line number), and a line of carets underneath the position
 */
export function srcContext(
  src: string,
  pos: number | [number, number]
): [string, string] {
  const { line, lineNum, linePos, linePos2 } = srcLine(src, pos);
  return [`${line}  Ln ${lineNum}`, carets(linePos, linePos2)];
}

/** a caret under each marked position in the line */
function carets(linePos: number, linePos2?: number): string {
  const marks = [linePos];
  if (linePos2 !== undefined && linePos2 > linePos) marks.push(linePos2);
  const width = marks[marks.length - 1] + 1;
  const cols = Array.from({ length: width }, (_, i) =>
    marks.includes(i) ? "^" : " "
  );
  return cols.join("");
}

// line starts of recently logged srcs
const startCache = new Map<string, number[]>();

export interface SrcLine {
  /** text of the line, without its newline */
  line: string;

  /** line number, counting from 1 */
  lineNum: number;

  /** offset of the position in the line */
  linePos: number;

  /** offset of the second position in the line, if it's on the same line */
  linePos2?: number;
}

/** @return the line of src containing a position (or the first of two) */
export function srcLine(
  src: string,
  position: number | [number, number]
): SrcLine {
  const [pos, pos2]: [number, number?] =
    typeof position === "number" ? [position] : position;
  const starts = cachedStarts(src);
  const index = lineIndex(starts, pos);
  const lineStart = starts[index];
  const lineEnd =
    index + 1 < starts.length ? starts[index + 1] - 1 : src.length;

  const found: SrcLine = {
    line: src.slice(lineStart, lineEnd),
    lineNum: index + 1,
    linePos: pos - lineStart,
  };
  if (pos2 !== undefined && pos2 >= lineStart && pos2 <= lineEnd) {
    found.linePos2 = pos2 - lineStart;
  }
  return found;
}

/** @return index of the line containing pos (binary search of line starts) */
export function lineIndex(starts: number[], pos: number): number {
  // find the first line starting after pos
  let lo = 0;
  let hi = starts.length;
  while (lo < hi) {
    const mid = (lo + hi) >> 1;
    if (starts[mid] <= pos) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return Math.max(lo - 1, 0);
}

/** @return offset of the start of each line in src */
export function lineStarts(src: string): number[] {
  const starts = [0];
  for (let i = src.indexOf("\n"); i !== -1; i = src.indexOf("\n", i + 1)) {
    starts.push(i + 1);
  }
  return starts;
}

/** line starts, reused when logging repeatedly from the same src */
function cachedStarts(src: string): number[] {
  const found = startCache.get(src);
  if (found) return found;
  const starts = lineStarts(src);
  startCache.set(src, starts);
  return starts;
}
