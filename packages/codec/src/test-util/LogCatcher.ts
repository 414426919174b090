/** captured log output, for tests that swap loggers with _withBaseLogger */
export interface LogCatcher {
  log: (...params: unknown[]) => void;

  /** captured lines, joined by newlines */
  logged: () => string;

  lines: readonly string[];
}

export function logCatch(): LogCatcher {
  const lines: string[] = [];
  return {
    lines,
    log: (...params) => {
      lines.push(params.map(String).join(" "));
    },
    logged: () => lines.join("\n"),
  };
}
