export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

const severity: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 };

/** Console logger that prefixes every line with `[scope]`. */
export function createLogger(
  scope: string,
  level: LogLevel = "info",
  output: Pick<Console, "debug" | "log" | "warn" | "error"> = console,
): Logger {
  const prefix = `[${scope}]`;
  const at =
    (target: Exclude<LogLevel, "silent">, write: (...args: unknown[]) => void) =>
    (...args: unknown[]) => {
      if (severity[target] >= severity[level]) write(prefix, ...args);
    };

  return {
    debug: at("debug", (...args) => output.debug(...args)),
    info: at("info", (...args) => output.log(...args)),
    warn: at("warn", (...args) => output.warn(...args)),
    error: at("error", (...args) => output.error(...args)),
  };
}

export const silentLogger: Logger = createLogger("silent", "silent");

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
