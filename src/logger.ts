const LOG_PREFIX = "movie-reports";

export const logLevels = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof logLevels)[number];

export type LogSink = (line: string) => void;

export interface Logger {
  debug: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
}

function formatArg(arg: unknown): string {
  if (typeof arg === "string") return arg;
  if (arg instanceof Error) return arg.message;
  if (typeof arg === "object" && arg !== null) return JSON.stringify(arg);
  return String(arg);
}

/**
 * Diagnostics go to stderr so they never interleave with report output.
 */
export function createLogger(
  level: LogLevel = "warn",
  sink: LogSink = (line) => process.stderr.write(`${line}\n`),
): Logger {
  const threshold = logLevels.indexOf(level);

  const emit =
    (name: Exclude<LogLevel, "silent">) =>
    (...args: unknown[]): void => {
      if (logLevels.indexOf(name) < threshold) return;
      sink([`${LOG_PREFIX} [${name}]`, ...args.map(formatArg)].join(" "));
    };

  return {
    debug: emit("debug"),
    error: emit("error"),
    info: emit("info"),
    warn: emit("warn"),
  };
}
