/**
 * Logging
 *
 * Loggers format lines as `[scope] message` and hand them to a sink.
 * The console sink is the default; a LogBuffer keeps lines in memory
 * for inspection after a run.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = [
  "debug",
  "info",
  "warn",
  "error",
  "silent",
];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export type LogSink = (level: Exclude<LogLevel, "silent">, line: string) => void;

export interface Logger {
  readonly level: LogLevel;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Logger writing to the same sink under a nested scope */
  child(scope: string): Logger;
}

export interface LoggerOptions {
  scope?: string;
  level?: LogLevel;
  sink?: LogSink;
}

export const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case "error":
      console.error(line);
      break;
    case "warn":
      console.warn(line);
      break;
    default:
      console.log(line);
  }
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && (LOG_LEVELS as readonly string[]).includes(value);
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? "info";
  const sink = options.sink ?? consoleSink;
  const scope = options.scope;

  const emit = (lineLevel: Exclude<LogLevel, "silent">, message: string) => {
    if (LEVEL_RANK[lineLevel] < LEVEL_RANK[level]) return;
    sink(lineLevel, scope ? `[${scope}] ${message}` : message);
  };

  return {
    level,
    debug: (message) => emit("debug", message),
    info: (message) => emit("info", message),
    warn: (message) => emit("warn", message),
    error: (message) => emit("error", message),
    child: (childScope) =>
      createLogger({
        level,
        sink,
        scope: scope ? `${scope}:${childScope}` : childScope,
      }),
  };
}

export const silentLogger: Logger = createLogger({ level: "silent" });

// ============================================================================
// In-memory log buffer
// ============================================================================

export interface LogBuffer {
  /** Collected lines, oldest first */
  readonly lines: string[];
  sink: LogSink;
  clear(): void;
}

/**
 * Collect log lines in memory, dropping the oldest beyond `maxEntries`.
 */
export function createLogBuffer(maxEntries = 1000): LogBuffer {
  const lines: string[] = [];
  let dropped = 0;

  return {
    lines,
    sink: (level, line) => {
      lines.push(level === "info" || level === "debug" ? line : `${level.toUpperCase()} ${line}`);
      if (lines.length > maxEntries) {
        // Drop the old marker too so it can be rewritten with the new total
        if (dropped > 0) lines.shift();
        const excess = lines.length - maxEntries + 1;
        lines.splice(0, excess);
        dropped += excess;
        lines.unshift(`[SYSTEM] Log truncated: removed ${dropped} old entries`);
      }
    },
    clear: () => {
      lines.length = 0;
      dropped = 0;
    },
  };
}

/**
 * Logger used by nodes and flows that were not given one
 */
export const defaultLogger: Logger = createLogger({ scope: "nodeloom", level: "warn" });
