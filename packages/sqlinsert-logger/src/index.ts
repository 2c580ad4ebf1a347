/**
 * Structured logging for sqlinsert packages
 *
 * Each logger is bound to a namespace such as "sqlinsert:executor" and writes
 * one JSON line per entry. The threshold comes from LOG_LEVEL, read on every
 * write, unless a level is passed explicitly. LOG_LEVEL=silent drops
 * everything.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogThreshold = LogLevel | "silent";

export type Logger = {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
};

export type LogEntry = {
  level: LogLevel;
  namespace: string;
  message: string;
  time: string;
  [key: string]: unknown;
};

export type LogSink = (entry: LogEntry) => void;

export type LoggerOptions = {
  level?: LogThreshold;
  sink?: LogSink;
};

const LEVEL_ORDER: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogThreshold(value: unknown): value is LogThreshold {
  return typeof value === "string" && Object.hasOwn(LEVEL_ORDER, value);
}

export function isLogLevel(value: unknown): value is LogLevel {
  return value !== "silent" && isLogThreshold(value);
}

function thresholdFromEnv(): LogThreshold {
  const value = process.env.LOG_LEVEL?.toLowerCase();
  return isLogThreshold(value) ? value : "info";
}

// Error instances have no enumerable properties, so JSON.stringify drops them
function serialize(meta: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    out[key] =
      value instanceof Error
        ? { name: value.name, message: value.message }
        : value;
  }
  return out;
}

export const consoleSink: LogSink = (entry) => {
  const line = JSON.stringify(entry, (_key, value: unknown) =>
    typeof value === "bigint" ? value.toString() : value,
  );
  switch (entry.level) {
    case "debug":
      console.debug(line);
      break;
    case "info":
      console.info(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "error":
      console.error(line);
      break;
  }
};

export function createLogger(
  namespace: string,
  options: LoggerOptions = {},
): Logger {
  const threshold = (): number =>
    LEVEL_ORDER[options.level ?? thresholdFromEnv()];
  const sink = options.sink ?? consoleSink;

  const write =
    (level: LogLevel) =>
    (message: string, meta: Record<string, unknown> = {}): void => {
      if (LEVEL_ORDER[level] < threshold()) {
        return;
      }
      sink({
        ...serialize(meta),
        level,
        namespace,
        message,
        time: new Date().toISOString(),
      });
    };

  return {
    debug: write("debug"),
    info: write("info"),
    warn: write("warn"),
    error: write("error"),
  };
}
