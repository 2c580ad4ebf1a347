/**
 * Test logger that respects VERBOSE_TESTS environment variable
 *
 * By default, tests run silently. Set VERBOSE_TESTS=true to see all logs.
 */

import { createLogger } from "@sqlinsert/logger";
import type { LogEntry, Logger } from "@sqlinsert/logger";

const isVerbose = process.env.VERBOSE_TESTS === "true";

export const testLogger: Logger = createLogger("sqlinsert:test", {
  level: "debug",
  sink: isVerbose ? undefined : () => {},
});

/**
 * Logger that keeps its entries in memory for assertions
 */
export function createCapturingLogger(namespace = "sqlinsert:test"): {
  logger: Logger;
  entries: LogEntry[];
} {
  const entries: LogEntry[] = [];
  const logger = createLogger(namespace, {
    level: "debug",
    sink: (entry) => {
      entries.push(entry);
    },
  });
  return { logger, entries };
}

/**
 * Run `fn` with LOG_LEVEL set to `level`, collecting the entries that
 * library loggers write to the console meanwhile
 */
export async function captureConsoleLogs(
  level: string,
  fn: () => Promise<unknown>,
): Promise<LogEntry[]> {
  const lines: string[] = [];
  const capture = (line: unknown): void => {
    lines.push(String(line));
  };
  const saved = {
    debug: console.debug,
    info: console.info,
    warn: console.warn,
    error: console.error,
  };
  const previousLevel = process.env.LOG_LEVEL;

  console.debug = capture;
  console.info = capture;
  console.warn = capture;
  console.error = capture;
  process.env.LOG_LEVEL = level;
  try {
    await fn();
  } finally {
    Object.assign(console, saved);
    if (previousLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = previousLevel;
    }
  }

  return lines.map((line): LogEntry => JSON.parse(line));
}
