/**
 * Tests for the structured logger
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { createLogger, isLogLevel, isLogThreshold } from "@sqlinsert/logger";
import type { LogEntry } from "@sqlinsert/logger";
import { createCapturingLogger } from "@sqlinsert/test-utils";

describe("createLogger", () => {
  it("should write namespaced entries with merged meta", () => {
    const { logger, entries } = createCapturingLogger("sqlinsert:logger-test");
    logger.info("Prepared insert", { table: "candy" });

    expect(entries).to.have.length(1);
    const [entry] = entries;
    expect(entry?.level).to.equal("info");
    expect(entry?.namespace).to.equal("sqlinsert:logger-test");
    expect(entry?.message).to.equal("Prepared insert");
    expect(entry?.table).to.equal("candy");
    expect(entry?.time).to.be.a("string");
  });

  it("should drop entries below the threshold", () => {
    const entries: LogEntry[] = [];
    const logger = createLogger("sqlinsert:logger-test", {
      level: "warn",
      sink: (entry) => entries.push(entry),
    });

    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown");
    logger.error("shown too");

    expect(entries.map((e) => e.level)).to.deep.equal(["warn", "error"]);
  });

  it("should serialize errors to name and message", () => {
    const { logger, entries } = createCapturingLogger();
    logger.error("Failed to prepare insert", {
      error: new TypeError("bad sql"),
    });

    expect(entries[0]?.error).to.deep.equal({
      name: "TypeError",
      message: "bad sql",
    });
  });

  it("should not let meta override the entry header", () => {
    const { logger, entries } = createCapturingLogger("sqlinsert:logger-test");
    logger.info("real message", { message: "fake", level: "error" });

    expect(entries[0]?.message).to.equal("real message");
    expect(entries[0]?.level).to.equal("info");
  });

  it("should read LOG_LEVEL when writing rather than when created", () => {
    const entries: LogEntry[] = [];
    const logger = createLogger("sqlinsert:logger-test", {
      sink: (entry) => entries.push(entry),
    });
    const previousLevel = process.env.LOG_LEVEL;

    try {
      process.env.LOG_LEVEL = "silent";
      logger.error("dropped");
      process.env.LOG_LEVEL = "debug";
      logger.debug("kept");
    } finally {
      if (previousLevel === undefined) {
        delete process.env.LOG_LEVEL;
      } else {
        process.env.LOG_LEVEL = previousLevel;
      }
    }

    expect(entries.map((e) => e.message)).to.deep.equal(["kept"]);
  });

  it("should drop everything at the silent threshold", () => {
    const entries: LogEntry[] = [];
    const logger = createLogger("sqlinsert:logger-test", {
      level: "silent",
      sink: (entry) => entries.push(entry),
    });

    logger.error("dropped");

    expect(entries).to.deep.equal([]);
  });

  it("should recognize log levels and thresholds", () => {
    expect(isLogLevel("debug")).to.equal(true);
    expect(isLogLevel("error")).to.equal(true);
    expect(isLogLevel("silent")).to.equal(false);
    expect(isLogLevel("verbose")).to.equal(false);
    expect(isLogLevel("toString")).to.equal(false);
    expect(isLogLevel(3)).to.equal(false);
    expect(isLogThreshold("silent")).to.equal(true);
    expect(isLogThreshold("info")).to.equal(true);
  });
});
