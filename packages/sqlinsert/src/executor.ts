/**
 * Executing INSERT statements through a prepare/exec collaborator
 */

import { z } from "zod";
import { attempt, failure, success } from "@sqlinsert/core";
import type { Result } from "@sqlinsert/core";
import { createLogger } from "@sqlinsert/logger";
import { resolveConfig } from "./config.js";
import type { InsertConfig, InsertConfigInput } from "./config.js";
import { recordsOf, render } from "./insert.js";
import type { Insert } from "./insert.js";

const logger = createLogger("sqlinsert:executor");

export type ExecResult = {
  rowsAffected: number;
  lastInsertId?: number | bigint;
};

/**
 * A prepared statement handle. It is owned by a single insert call and
 * released before that call returns.
 */
export interface PreparedStatement {
  exec(
    args: readonly unknown[],
    signal?: AbortSignal,
  ): ExecResult | Promise<ExecResult>;
  release(): void | Promise<void>;
}

/**
 * Anything that can prepare SQL: a connection, a pool, a transaction.
 * `signal` is passed only by insertWithContext; an executor that supports
 * cancellation enforces it.
 */
export interface Executor {
  prepare(
    sql: string,
    signal?: AbortSignal,
  ): PreparedStatement | Promise<PreparedStatement>;
}

async function run(
  request: Insert,
  executor: Executor,
  config: InsertConfig,
  signal: AbortSignal | undefined,
): Promise<Result<ExecResult, unknown>> {
  const { sql, args } = render(request, config);

  logger.debug("Preparing insert", { table: request.table, sql });
  const prepared = await attempt(() => executor.prepare(sql, signal));
  if (!prepared.success) {
    logger.error("Failed to prepare insert", {
      table: request.table,
      error: prepared.error,
    });
    return prepared;
  }

  const statement = prepared.data;
  const executed = await attempt(() => statement.exec(args, signal));
  const released = await attempt(() => statement.release());

  // Release errors never change the outcome of the insert
  if (!released.success) {
    logger.warn("Failed to release statement", {
      table: request.table,
      error: released.error,
    });
  }

  if (!executed.success) {
    logger.error("Failed to execute insert", {
      table: request.table,
      error: executed.error,
    });
    return executed;
  }

  logger.debug("Executed insert", {
    table: request.table,
    rowsAffected: executed.data.rowsAffected,
  });
  return executed;
}

/**
 * Prepare and execute an INSERT. Errors from prepare or exec are returned
 * as they were thrown, without wrapping or retrying. The prepared statement
 * is released on every path once it exists, and is never returned; a
 * failing release is logged and does not change the result.
 */
export async function insert(
  request: Insert,
  executor: Executor,
  config?: InsertConfigInput,
): Promise<Result<ExecResult, unknown>> {
  return run(request, executor, resolveConfig(config), undefined);
}

/**
 * Same as insert, forwarding `signal` to both prepare and exec. A signal
 * that is already aborted fails with its reason before prepare is called.
 */
export async function insertWithContext(
  request: Insert,
  executor: Executor,
  signal: AbortSignal,
  config?: InsertConfigInput,
): Promise<Result<ExecResult, unknown>> {
  const resolved = resolveConfig(config);
  if (signal.aborted) {
    return failure(signal.reason);
  }
  return run(request, executor, resolved, signal);
}

const batchOptionsSchema = z.object({
  batchSize: z.number().int().positive().default(500),
});

export type BatchOptions = z.input<typeof batchOptionsSchema>;

export type BatchResult = {
  rowsAffected: number;
  batches: number;
};

/**
 * Insert records in consecutive chunks of at most `batchSize` rows, one
 * statement per chunk. Stops at the first failing chunk; chunks already
 * executed are not undone, so wrap the call in a transaction when that
 * matters.
 */
export async function insertInBatches(
  request: Insert,
  executor: Executor,
  options: BatchOptions = {},
  config?: InsertConfigInput,
): Promise<Result<BatchResult, unknown>> {
  const { batchSize } = batchOptionsSchema.parse(options);
  const resolved = resolveConfig(config);
  const records = recordsOf(request);

  let rowsAffected = 0;
  let batches = 0;
  for (let start = 0; start < records.length; start += batchSize) {
    const chunk = records.slice(start, start + batchSize);
    const result = await run(
      { table: request.table, data: chunk },
      executor,
      resolved,
      undefined,
    );
    if (!result.success) {
      logger.error("Batch insert stopped", {
        table: request.table,
        batch: batches + 1,
        offset: start,
        error: result.error,
      });
      return result;
    }
    rowsAffected += result.data.rowsAffected;
    batches += 1;
  }

  logger.debug("Batch insert complete", {
    table: request.table,
    rowsAffected,
    batches,
  });
  return success({ rowsAffected, batches });
}
