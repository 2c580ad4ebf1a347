/**
 * In-process executors for exercising insert without a database
 */

import type { ExecResult, Executor, PreparedStatement } from "sqlinsert";

export type ExecutorCall =
  | { kind: "prepare"; sql: string; signal?: AbortSignal }
  | { kind: "exec"; args: unknown[]; signal?: AbortSignal }
  | { kind: "release" };

export interface RecordingExecutorOptions {
  prepareError?: unknown;
  execError?: unknown;
  releaseError?: unknown;
  rowsAffected?: number;
}

/**
 * Executor that records every call made through it and its statements.
 * Configured errors are thrown from the matching call.
 */
export class RecordingExecutor implements Executor {
  public readonly calls: ExecutorCall[] = [];
  public prepared = 0;
  public released = 0;

  constructor(private readonly options: RecordingExecutorOptions = {}) {}

  public async prepare(
    sql: string,
    signal?: AbortSignal,
  ): Promise<PreparedStatement> {
    this.calls.push({ kind: "prepare", sql, signal });
    if (this.options.prepareError !== undefined) {
      throw this.options.prepareError;
    }
    this.prepared += 1;
    return {
      exec: async (args, execSignal): Promise<ExecResult> => {
        this.calls.push({ kind: "exec", args: [...args], signal: execSignal });
        if (this.options.execError !== undefined) {
          throw this.options.execError;
        }
        return { rowsAffected: this.options.rowsAffected ?? 1 };
      },
      release: async (): Promise<void> => {
        this.calls.push({ kind: "release" });
        this.released += 1;
        if (this.options.releaseError !== undefined) {
          throw this.options.releaseError;
        }
      },
    };
  }

  public kinds(): ExecutorCall["kind"][] {
    return this.calls.map((call) => call.kind);
  }

  public sqls(): string[] {
    return this.calls.flatMap((call) =>
      call.kind === "prepare" ? [call.sql] : [],
    );
  }
}

/**
 * Executor whose prepare always fails with a driver-level error
 */
export class FailingExecutor extends RecordingExecutor {
  constructor(
    public readonly error: Error = new Error(
      "driver-level failure, cannot execute query",
    ),
  ) {
    super({ prepareError: error });
  }
}
