/**
 * Executor backed by a better-sqlite3 connection
 */

import type { Database } from "better-sqlite3";
import type { Executor, PreparedStatement } from "../executor.js";

/**
 * SQLite binds a flat argument list to `?` placeholders, so use the
 * question-mark token kind with this executor. Values reach the driver
 * unchanged: convert booleans and dates before building the records.
 *
 * better-sqlite3 runs synchronously; a signal is only checked before each
 * call.
 */
export function sqliteExecutor(db: Database): Executor {
  return {
    prepare(sql: string, signal?: AbortSignal): PreparedStatement {
      signal?.throwIfAborted();
      const statement = db.prepare(sql);
      return {
        exec(args, execSignal) {
          execSignal?.throwIfAborted();
          const info = statement.run(...args);
          return {
            rowsAffected: info.changes,
            lastInsertId: info.lastInsertRowid,
          };
        },
        // Statements are finalized when garbage collected
        release() {},
      };
    },
  };
}
