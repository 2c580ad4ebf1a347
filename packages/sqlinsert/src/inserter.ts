/**
 * A request bound to one resolved config
 */

import type { Result } from "@sqlinsert/core";
import { resolveConfig } from "./config.js";
import type { InsertConfig, InsertConfigInput } from "./config.js";
import { insert, insertWithContext } from "./executor.js";
import type { ExecResult, Executor } from "./executor.js";
import {
  firstFields,
  render,
  renderColumns,
  renderParams,
} from "./insert.js";
import type { Insert } from "./insert.js";
import { tokenize } from "./token.js";
import type { TokenKind } from "./token.js";

export interface Inserter {
  readonly config: InsertConfig;
  tokenize(kind: TokenKind): string;
  columns(): string;
  params(): string;
  sql(): string;
  args(): unknown[];
  insert(executor: Executor): Promise<Result<ExecResult, unknown>>;
  insertWithContext(
    executor: Executor,
    signal: AbortSignal,
  ): Promise<Result<ExecResult, unknown>>;
}

/**
 * Bind a request to a config resolved now, so later changes to the
 * process-wide default do not affect it.
 *
 * @example
 * ```typescript
 * const ins = createInserter(
 *   { table: "candy", data: candyShape.record(row) },
 *   { tokenKind: "ordinal-number" },
 * );
 * ins.sql(); // INSERT INTO candy (id, candy_name) VALUES ($1, $2)
 * ```
 */
export function createInserter(
  request: Insert,
  config?: InsertConfigInput,
): Inserter {
  const resolved = resolveConfig(config);
  return {
    config: resolved,
    tokenize: (kind) =>
      tokenize(firstFields(request, resolved), kind, resolved.format),
    columns: () => renderColumns(request, resolved),
    params: () => renderParams(request, resolved, resolved.tokenKind),
    sql: () => render(request, resolved).sql,
    args: () => render(request, resolved).args,
    insert: (executor) => insert(request, executor, resolved),
    insertWithContext: (executor, signal) =>
      insertWithContext(request, executor, signal, resolved),
  };
}
