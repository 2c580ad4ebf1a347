/**
 * INSERT statement building
 *
 * Column names and placeholders come from the first record of a request;
 * values come from every record in row-major order. Identifiers are written
 * as given, without quoting or escaping, so table and column names must
 * already be safe.
 */

import { resolveConfig } from "./config.js";
import type { InsertConfig, InsertConfigInput } from "./config.js";
import type { Field, InsertRecord } from "./fields.js";
import { group, tokenize } from "./token.js";
import type { TokenKind } from "./token.js";

export type Insert<R extends InsertRecord = InsertRecord> = {
  readonly table: string;
  readonly data: R | readonly R[];
};

function isRecordList<R extends InsertRecord>(
  data: R | readonly R[],
): data is readonly R[] {
  return Array.isArray(data);
}

/**
 * Normalize request data to a non-empty list of records
 */
export function recordsOf<R extends InsertRecord>(
  request: Insert<R>,
): readonly [R, ...R[]] {
  const { data } = request;
  const records: readonly R[] = isRecordList(data) ? data : [data];
  const [first, ...rest] = records;
  if (first === undefined) {
    throw new Error(
      `insert into ${request.table} requires at least one record`,
    );
  }
  return [first, ...rest];
}

export function firstFields(
  request: Insert,
  config: InsertConfig,
): readonly Field[] {
  const [first] = recordsOf(request);
  return first.fields(config.tagKey);
}

export function renderColumns(
  request: Insert,
  config: InsertConfig,
): string {
  return group(
    tokenize(firstFields(request, config), "column-name", config.format),
    config.format,
  );
}

/**
 * One placeholder group is rendered from the first record and repeated for
 * every record. Ordinal placeholders therefore restart at $1 in each group:
 * `($1, $2), ($1, $2)`. Drivers that need numbering to continue across the
 * whole statement will not bind a multi-row ordinal insert correctly.
 */
export function renderParams(
  request: Insert,
  config: InsertConfig,
  kind: TokenKind,
): string {
  const records = recordsOf(request);
  const row = group(
    tokenize(firstFields(request, config), kind, config.format),
    config.format,
  );
  return records.map(() => row).join(config.format.groupSeparator);
}

function renderSql(request: Insert, config: InsertConfig): string {
  return `INSERT INTO ${request.table} ${renderColumns(request, config)} VALUES ${renderParams(request, config, config.tokenKind)}`;
}

function collectArgs(request: Insert, config: InsertConfig): unknown[] {
  return recordsOf(request).flatMap((record) =>
    record.fields(config.tagKey).map((field) => field.value),
  );
}

/**
 * Column list, e.g. `(id, candy_name, weight_grams)`
 */
export function columns(request: Insert, config?: InsertConfigInput): string {
  return renderColumns(request, resolveConfig(config));
}

/**
 * VALUES placeholder groups, one per record, e.g. `(?, ?), (?, ?)`
 */
export function params(request: Insert, config?: InsertConfigInput): string {
  const resolved = resolveConfig(config);
  return renderParams(request, resolved, resolved.tokenKind);
}

/**
 * Full statement: `INSERT INTO <table> <columns> VALUES <params>`
 */
export function sql(request: Insert, config?: InsertConfigInput): string {
  return renderSql(request, resolveConfig(config));
}

/**
 * Values of every record, record by record and field by field, in the order
 * the placeholders of `sql` expect them.
 */
export function args(request: Insert, config?: InsertConfigInput): unknown[] {
  return collectArgs(request, resolveConfig(config));
}

/**
 * Pieces of one request rendered against a single resolved config
 */
export type RenderedInsert = {
  readonly sql: string;
  readonly args: unknown[];
};

export function render(
  request: Insert,
  config: InsertConfig,
): RenderedInsert {
  return {
    sql: renderSql(request, config),
    args: collectArgs(request, config),
  };
}
