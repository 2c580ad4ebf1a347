/**
 * sqlinsert - parameterized INSERT statements from typed row data
 *
 * @example
 * ```typescript
 * import { defineShape, sql, args } from "sqlinsert";
 *
 * const candyShape = defineShape<Candy>([
 *   { key: "id", tags: { col: "id" } },
 *   { key: "weight", tags: { col: "weight_grams" } },
 * ]);
 *
 * const request = { table: "candy", data: rows.map(candyShape.record) };
 * sql(request); // INSERT INTO candy (id, weight_grams) VALUES (?, ?), (?, ?)
 * args(request); // ["a", 1.1, "b", 2.1]
 * ```
 */

export * from "./token.js";
export * from "./fields.js";
export * from "./config.js";
export { recordsOf, columns, params, sql, args, render } from "./insert.js";
export type { Insert, RenderedInsert } from "./insert.js";
export * from "./executor.js";
export * from "./inserter.js";
export { sqliteExecutor } from "./adapters/better-sqlite3.js";
