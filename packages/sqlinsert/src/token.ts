/**
 * Token rendering for INSERT column lists and VALUES placeholders
 */

import type { Field } from "./fields.js";

/**
 * How a field is rendered in generated SQL.
 *
 * - column-name: `foo, bar` for the column list
 * - question-mark: `?, ?` (MySQL, SingleStore, SQLite)
 * - at-name: `@foo, @bar` (MySQL, SingleStore, SQL Server)
 * - ordinal-number: `$1, $2` (Postgres)
 * - colon-name: `:foo, :bar` (Oracle)
 */
export type TokenKind =
  | "column-name"
  | "question-mark"
  | "at-name"
  | "ordinal-number"
  | "colon-name";

export const TOKEN_KINDS = [
  "column-name",
  "question-mark",
  "at-name",
  "ordinal-number",
  "colon-name",
] as const satisfies readonly TokenKind[];

// Kinds usable in a VALUES clause
export const PLACEHOLDER_KINDS = [
  "question-mark",
  "at-name",
  "ordinal-number",
  "colon-name",
] as const satisfies readonly TokenKind[];

export function isTokenKind(value: unknown): value is TokenKind {
  return TOKEN_KINDS.some((kind) => kind === value);
}

/**
 * Presentation of a token list: the separator between tokens, the separator
 * between row groups and the characters wrapping a group.
 */
export type TokenFormat = {
  separator: string;
  groupSeparator: string;
  open: string;
  close: string;
};

export const DEFAULT_FORMAT: Readonly<TokenFormat> = Object.freeze({
  separator: ", ",
  groupSeparator: ", ",
  open: "(",
  close: ")",
});

function renderToken(field: Field, kind: TokenKind): string {
  switch (kind) {
    case "column-name":
      return field.name;
    case "question-mark":
      return "?";
    case "at-name":
      return `@${field.name}`;
    case "ordinal-number":
      return `$${field.ordinal}`;
    case "colon-name":
      return `:${field.name}`;
  }
}

/**
 * Render fields as tokens of the given kind, joined by the format separator.
 * Ordinal tokens use each field's position within its record, starting at 1.
 * No fields renders the empty string.
 */
export function tokenize(
  fields: readonly Field[],
  kind: TokenKind,
  format: Pick<TokenFormat, "separator"> = DEFAULT_FORMAT,
): string {
  return fields
    .map((field) => renderToken(field, kind))
    .join(format.separator);
}

/**
 * Wrap a rendered token list, e.g. `id, name` becomes `(id, name)`
 */
export function group(
  tokens: string,
  format: Pick<TokenFormat, "open" | "close"> = DEFAULT_FORMAT,
): string {
  return `${format.open}${tokens}${format.close}`;
}
