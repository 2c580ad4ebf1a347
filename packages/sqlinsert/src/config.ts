/**
 * Builder configuration
 *
 * Every builder call takes an explicit InsertConfig. The process-wide default
 * below exists for callers at the edge of an application; it is resolved
 * once when a public entry point is called and never read further down.
 * Changing it while other inserts are being built is not safe for those
 * builds, so pass a config explicitly when that matters.
 */

import { z } from "zod";
import { DEFAULT_FORMAT, TOKEN_KINDS } from "./token.js";
import type { TokenFormat, TokenKind } from "./token.js";

export type InsertConfig = {
  // Annotation key holding the column name on shaped records
  readonly tagKey: string;
  // Placeholder style for the VALUES clause
  readonly tokenKind: TokenKind;
  readonly format: Readonly<TokenFormat>;
};

export type InsertConfigInput = {
  tagKey?: string;
  tokenKind?: TokenKind;
  format?: Partial<TokenFormat>;
};

const formatSchema = z.object({
  separator: z.string(),
  groupSeparator: z.string(),
  open: z.string(),
  close: z.string(),
});

const configSchema = z.object({
  tagKey: z.string().min(1),
  tokenKind: z.enum(TOKEN_KINDS),
  format: formatSchema,
});

export const DEFAULT_CONFIG: InsertConfig = Object.freeze({
  tagKey: "col",
  tokenKind: "question-mark",
  format: DEFAULT_FORMAT,
});

let defaultConfig: InsertConfig = DEFAULT_CONFIG;

function merge(base: InsertConfig, input: InsertConfigInput): InsertConfig {
  const parsed = configSchema.parse({
    tagKey: input.tagKey ?? base.tagKey,
    tokenKind: input.tokenKind ?? base.tokenKind,
    format: { ...base.format, ...input.format },
  });
  return Object.freeze({ ...parsed, format: Object.freeze(parsed.format) });
}

/**
 * Merge overrides over the current process-wide default.
 * @throws ZodError when a value is invalid
 */
export function resolveConfig(input?: InsertConfigInput): InsertConfig {
  if (!input) {
    return defaultConfig;
  }
  return merge(defaultConfig, input);
}

export function getDefaultConfig(): InsertConfig {
  return defaultConfig;
}

/**
 * Replace the process-wide default. Intended to be called once at startup.
 */
export function setDefaultConfig(input: InsertConfigInput): InsertConfig {
  defaultConfig = merge(DEFAULT_CONFIG, input);
  return defaultConfig;
}

export function resetDefaultConfig(): void {
  defaultConfig = DEFAULT_CONFIG;
}

type Env = Record<string, string | undefined>;

function optional(env: Env, name: string, defaultValue: string): string {
  const value = env[name];
  return value !== undefined && value !== "" ? value : defaultValue;
}

/**
 * Read a config from environment variables:
 * SQLINSERT_TAG_KEY, SQLINSERT_TOKEN_KIND and SQLINSERT_SEPARATOR.
 */
export function loadConfig(env: Env = process.env): InsertConfig {
  const tokenKind = z
    .enum(TOKEN_KINDS)
    .parse(optional(env, "SQLINSERT_TOKEN_KIND", DEFAULT_CONFIG.tokenKind));
  return merge(DEFAULT_CONFIG, {
    tagKey: optional(env, "SQLINSERT_TAG_KEY", DEFAULT_CONFIG.tagKey),
    tokenKind,
    format: {
      separator: optional(
        env,
        "SQLINSERT_SEPARATOR",
        DEFAULT_CONFIG.format.separator,
      ),
    },
  });
}
