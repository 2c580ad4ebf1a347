/**
 * Shared primitives for sqlinsert packages
 */

export * from "./types/result.js";
