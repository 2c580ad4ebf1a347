/**
 * Testing utilities for sqlinsert
 */

export * from "./fixtures.js";
export {
  testLogger,
  createCapturingLogger,
  captureConsoleLogs,
} from "./utils/test-logger.js";
export { TestDatabase } from "./utils/test-db.js";
export type { TestDatabaseConfig, CandyRow } from "./utils/test-db.js";
export {
  RecordingExecutor,
  FailingExecutor,
} from "./utils/fake-executor.js";
export type {
  ExecutorCall,
  RecordingExecutorOptions,
} from "./utils/fake-executor.js";
