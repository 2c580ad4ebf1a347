import Database from "better-sqlite3";
import type { Database as SqliteDatabase } from "better-sqlite3";
import type { Logger } from "@sqlinsert/logger";
import { testLogger } from "./test-logger.js";

export interface TestDatabaseConfig {
  dbPath?: string; // Defaults to an in-memory database
  logger?: Logger;
}

export type CandyRow = {
  id: string;
  candy_name: string;
  form_factor: string;
  description: string;
  manufacturer: string;
  weight_grams: number;
  ts: string;
};

const CANDY_TABLE = `
  CREATE TABLE candy (
    id TEXT PRIMARY KEY,
    candy_name TEXT NOT NULL,
    form_factor TEXT NOT NULL,
    description TEXT NOT NULL,
    manufacturer TEXT NOT NULL,
    weight_grams REAL NOT NULL,
    ts TEXT NOT NULL
  )
`;

export class TestDatabase {
  private db: SqliteDatabase | null = null;
  private logger: Logger;
  private dbPath: string;

  constructor(config: TestDatabaseConfig = {}) {
    this.dbPath = config.dbPath ?? ":memory:";
    this.logger = config.logger ?? testLogger;
  }

  public setup(): void {
    this.logger.info("Setting up test database", { dbPath: this.dbPath });
    this.db = new Database(this.dbPath);
    this.db.exec(CANDY_TABLE);
  }

  public cleanup(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  public getDb(): SqliteDatabase {
    if (!this.db) throw new Error("Database not initialized");
    return this.db;
  }

  public candies(): CandyRow[] {
    return this.getDb()
      .prepare<[], CandyRow>("SELECT * FROM candy ORDER BY id")
      .all();
  }
}
