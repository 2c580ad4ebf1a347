/**
 * Inserts against an in-memory SQLite database through better-sqlite3
 */

import { describe, it, beforeEach, afterEach } from "mocha";
import { expect } from "chai";
import {
  insert,
  insertInBatches,
  insertWithContext,
  sqliteExecutor,
} from "sqlinsert";
import {
  TestDatabase,
  candyBatch,
  candyShape,
  nougat,
  testLogger,
} from "@sqlinsert/test-utils";

describe("sqliteExecutor", () => {
  const testDb = new TestDatabase({ logger: testLogger });

  beforeEach(() => {
    testDb.setup();
  });

  afterEach(() => {
    testDb.cleanup();
  });

  it("should insert a single record", async () => {
    const result = await insert(
      { table: "candy", data: candyShape.record(nougat) },
      sqliteExecutor(testDb.getDb()),
    );

    expect(result.success).to.equal(true);
    if (result.success) {
      expect(result.data.rowsAffected).to.equal(1);
    }
    expect(testDb.candies()).to.deep.equal([
      {
        id: "c0600afd-0001",
        candy_name: "Nougat",
        form_factor: "Bar",
        description: "chewy and sweet",
        manufacturer: "Test Confections",
        weight_grams: 1.5,
        ts: "2024-01-01T00:00:00.000Z",
      },
    ]);
  });

  it("should insert a batch in one statement", async () => {
    const result = await insert(
      {
        table: "candy",
        data: candyBatch(5).map((row) => candyShape.record(row)),
      },
      sqliteExecutor(testDb.getDb()),
    );

    expect(result.success).to.equal(true);
    if (result.success) {
      expect(result.data.rowsAffected).to.equal(5);
    }
    const rows = testDb.candies();
    expect(rows.map((row) => row.id)).to.deep.equal(["a", "b", "c", "d", "e"]);
    expect(rows.map((row) => row.weight_grams)).to.deep.equal([1, 2, 3, 4, 5]);
  });

  it("should insert in chunks", async () => {
    const result = await insertInBatches(
      {
        table: "candy",
        data: candyBatch(5).map((row) => candyShape.record(row)),
      },
      sqliteExecutor(testDb.getDb()),
      { batchSize: 2 },
    );

    expect(result.success && result.data).to.deep.equal({
      rowsAffected: 5,
      batches: 3,
    });
    expect(testDb.candies()).to.have.length(5);
  });

  it("should return the driver error for an unknown table", async () => {
    const result = await insert(
      { table: "gum", data: candyShape.record(nougat) },
      sqliteExecutor(testDb.getDb()),
    );

    expect(result.success).to.equal(false);
    if (!result.success) {
      expect(result.error).to.be.instanceOf(Error);
      expect(String(result.error)).to.match(/no such table: gum/);
    }
  });

  it("should return the driver error for a constraint violation", async () => {
    const executor = sqliteExecutor(testDb.getDb());
    const request = { table: "candy", data: candyShape.record(nougat) };

    expect((await insert(request, executor)).success).to.equal(true);
    const duplicate = await insert(request, executor);

    expect(duplicate.success).to.equal(false);
    if (!duplicate.success) {
      expect(String(duplicate.error)).to.match(/UNIQUE constraint failed/);
    }
    expect(testDb.candies()).to.have.length(1);
  });

  it("should not touch the database when the signal is aborted", async () => {
    const controller = new AbortController();
    controller.abort(new Error("cancelled"));

    const result = await insertWithContext(
      { table: "candy", data: candyShape.record(nougat) },
      sqliteExecutor(testDb.getDb()),
      controller.signal,
    );

    expect(result.success).to.equal(false);
    expect(testDb.candies()).to.deep.equal([]);
  });
});
