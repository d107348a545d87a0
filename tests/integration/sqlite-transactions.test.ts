import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it } from "vitest";
import { TableBatch } from "../../src/batch/table-batch";
import { ResultShapes } from "../../src/command/result-shapes";
import { SqlCommand } from "../../src/command/sql-command";
import { resetTransactionConfigurations, setTransactionConfigurations } from "../../src/config";
import { Connection } from "../../src/connection/connection";
import { SqliteClient } from "../../src/drivers/sqlite/sqlite-client";
import { transactionScope, withTransaction } from "../../src/transaction/transaction-scope";

type RateRow = {
  code: string;
  rate: number;
};

describe("SQLite transactions", () => {
  let directory: string;
  let databaseCount = 0;

  const countRates = new SqlCommand({
    statement: "SELECT COUNT(*) AS total FROM rates",
    shape: ResultShapes.scalar(Number),
  });

  const insertRate = new SqlCommand<RateRow, number>({
    statement: "INSERT INTO rates (code, rate) VALUES (@code, @rate)",
    shape: ResultShapes.rowsAffected(),
  });

  beforeAll(async () => {
    directory = await mkdtemp(path.join(tmpdir(), "enlist-sql-"));
  });

  afterAll(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  beforeEach(() => {
    databaseCount++;

    setTransactionConfigurations({
      client: new SqliteClient(),
      connectionString: `Data Source=${path.join(directory, `rates-${databaseCount}.db`)}`,
    });

    new SqlCommand({
      statement: "CREATE TABLE rates (code TEXT PRIMARY KEY, rate REAL NOT NULL)",
      shape: ResultShapes.rowsAffected(),
    }).execute({});
  });

  afterEach(() => {
    resetTransactionConfigurations();
  });

  it("should persist a completed scope", async () => {
    const batch = new TableBatch<RateRow>({ table: "rates", keyColumns: ["code"] });

    batch.addRow({ code: "GBP", rate: 0.63 });

    const rowsAffected = await transactionScope((scope) => {
      const count = batch.applySync();
      scope.complete();

      return count;
    });

    expect(rowsAffected).toBe(1);
    expect(countRates.execute({})).toEqual({ kind: "some", value: 1 });
  });

  it("should discard a scope that was not completed", async () => {
    const batch = new TableBatch<RateRow>({ table: "rates", keyColumns: ["code"] });

    batch.addRow({ code: "GBP", rate: 0.63 });

    await transactionScope(() => {
      batch.applySync();
      insertRate.execute({ code: "EUR", rate: 0.91 });
    });

    expect(countRates.execute({})).toEqual({ kind: "some", value: 0 });
  });

  it("should read its own writes inside the scope", async () => {
    const counts = await transactionScope((scope) => {
      insertRate.execute({ code: "GBP", rate: 0.63 });
      insertRate.execute({ code: "EUR", rate: 0.91 });

      const count = countRates.execute({});
      scope.complete();

      return count;
    });

    expect(counts).toEqual({ kind: "some", value: 2 });
  });

  it("should discard an explicit transaction that rolls back", async () => {
    const connection = new Connection();

    await connection.open();

    await withTransaction(connection, async (transaction) => {
      const insert = new SqlCommand<RateRow, number>({
        statement: insertRate.statement,
        shape: ResultShapes.rowsAffected(),
        transaction,
      });

      await insert.executeAsync({ code: "GBP", rate: 0.63 });
    });

    await connection.close();

    expect(countRates.execute({})).toEqual({ kind: "some", value: 0 });
  });

  it("should reconcile updates and deletes", async () => {
    const batch = new TableBatch<RateRow>({ table: "rates", keyColumns: ["code"] });

    batch.addRow({ code: "GBP", rate: 0.63 }).addRow({ code: "EUR", rate: 0.9 });
    await batch.apply();

    batch.updateRow({ code: "EUR" }, { rate: 0.91 }).deleteRow({ code: "GBP" });

    await expect(batch.apply()).resolves.toBe(2);

    const findRate = new SqlCommand({
      statement: "SELECT code, rate FROM rates",
      shape: ResultShapes.singleRecord(),
    });

    expect(findRate.execute({})).toEqual({ kind: "some", value: { code: "EUR", rate: 0.91 } });
  });
});
