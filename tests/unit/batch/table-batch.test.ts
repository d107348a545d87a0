import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { TableBatch } from "../../../src/batch/table-batch";
import { resetTransactionConfigurations, setTransactionConfigurations } from "../../../src/config";
import { Connection } from "../../../src/connection/connection";
import { BatchApplyError } from "../../../src/errors/batch-apply.error";
import { InvalidStateError } from "../../../src/errors/invalid-state.error";
import { TransactionContextLostError } from "../../../src/errors/transaction-context-lost.error";
import { transactionScope } from "../../../src/transaction/transaction-scope";
import { MemoryClient } from "../../helpers/memory-client";

type RateRow = {
  code: string;
  rate: number;
};

const INSERT_GBP = 'INSERT INTO "rates" ("code", "rate") VALUES (?, ?)';
const UPDATE_RATE = 'UPDATE "rates" SET "rate" = ? WHERE "code" = ?';
const DELETE_RATE = 'DELETE FROM "rates" WHERE "code" = ?';

describe("TableBatch", () => {
  let client: MemoryClient;
  let batch: TableBatch<RateRow>;

  beforeEach(() => {
    client = new MemoryClient();
    setTransactionConfigurations({ client, connectionString: "Data Source=test.db" });

    batch = new TableBatch<RateRow>({ table: "rates", keyColumns: ["code"] });
  });

  afterEach(() => {
    resetTransactionConfigurations();
  });

  const recordChanges = () =>
    batch
      .addRow({ code: "GBP", rate: 0.63 })
      .updateRow({ code: "EUR" }, { rate: 0.91 })
      .deleteRow({ code: "USD" });

  it("should need a key column", () => {
    expect(() => new TableBatch<RateRow>({ table: "rates", keyColumns: [] })).toThrow(
      InvalidStateError,
    );
  });

  it("should record mutations in order", () => {
    recordChanges();

    expect(batch.hasChanges).toBe(true);
    expect(batch.pending).toEqual([
      { kind: "insert", row: { code: "GBP", rate: 0.63 } },
      { kind: "update", key: { code: "EUR" }, changes: { rate: 0.91 } },
      { kind: "delete", key: { code: "USD" } },
    ]);

    batch.clear();

    expect(batch.hasChanges).toBe(false);
  });

  it("should refuse a key without its key columns", () => {
    expect(() => batch.deleteRow({ rate: 1 })).toThrow(InvalidStateError);
  });

  it("should refuse an update without changes", () => {
    expect(() => batch.updateRow({ code: "EUR" }, {})).toThrow(InvalidStateError);
  });

  describe("apply()", () => {
    it("should do nothing without changes", async () => {
      await expect(batch.apply()).resolves.toBe(0);
      expect(client.connections).toHaveLength(0);
    });

    it("should apply every mutation in its own transaction", async () => {
      const connection = new Connection();

      await connection.open();

      recordChanges();

      await expect(batch.apply(connection)).resolves.toBe(3);

      expect(batch.hasChanges).toBe(false);
      expect(client.log).toEqual([
        "memory-1 OPEN",
        "memory-1 BEGIN read committed",
        "memory-1 COMMIT",
      ]);
      expect(client.committed).toEqual([
        { sql: INSERT_GBP, values: ["GBP", 0.63] },
        { sql: UPDATE_RATE, values: [0.91, "EUR"] },
        { sql: DELETE_RATE, values: ["USD"] },
      ]);
      expect(connection.transaction).toBeUndefined();

      await connection.close();
    });

    it("should open and close its own connection", async () => {
      recordChanges();

      await batch.apply();

      expect(client.log).toEqual([
        "memory-1 OPEN",
        "memory-1 BEGIN read committed",
        "memory-1 COMMIT",
        "memory-1 CLOSE",
      ]);
    });

    it("should keep every mutation when one fails", async () => {
      client.failOn(UPDATE_RATE, new Error("deadlock detected"));
      recordChanges();

      const failure = await batch.apply().then(
        () => undefined,
        (error: unknown) => error,
      );

      expect(failure).toBeInstanceOf(BatchApplyError);
      expect(failure).toMatchObject({ table: "rates", pendingCount: 3, rowsAffected: 0 });
      expect(batch.pending).toHaveLength(3);
      expect(client.committed).toEqual([]);
      expect(client.log).toEqual([
        "memory-1 OPEN",
        "memory-1 BEGIN read committed",
        "memory-1 ROLLBACK",
        "memory-1 CLOSE",
      ]);
    });

    it("should join an explicit transaction", async () => {
      const connection = new Connection();

      await connection.open();

      const transaction = await connection.beginTransaction();

      recordChanges();

      await batch.apply(connection, transaction);

      expect(client.committed).toEqual([]);

      await transaction.commit();

      expect(client.committed).toHaveLength(3);
      expect(client.log).toEqual([
        "memory-1 OPEN",
        "memory-1 BEGIN read committed",
        "memory-1 COMMIT",
      ]);
    });

    it("should refuse asynchronous apply in a scope that does not flow", async () => {
      recordChanges();

      await transactionScope(async () => {
        await expect(batch.apply()).rejects.toThrow(TransactionContextLostError);
      });

      expect(batch.pending).toHaveLength(3);
    });

    it("should join a flowing ambient transaction", async () => {
      recordChanges();

      await transactionScope(
        async (scope) => {
          await batch.apply();
          scope.complete();
        },
        { asyncFlow: true },
      );

      expect(client.log).toEqual([
        "memory-1 OPEN",
        "memory-1 BEGIN serializable",
        "memory-1 COMMIT",
        "memory-1 CLOSE",
      ]);
    });
  });

  describe("applySync()", () => {
    it("should join the ambient transaction", async () => {
      recordChanges();

      const rowsAffected = await transactionScope((scope) => {
        const count = batch.applySync();
        scope.complete();

        return count;
      });

      expect(rowsAffected).toBe(3);
      expect(client.log).toEqual([
        "memory-1 OPEN",
        "memory-1 BEGIN serializable",
        "memory-1 COMMIT",
        "memory-1 CLOSE",
      ]);
      expect(client.committedSql).toEqual([INSERT_GBP, UPDATE_RATE, DELETE_RATE]);
    });

    it("should roll back its own transaction when a mutation fails", () => {
      client.failOn(DELETE_RATE, new Error("locked"));
      recordChanges();

      expect(() => batch.applySync()).toThrow(BatchApplyError);
      expect(batch.pending).toHaveLength(3);
      expect(client.log).toEqual([
        "memory-1 OPEN",
        "memory-1 BEGIN read committed",
        "memory-1 ROLLBACK",
        "memory-1 CLOSE",
      ]);
    });
  });

  describe("bulkLoad()", () => {
    it("should insert the rows in chunks", async () => {
      client.respond('INSERT INTO "rates" ("code", "rate") VALUES (?, ?), (?, ?)', {
        rows: [],
        rowCount: 2,
        columns: [],
      });

      batch
        .addRow({ code: "GBP", rate: 0.63 })
        .addRow({ code: "EUR", rate: 0.91 })
        .addRow({ code: "USD", rate: 1 });

      await expect(batch.bulkLoad(undefined, undefined, { chunkSize: 2 })).resolves.toBe(3);

      expect(client.committed).toEqual([
        {
          sql: 'INSERT INTO "rates" ("code", "rate") VALUES (?, ?), (?, ?)',
          values: ["GBP", 0.63, "EUR", 0.91],
        },
        { sql: INSERT_GBP, values: ["USD", 1] },
      ]);
      expect(batch.hasChanges).toBe(false);
    });

    it("should refuse pending updates", async () => {
      recordChanges();

      await expect(batch.bulkLoad()).rejects.toThrow(InvalidStateError);
      expect(client.connections).toHaveLength(0);
    });

    it("should refuse a chunk size below one", async () => {
      batch.addRow({ code: "GBP", rate: 0.63 });

      await expect(batch.bulkLoad(undefined, undefined, { chunkSize: 0 })).rejects.toThrow(
        InvalidStateError,
      );
    });

    it("should refuse a chunk size that is not a whole number", async () => {
      batch.addRow({ code: "GBP", rate: 0.63 });

      await expect(batch.bulkLoad(undefined, undefined, { chunkSize: Number.NaN })).rejects.toThrow(
        InvalidStateError,
      );
      await expect(batch.bulkLoad(undefined, undefined, { chunkSize: 1.5 })).rejects.toThrow(
        InvalidStateError,
      );
      expect(client.connections).toHaveLength(0);
      expect(batch.pending).toHaveLength(1);
    });
  });
});
