import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ResultShapes } from "../../../src/command/result-shapes";
import { SqlCommand } from "../../../src/command/sql-command";
import { resetTransactionConfigurations, setTransactionConfigurations } from "../../../src/config";
import { Connection } from "../../../src/connection/connection";
import { InvalidStateError } from "../../../src/errors/invalid-state.error";
import { MissingParameterError } from "../../../src/errors/missing-parameter.error";
import { UnsupportedOperationError } from "../../../src/errors/unsupported-operation.error";
import { transactionScope } from "../../../src/transaction/transaction-scope";
import { asyncOnly, MemoryClient } from "../../helpers/memory-client";

const INSERT_RATE = "INSERT INTO rates (code) VALUES (?)";

describe("SqlCommand", () => {
  let client: MemoryClient;

  beforeEach(() => {
    client = new MemoryClient();
    setTransactionConfigurations({ client, connectionString: "Data Source=test.db" });
  });

  afterEach(() => {
    resetTransactionConfigurations();
  });

  describe("execute()", () => {
    it("should open and close its own connection outside any scope", () => {
      client.respond("SELECT code, rate FROM rates WHERE code = ?", {
        rows: [{ code: "GBP", rate: 0.63 }],
        rowCount: 1,
        columns: ["code", "rate"],
      });

      const findRate = new SqlCommand({
        statement: "SELECT code, rate FROM rates WHERE code = @code",
        shape: ResultShapes.singleRecord(),
      });

      expect(findRate.execute({ code: "GBP" })).toEqual({
        kind: "some",
        value: { code: "GBP", rate: 0.63 },
      });
      expect(client.received).toEqual([
        { sql: "SELECT code, rate FROM rates WHERE code = ?", values: ["GBP"] },
      ]);
      expect(client.log).toEqual(["memory-1 OPEN", "memory-1 CLOSE"]);
    });

    it("should return rows that can only be read once", () => {
      client.respond("SELECT code FROM rates", {
        rows: [{ code: "GBP" }, { code: "EUR" }],
        rowCount: 2,
        columns: ["code"],
      });

      const listCodes = new SqlCommand({
        statement: "SELECT code FROM rates",
        shape: ResultShapes.records((row) => String(row.code)),
      });

      const codes = listCodes.execute({});

      expect(codes.toArray()).toEqual(["GBP", "EUR"]);
      expect(() => codes.toArray()).toThrow(InvalidStateError);
    });

    it("should report a missing parameter before connecting", () => {
      const command = new SqlCommand<{ code: string }, number>({
        statement: "UPDATE rates SET rate = @rate WHERE code = @code",
        shape: ResultShapes.rowsAffected(),
      });

      expect(() => command.execute({ code: "GBP" })).toThrow(new MissingParameterError("rate"));
      expect(client.connections).toHaveLength(0);
    });

    it("should enlist a caller connection opened before the scope", async () => {
      const connection = new Connection();

      connection.openSync();

      const command = new SqlCommand<{ code: string }, number>({
        statement: "INSERT INTO rates (code) VALUES (@code)",
        shape: ResultShapes.rowsAffected(),
        connection,
      });

      await transactionScope((scope) => {
        command.execute({ code: "GBP" });
        scope.complete();
      });

      connection.closeSync();

      expect(client.log).toEqual([
        "memory-1 OPEN",
        "memory-1 BEGIN serializable",
        "memory-1 COMMIT",
        "memory-1 CLOSE",
      ]);
      expect(client.committedSql).toEqual([INSERT_RATE]);
    });

    it("should bypass the scope for a connection that does not enlist", async () => {
      const connection = new Connection({ connectionString: "Data Source=test.db;Enlist=false" });

      connection.openSync();

      const command = new SqlCommand<{ code: string }, number>({
        statement: "INSERT INTO rates (code) VALUES (@code)",
        shape: ResultShapes.rowsAffected(),
        connection,
      });

      await transactionScope(() => {
        command.execute({ code: "GBP" });
      });

      expect(client.log).toEqual(["memory-1 OPEN"]);
      expect(client.committedSql).toEqual([INSERT_RATE]);

      connection.closeSync();
    });

    it("should refuse to run synchronously on an asynchronous client", () => {
      const command = new SqlCommand<{ code: string }, number>({
        statement: "INSERT INTO rates (code) VALUES (@code)",
        shape: ResultShapes.rowsAffected(),
        client: asyncOnly(client),
      });

      expect(() => command.execute({ code: "GBP" })).toThrow(UnsupportedOperationError);
      expect(client.connections).toHaveLength(0);
    });
  });

  describe("executeAsync()", () => {
    it("should run on an asynchronous client", async () => {
      const command = new SqlCommand<{ code: string }, number>({
        statement: "INSERT INTO rates (code) VALUES (@code)",
        shape: ResultShapes.rowsAffected(),
        client: asyncOnly(client),
      });

      await expect(command.executeAsync({ code: "GBP" })).resolves.toBe(1);
      expect(client.log).toEqual(["memory-1 OPEN", "memory-1 CLOSE"]);
      expect(client.committedSql).toEqual([INSERT_RATE]);
    });

    it("should read a scalar", async () => {
      client.respond("SELECT COUNT(*) AS total FROM rates", {
        rows: [{ total: "2" }],
        rowCount: 1,
        columns: ["total"],
      });

      const countRates = new SqlCommand({
        statement: "SELECT COUNT(*) AS total FROM rates",
        shape: ResultShapes.scalar(Number),
      });

      await expect(countRates.executeAsync({})).resolves.toEqual({ kind: "some", value: 2 });
    });
  });
});
