import { describe, expect, it } from "vitest";
import { PostgresDialect } from "../../../../src/drivers/postgres/postgres-dialect";
import { parseSqliteConnectionString } from "../../../../src/drivers/sqlite/sqlite-client";
import { SqliteDialect } from "../../../../src/drivers/sqlite/sqlite-dialect";
import { InvalidStateError } from "../../../../src/errors/invalid-state.error";

describe("parseSqliteConnectionString", () => {
  it("should read the data source, mode and timeout", () => {
    expect(
      parseSqliteConnectionString("Data Source=rates.db;Mode=ReadOnly;Default Timeout=5"),
    ).toEqual({ filename: "rates.db", readonly: true, timeout: 5000 });
  });

  it("should accept Filename as the data source", () => {
    expect(parseSqliteConnectionString("Filename=rates.db").filename).toBe("rates.db");
  });

  it("should treat a bare string as the file name", () => {
    expect(parseSqliteConnectionString(":memory:")).toEqual({
      filename: ":memory:",
      readonly: false,
    });
  });

  it("should throw when no data source is named", () => {
    expect(() => parseSqliteConnectionString("Cache=Shared")).toThrow(InvalidStateError);
  });

  it("should throw when the timeout is not a number of seconds", () => {
    expect(() =>
      parseSqliteConnectionString("Data Source=rates.db;Default Timeout=soon"),
    ).toThrow(InvalidStateError);
    expect(() => parseSqliteConnectionString("Data Source=rates.db;Default Timeout=-1")).toThrow(
      InvalidStateError,
    );
  });
});

describe("SqliteDialect", () => {
  const dialect = new SqliteDialect();

  it("should use positional placeholders", () => {
    expect(dialect.placeholder(3)).toBe("?");
    expect(dialect.numberedPlaceholders).toBe(false);
  });

  it("should quote qualified identifiers", () => {
    expect(dialect.quoteIdentifier('main.my"table')).toBe('"main"."my""table"');
  });

  it("should take the write lock up front for strict isolation levels", () => {
    expect(dialect.beginStatement("serializable")).toBe("BEGIN IMMEDIATE");
    expect(dialect.beginStatement("repeatable read")).toBe("BEGIN IMMEDIATE");
    expect(dialect.beginStatement("read committed")).toBe("BEGIN DEFERRED");
  });
});

describe("PostgresDialect", () => {
  const dialect = new PostgresDialect();

  it("should use numbered placeholders", () => {
    expect(dialect.placeholder(2)).toBe("$2");
    expect(dialect.numberedPlaceholders).toBe(true);
  });

  it("should quote identifiers", () => {
    expect(dialect.quoteIdentifier("public.user")).toBe('"public"."user"');
  });

  it("should begin with the isolation level", () => {
    expect(dialect.beginStatement("repeatable read")).toBe("BEGIN ISOLATION LEVEL REPEATABLE READ");
  });
});
