/**
 * SQLite Dialect Implementation
 *
 * SQLite binds `?` placeholders by position and has no isolation clause:
 * a transaction is either deferred or takes the write lock immediately.
 *
 * @module enlist-sql/drivers/sqlite
 */

import type { IsolationLevel } from "../../types";
import type { SqlDialectContract } from "../sql/sql-dialect.contract";

export class SqliteDialect implements SqlDialectContract {
  public readonly name = "sqlite" as const;

  public readonly numberedPlaceholders = false;

  public placeholder(_index: number): string {
    return "?";
  }

  public quoteIdentifier(identifier: string): string {
    return identifier
      .split(".")
      .map((part) => `"${part.replace(/"/g, '""')}"`)
      .join(".");
  }

  /**
   * `serializable` and `repeatable read` take the write lock up front
   */
  public beginStatement(isolationLevel: IsolationLevel): string {
    return isolationLevel === "serializable" || isolationLevel === "repeatable read"
      ? "BEGIN IMMEDIATE"
      : "BEGIN DEFERRED";
  }
}
