/**
 * SQL Dialect Contract
 *
 * Defines the interface for database-specific SQL syntax variations.
 * Each client ships a dialect so the statement compiler and the batch
 * reconciler can produce statements the store understands.
 *
 * @module enlist-sql/drivers/sql
 */

import type { IsolationLevel } from "../../types";

/**
 * Contract that SQL dialects must implement to handle database-specific
 * SQL syntax variations.
 *
 * @example
 * ```typescript
 * class PostgresDialect implements SqlDialectContract {
 *   placeholder(index: number): string {
 *     return `$${index}`;  // PostgreSQL uses $1, $2, etc.
 *   }
 * }
 *
 * class SqliteDialect implements SqlDialectContract {
 *   placeholder(index: number): string {
 *     return '?';  // SQLite uses ? for all parameters
 *   }
 * }
 * ```
 */
export interface SqlDialectContract {
  /**
   * The name of the dialect for identification purposes.
   *
   * @example "postgres", "sqlite"
   */
  readonly name: string;

  /**
   * Whether placeholders carry their index, so one value can be
   * referenced from several places in the statement.
   *
   * - PostgreSQL: `true` (`$1` may appear twice)
   * - SQLite (`?`): `false`, every occurrence binds its own value
   */
  readonly numberedPlaceholders: boolean;

  /**
   * Generate a parameter placeholder for the given index.
   *
   * @param index - The 1-based parameter index
   * @returns The placeholder string to use in the SQL query
   *
   * @example
   * ```typescript
   * dialect.placeholder(1); // "$1" for PostgreSQL
   * dialect.placeholder(2); // "?" for SQLite
   * ```
   */
  placeholder(index: number): string;

  /**
   * Quote an identifier (table or column name) for safe use in SQL.
   *
   * @param identifier - The identifier to quote
   * @returns The quoted identifier
   */
  quoteIdentifier(identifier: string): string;

  /**
   * Statement that opens a transaction at the given isolation level.
   */
  beginStatement(isolationLevel: IsolationLevel): string;
}
