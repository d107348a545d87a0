/**
 * PostgreSQL Dialect Implementation
 *
 * Implements the SqlDialectContract for PostgreSQL-specific SQL syntax.
 * Handles parameter placeholders ($1, $2), identifier quoting and the
 * isolation clause of `BEGIN`.
 *
 * @module enlist-sql/drivers/postgres
 */

import type { IsolationLevel } from "../../types";
import type { SqlDialectContract } from "../sql/sql-dialect.contract";

/**
 * PostgreSQL-specific SQL dialect implementation.
 *
 * @example
 * ```typescript
 * const dialect = new PostgresDialect();
 *
 * dialect.placeholder(1); // "$1"
 * dialect.quoteIdentifier('user'); // '"user"'
 * dialect.beginStatement("serializable"); // "BEGIN ISOLATION LEVEL SERIALIZABLE"
 * ```
 */
export class PostgresDialect implements SqlDialectContract {
  /**
   * Dialect name identifier.
   */
  public readonly name = "postgres" as const;

  /**
   * `$1` may be referenced more than once.
   */
  public readonly numberedPlaceholders = true;

  /**
   * Generate a PostgreSQL parameter placeholder.
   *
   * PostgreSQL uses numbered placeholders: $1, $2, $3, etc.
   *
   * @param index - The 1-based parameter index
   * @returns The placeholder string (e.g., "$1")
   */
  public placeholder(index: number): string {
    return `$${index}`;
  }

  /**
   * Quote an identifier using PostgreSQL's double-quote syntax.
   *
   * Handles escaping of embedded double quotes by doubling them.
   *
   * @param identifier - The identifier (table/column name) to quote
   * @returns The quoted identifier (e.g., '"user"')
   */
  public quoteIdentifier(identifier: string): string {
    // Split on dots for qualified names (schema.table.column)
    const parts = identifier.split(".");
    return parts.map((part) => `"${part.replace(/"/g, '""')}"`).join(".");
  }

  public beginStatement(isolationLevel: IsolationLevel): string {
    return `BEGIN ISOLATION LEVEL ${isolationLevel.toUpperCase()}`;
  }
}
