import type { CompiledStatement } from "../contracts/database-client.contract";
import type { SqlDialectContract } from "../drivers/sql/sql-dialect.contract";
import type { SqlValue } from "../types";

/**
 * Column values of a batch row; `undefined` columns are left out
 */
export type BatchRow = Record<string, SqlValue | undefined>;

export type RowMutation =
  | { readonly kind: "insert"; readonly row: BatchRow }
  | { readonly kind: "update"; readonly key: BatchRow; readonly changes: BatchRow }
  | { readonly kind: "delete"; readonly key: BatchRow };

/**
 * Collects bound values and hands out the dialect's placeholders
 */
class StatementValues {
  public readonly values: SqlValue[] = [];

  public constructor(private readonly dialect: SqlDialectContract) {}

  public bind(value: SqlValue): string {
    this.values.push(value);

    return this.dialect.placeholder(this.values.length);
  }
}

function definedColumns(row: BatchRow): [string, SqlValue][] {
  const columns: [string, SqlValue][] = [];

  for (const [column, value] of Object.entries(row)) {
    if (value !== undefined) {
      columns.push([column, value]);
    }
  }

  return columns;
}

function whereKey(
  dialect: SqlDialectContract,
  keyColumns: readonly string[],
  key: BatchRow,
  values: StatementValues,
): string {
  return keyColumns
    .map((column) => {
      const value = key[column];
      const quoted = dialect.quoteIdentifier(column);

      return value === null || value === undefined
        ? `${quoted} IS NULL`
        : `${quoted} = ${values.bind(value)}`;
    })
    .join(" AND ");
}

export function insertStatement(
  dialect: SqlDialectContract,
  table: string,
  row: BatchRow,
): CompiledStatement {
  const columns = definedColumns(row);
  const quotedTable = dialect.quoteIdentifier(table);

  if (columns.length === 0) {
    return { sql: `INSERT INTO ${quotedTable} DEFAULT VALUES`, values: [] };
  }

  const values = new StatementValues(dialect);
  const quotedColumns = columns.map(([column]) => dialect.quoteIdentifier(column)).join(", ");
  const placeholders = columns.map(([, value]) => values.bind(value)).join(", ");

  return {
    sql: `INSERT INTO ${quotedTable} (${quotedColumns}) VALUES (${placeholders})`,
    values: values.values,
  };
}

export function updateStatement(
  dialect: SqlDialectContract,
  table: string,
  keyColumns: readonly string[],
  key: BatchRow,
  changes: BatchRow,
): CompiledStatement {
  const values = new StatementValues(dialect);

  const assignments = definedColumns(changes)
    .map(([column, value]) => `${dialect.quoteIdentifier(column)} = ${values.bind(value)}`)
    .join(", ");

  const where = whereKey(dialect, keyColumns, key, values);

  return {
    sql: `UPDATE ${dialect.quoteIdentifier(table)} SET ${assignments} WHERE ${where}`,
    values: values.values,
  };
}

export function deleteStatement(
  dialect: SqlDialectContract,
  table: string,
  keyColumns: readonly string[],
  key: BatchRow,
): CompiledStatement {
  const values = new StatementValues(dialect);
  const where = whereKey(dialect, keyColumns, key, values);

  return {
    sql: `DELETE FROM ${dialect.quoteIdentifier(table)} WHERE ${where}`,
    values: values.values,
  };
}

export function mutationStatement(
  dialect: SqlDialectContract,
  table: string,
  keyColumns: readonly string[],
  mutation: RowMutation,
): CompiledStatement {
  switch (mutation.kind) {
    case "insert":
      return insertStatement(dialect, table, mutation.row);
    case "update":
      return updateStatement(dialect, table, keyColumns, mutation.key, mutation.changes);
    case "delete":
      return deleteStatement(dialect, table, keyColumns, mutation.key);
  }
}

/**
 * Multi-row INSERT statements of at most `chunkSize` rows each.
 *
 * Consecutive rows with the same columns share a statement.
 */
export function bulkInsertStatements(
  dialect: SqlDialectContract,
  table: string,
  rows: readonly BatchRow[],
  chunkSize: number,
): CompiledStatement[] {
  const statements: CompiledStatement[] = [];
  const quotedTable = dialect.quoteIdentifier(table);

  let chunk: [string, SqlValue][][] = [];
  let chunkColumns = "";

  const flush = () => {
    if (chunk.length === 0) return;

    const first = chunk[0];

    if (first.length === 0) {
      for (let index = 0; index < chunk.length; index++) {
        statements.push({ sql: `INSERT INTO ${quotedTable} DEFAULT VALUES`, values: [] });
      }
    } else {
      const values = new StatementValues(dialect);
      const quotedColumns = first.map(([column]) => dialect.quoteIdentifier(column)).join(", ");
      const valueSets = chunk.map(
        (columns) => `(${columns.map(([, value]) => values.bind(value)).join(", ")})`,
      );

      statements.push({
        sql: `INSERT INTO ${quotedTable} (${quotedColumns}) VALUES ${valueSets.join(", ")}`,
        values: values.values,
      });
    }

    chunk = [];
  };

  for (const row of rows) {
    const columns = definedColumns(row);
    const signature = columns.map(([column]) => column).join("\u0000");

    if (chunk.length >= chunkSize || (chunk.length > 0 && signature !== chunkColumns)) {
      flush();
    }

    chunkColumns = signature;
    chunk.push(columns);
  }

  flush();

  return statements;
}
