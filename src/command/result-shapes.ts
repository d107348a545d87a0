import type { StatementResult } from "../contracts/database-client.contract";
import { CardinalityViolationError } from "../errors/cardinality-violation.error";
import type { Row } from "../types";
import { none, some, type Option } from "./option";
import { RowSequence } from "./row-sequence";

export type ResultShapeKind =
  | "rowsAffected"
  | "records"
  | "tuples"
  | "singleRecord"
  | "singleTuple"
  | "scalar";

/**
 * Turns the raw statement result into the value a command returns
 */
export type ResultShape<TResult> = {
  readonly kind: ResultShapeKind;
  read(result: StatementResult): TResult;
};

export type Tuple = readonly unknown[];

function toTuple(row: Row, columns: readonly string[]): Tuple {
  return columns.map((column) => row[column]);
}

function singleRow(result: StatementResult): Row | undefined {
  if (result.rows.length > 1) {
    throw new CardinalityViolationError(result.rows.length);
  }

  return result.rows[0];
}

/**
 * Number of rows the statement affected
 */
function rowsAffected(): ResultShape<number> {
  return {
    kind: "rowsAffected",
    read: (result) => result.rowCount,
  };
}

/**
 * Every row keyed by column name
 */
function records(): ResultShape<RowSequence<Row>>;
function records<TRecord>(map: (row: Row) => TRecord): ResultShape<RowSequence<TRecord>>;
function records<TRecord>(map?: (row: Row) => TRecord): ResultShape<RowSequence<TRecord | Row>> {
  return {
    kind: "records",
    read: (result) => RowSequence.from(result.rows, (row) => (map ? map(row) : row)),
  };
}

/**
 * Every row as its values in column order
 */
function tuples(): ResultShape<RowSequence<Tuple>>;
function tuples<TTuple>(map: (tuple: Tuple) => TTuple): ResultShape<RowSequence<TTuple>>;
function tuples<TTuple>(map?: (tuple: Tuple) => TTuple): ResultShape<RowSequence<TTuple | Tuple>> {
  return {
    kind: "tuples",
    read: (result) =>
      RowSequence.from(result.rows, (row) => {
        const tuple = toTuple(row, result.columns);

        return map ? map(tuple) : tuple;
      }),
  };
}

/**
 * At most one row keyed by column name
 */
function singleRecord(): ResultShape<Option<Row>>;
function singleRecord<TRecord>(map: (row: Row) => TRecord): ResultShape<Option<TRecord>>;
function singleRecord<TRecord>(map?: (row: Row) => TRecord): ResultShape<Option<TRecord | Row>> {
  return {
    kind: "singleRecord",
    read: (result) => {
      const row = singleRow(result);

      if (!row) return none();

      return some(map ? map(row) : row);
    },
  };
}

/**
 * At most one row as its values in column order
 */
function singleTuple(): ResultShape<Option<Tuple>>;
function singleTuple<TTuple>(map: (tuple: Tuple) => TTuple): ResultShape<Option<TTuple>>;
function singleTuple<TTuple>(map?: (tuple: Tuple) => TTuple): ResultShape<Option<TTuple | Tuple>> {
  return {
    kind: "singleTuple",
    read: (result) => {
      const row = singleRow(result);

      if (!row) return none();

      const tuple = toTuple(row, result.columns);

      return some(map ? map(tuple) : tuple);
    },
  };
}

/**
 * First column of at most one row
 */
function scalar(): ResultShape<Option<unknown>>;
function scalar<TValue>(map: (value: unknown) => TValue): ResultShape<Option<TValue>>;
function scalar<TValue>(map?: (value: unknown) => TValue): ResultShape<Option<TValue | unknown>> {
  return {
    kind: "scalar",
    read: (result) => {
      const row = singleRow(result);

      if (!row) return none();

      const column = result.columns[0];
      const value = column === undefined ? undefined : row[column];

      return some(map ? map(value) : value);
    },
  };
}

/**
 * Result shapes a command can be declared with
 *
 * @example
 * ```typescript
 * const findRate = new SqlCommand({
 *   statement: "SELECT rate FROM rates WHERE code = @code",
 *   shape: ResultShapes.scalar(Number),
 * });
 * ```
 */
export const ResultShapes = {
  rowsAffected,
  records,
  tuples,
  singleRecord,
  singleTuple,
  scalar,
};
