import { colors } from "@mongez/copper";
import { log } from "@warlock.js/logger";
import { StatementTarget, type StatementBinding } from "../command/statement-target";
import { getTransactionConfig } from "../config";
import type { Connection } from "../connection/connection";
import type { CompiledStatement, DatabaseClientContract } from "../contracts/database-client.contract";
import type { SqlDialectContract } from "../drivers/sql/sql-dialect.contract";
import { BatchApplyError } from "../errors/batch-apply.error";
import { InvalidStateError } from "../errors/invalid-state.error";
import type { ExplicitTransaction } from "../transaction/explicit-transaction";
import {
  bulkInsertStatements,
  mutationStatement,
  type BatchRow,
  type RowMutation,
} from "./batch-statements";

export type TableBatchOptions<TRow extends BatchRow> = {
  /**
   * Target table
   */
  table: string;
  /**
   * Columns identifying a row for updates and deletes
   */
  keyColumns: readonly (keyof TRow & string)[];
  /**
   * Client used when no connection is given
   *
   * @default the configured `client`
   */
  client?: DatabaseClientContract;
  /**
   * @default the configured `connectionString`
   */
  connectionString?: string;
};

export type BulkLoadOptions = {
  /**
   * Maximum rows per INSERT statement
   *
   * @default 500
   */
  chunkSize?: number;
};

/**
 * Pending row mutations of one table, applied together in one transaction.
 *
 * @example
 * ```typescript
 * const rates = new TableBatch<RateRow>({ table: "rates", keyColumns: ["code"] });
 *
 * rates.addRow({ code: "GBP", rate: 0.63 });
 * rates.updateRow({ code: "EUR" }, { rate: 0.91 });
 *
 * const rowsAffected = await rates.apply(connection);
 * ```
 */
export class TableBatch<TRow extends BatchRow> {
  public readonly table: string;

  public readonly keyColumns: readonly (keyof TRow & string)[];

  private mutations: RowMutation[] = [];

  private readonly client?: DatabaseClientContract;

  private readonly connectionString?: string;

  public constructor(options: TableBatchOptions<TRow>) {
    if (options.keyColumns.length === 0) {
      throw new InvalidStateError(`Table batch for "${options.table}" needs at least one key column.`);
    }

    this.table = options.table;
    this.keyColumns = options.keyColumns;
    this.client = options.client;
    this.connectionString = options.connectionString;
  }

  /**
   * Mutations not applied yet, in the order they were recorded
   */
  public get pending(): readonly RowMutation[] {
    return this.mutations;
  }

  public get hasChanges(): boolean {
    return this.mutations.length > 0;
  }

  public addRow(row: TRow): this {
    this.mutations.push({ kind: "insert", row: { ...row } });

    return this;
  }

  public updateRow(key: Partial<TRow>, changes: Partial<TRow>): this {
    const values: BatchRow = { ...changes };

    if (!Object.values(values).some((value) => value !== undefined)) {
      throw new InvalidStateError(`Update of "${this.table}" has no changed columns.`);
    }

    this.mutations.push({ kind: "update", key: this.keyOf(key), changes: values });

    return this;
  }

  public deleteRow(key: Partial<TRow>): this {
    this.mutations.push({ kind: "delete", key: this.keyOf(key) });

    return this;
  }

  /**
   * Drop every pending mutation
   */
  public clear(): void {
    this.mutations = [];
  }

  /**
   * Send every pending mutation inside one transaction
   *
   * The batch joins the explicit transaction, or the ambient one, or begins
   * its own on the connection.
   *
   * @returns rows affected
   * @throws BatchApplyError when any mutation fails; every mutation stays pending
   */
  public async apply(connection?: Connection, transaction?: ExplicitTransaction): Promise<number> {
    if (!this.hasChanges) return 0;

    return this.applyStatements(connection, transaction, (dialect) =>
      this.mutations.map((mutation) =>
        mutationStatement(dialect, this.table, this.keyColumns, mutation),
      ),
    );
  }

  /**
   * Apply without suspending; needs a synchronous client
   */
  public applySync(connection?: Connection, transaction?: ExplicitTransaction): number {
    if (!this.hasChanges) return 0;

    const target = StatementTarget.resolve(this.binding(connection, transaction), false);
    const statements = this.mutations.map((mutation) =>
      mutationStatement(target.connection.client.dialect, this.table, this.keyColumns, mutation),
    );

    try {
      target.prepareSync();

      const rowsAffected = this.sendSync(target, statements);

      this.mutations = [];

      return rowsAffected;
    } catch (error) {
      throw this.failure(error);
    } finally {
      target.disposeSync();
    }
  }

  /**
   * Load the pending inserts with multi-row INSERT statements
   *
   * @throws InvalidStateError when updates or deletes are pending
   */
  public async bulkLoad(
    connection?: Connection,
    transaction?: ExplicitTransaction,
    options: BulkLoadOptions = {},
  ): Promise<number> {
    const chunkSize = options.chunkSize ?? 500;

    if (!Number.isInteger(chunkSize) || chunkSize < 1) {
      throw new InvalidStateError(
        `Bulk load chunk size must be a positive integer, received ${chunkSize}.`,
      );
    }

    const rows: BatchRow[] = [];

    for (const mutation of this.mutations) {
      if (mutation.kind !== "insert") {
        throw new InvalidStateError(
          `Bulk load of "${this.table}" only sends inserts, but a pending ${mutation.kind} was found.`,
        );
      }

      rows.push(mutation.row);
    }

    if (rows.length === 0) return 0;

    return this.applyStatements(connection, transaction, (dialect) =>
      bulkInsertStatements(dialect, this.table, rows, chunkSize),
    );
  }

  private async applyStatements(
    connection: Connection | undefined,
    transaction: ExplicitTransaction | undefined,
    build: (dialect: SqlDialectContract) => CompiledStatement[],
  ): Promise<number> {
    const target = StatementTarget.resolve(this.binding(connection, transaction), true);
    const statements = build(target.connection.client.dialect);

    try {
      await target.prepare();

      const rowsAffected = await this.sendAsync(target, statements);

      this.mutations = [];

      return rowsAffected;
    } catch (error) {
      throw this.failure(error);
    } finally {
      await target.dispose();
    }
  }

  private async sendAsync(target: StatementTarget, statements: CompiledStatement[]): Promise<number> {
    if (target.transaction) {
      return this.sendEach(target, statements);
    }

    const internal = await target.connection.beginTransaction();

    target.transaction = internal;

    try {
      const rowsAffected = await this.sendEach(target, statements);

      internal.complete();

      return rowsAffected;
    } finally {
      target.transaction = undefined;
      await internal.release();
    }
  }

  private async sendEach(target: StatementTarget, statements: CompiledStatement[]): Promise<number> {
    let rowsAffected = 0;

    for (const statement of statements) {
      const result = await target.sendAsync((physical) => physical.executeAsync(statement));

      rowsAffected += result.rowCount;
    }

    return rowsAffected;
  }

  private sendSync(target: StatementTarget, statements: CompiledStatement[]): number {
    const sendEach = () => {
      let rowsAffected = 0;

      for (const statement of statements) {
        rowsAffected += target.send((physical) => physical.execute(statement)).rowCount;
      }

      return rowsAffected;
    };

    if (target.transaction) {
      return sendEach();
    }

    const internal = target.synchronousPhysical.beginTransactionSync(
      getTransactionConfig("isolationLevel"),
    );

    let rowsAffected: number;

    try {
      rowsAffected = sendEach();
    } catch (error) {
      internal.rollbackSync();
      throw error;
    }

    internal.commitSync();

    return rowsAffected;
  }

  private binding(
    connection: Connection | undefined,
    transaction: ExplicitTransaction | undefined,
  ): StatementBinding {
    return {
      connection: connection ?? transaction?.connection,
      transaction,
      client: this.client,
      connectionString: this.connectionString,
    };
  }

  private keyOf(key: Partial<TRow>): BatchRow {
    const values: BatchRow = { ...key };

    for (const column of this.keyColumns) {
      if (values[column] === undefined) {
        throw new InvalidStateError(`Key of "${this.table}" is missing column "${column}".`);
      }
    }

    return values;
  }

  private failure(error: unknown): BatchApplyError {
    log.error(
      "batch",
      "apply",
      `Failed to apply ${this.mutations.length} mutation(s) to ${colors.yellow(this.table)}: ${
        error instanceof Error ? error.message : String(error)
      }`,
    );

    return new BatchApplyError(this.table, this.mutations.length, error);
  }
}
