import type { SqlDialectContract } from "../drivers/sql/sql-dialect.contract";
import type { IsolationLevel, Row, SqlValue } from "../types";

/** A statement with its parameters already bound by position. */
export type CompiledStatement = {
  /** Statement text using the dialect's placeholders */
  readonly sql: string;
  /** Values in placeholder order */
  readonly values: readonly SqlValue[];
};

/** Raw outcome of a statement, before it is shaped for the caller. */
export type StatementResult = {
  /** Rows returned by the statement, keyed by column name */
  readonly rows: Row[];
  /** Rows affected by INSERT/UPDATE/DELETE, or rows returned by a query */
  readonly rowCount: number;
  /** Column names in result order */
  readonly columns: string[];
};

/** Representation of an opened physical transaction. */
export interface PhysicalTransactionContract {
  /** Isolation level the transaction was opened with. */
  readonly isolationLevel: IsolationLevel;
  /** Commit the transaction. */
  commit(): Promise<void>;
  /** Rollback the transaction. */
  rollback(): Promise<void>;
}

/** Physical transaction that can also finish without suspending. */
export interface SynchronousPhysicalTransactionContract extends PhysicalTransactionContract {
  commitSync(): void;
  rollbackSync(): void;
}

/** One physical connection to the store. */
export interface PhysicalConnectionContract {
  /** Identity of the physical connection. */
  readonly id: string;
  /** Open a transaction; subsequent statements on this connection join it. */
  beginTransaction(isolationLevel: IsolationLevel): Promise<PhysicalTransactionContract>;
  /** Send a statement and wait for the store's response. */
  executeAsync(statement: CompiledStatement): Promise<StatementResult>;
  /** Close the physical connection. */
  close(): Promise<void>;
}

/** Physical connection whose operations can also run without suspending. */
export interface SynchronousPhysicalConnectionContract extends PhysicalConnectionContract {
  beginTransactionSync(isolationLevel: IsolationLevel): SynchronousPhysicalTransactionContract;
  /** Send a statement, blocking until the store returns. */
  execute(statement: CompiledStatement): StatementResult;
  closeSync(): void;
}

/**
 * The database client collaborator: opens physical connections.
 */
export interface DatabaseClientContract {
  /**
   * The name of the client.
   *
   * @example "postgres", "sqlite"
   */
  readonly name: string;

  /** SQL dialect spoken by the store. */
  readonly dialect: SqlDialectContract;

  /** Open a physical connection. */
  connect(connectionString: string): Promise<PhysicalConnectionContract>;
}

/**
 * Client able to open physical connections and run statements synchronously.
 */
export interface SynchronousDatabaseClientContract extends DatabaseClientContract {
  connectSync(connectionString: string): SynchronousPhysicalConnectionContract;
}

export function isSynchronousClient(
  client: DatabaseClientContract,
): client is SynchronousDatabaseClientContract {
  return "connectSync" in client && typeof client.connectSync === "function";
}

export function isSynchronousConnection(
  connection: PhysicalConnectionContract,
): connection is SynchronousPhysicalConnectionContract {
  return "execute" in connection && typeof connection.execute === "function";
}
