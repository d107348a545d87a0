/**
 * SQLite Client Implementation
 *
 * Physical connections are `better-sqlite3` databases, which run every
 * statement synchronously; the asynchronous operations resolve right away.
 *
 * @module enlist-sql/drivers/sqlite
 */

import { Random } from "@mongez/reinforcements";
import Database from "better-sqlite3";
import { parseConnectionString } from "../../connection/connection-string";
import type {
  CompiledStatement,
  PhysicalConnectionContract,
  StatementResult,
  SynchronousDatabaseClientContract,
  SynchronousPhysicalConnectionContract,
  SynchronousPhysicalTransactionContract,
} from "../../contracts/database-client.contract";
import { InvalidStateError } from "../../errors/invalid-state.error";
import type { IsolationLevel, Row, SqlValue } from "../../types";
import { SqliteDialect } from "./sqlite-dialect";

export type SqliteDatabaseOptions = {
  readonly filename: string;
  readonly readonly: boolean;
  /**
   * Milliseconds to wait on a locked database
   */
  readonly timeout?: number;
};

/**
 * Resolve the database file of a connection string.
 *
 * Accepts `Data Source=<file>` (or `Filename=<file>`) with optional
 * `Mode=ReadOnly` and `Default Timeout=<seconds>`, or a bare file name.
 */
export function parseSqliteConnectionString(connectionString: string): SqliteDatabaseOptions {
  const { options } = parseConnectionString(connectionString);

  if (options.size === 0) {
    return { filename: connectionString.trim(), readonly: false };
  }

  const filename = options.get("data source") ?? options.get("filename");

  if (!filename) {
    throw new InvalidStateError(
      `SQLite connection string "${connectionString}" names no "Data Source".`,
    );
  }

  const timeout = options.get("default timeout");

  return {
    filename,
    readonly: options.get("mode")?.toLowerCase() === "readonly",
    timeout: timeout === undefined ? undefined : parseTimeout(connectionString, timeout),
  };
}

/**
 * Seconds to milliseconds
 */
function parseTimeout(connectionString: string, timeout: string): number {
  const seconds = Number(timeout);

  if (timeout.trim() === "" || !Number.isFinite(seconds) || seconds < 0) {
    throw new InvalidStateError(
      `SQLite connection string "${connectionString}" has an invalid "Default Timeout" of "${timeout}".`,
    );
  }

  return seconds * 1000;
}

/**
 * Convert a value to one SQLite can bind.
 */
function toSqliteValue(value: SqlValue): unknown {
  if (typeof value === "boolean") return value ? 1 : 0;

  if (value instanceof Date) return value.toISOString();

  if (value instanceof Uint8Array) {
    return Buffer.from(value.buffer, value.byteOffset, value.byteLength);
  }

  return value;
}

/**
 * SQLite client backed by `better-sqlite3`.
 *
 * @example
 * ```typescript
 * setTransactionConfigurations({
 *   client: new SqliteClient(),
 *   connectionString: "Data Source=rates.db",
 * });
 * ```
 */
export class SqliteClient implements SynchronousDatabaseClientContract {
  public readonly name = "sqlite" as const;

  public readonly dialect = new SqliteDialect();

  public async connect(connectionString: string): Promise<PhysicalConnectionContract> {
    return this.connectSync(connectionString);
  }

  public connectSync(connectionString: string): SynchronousPhysicalConnectionContract {
    const options = parseSqliteConnectionString(connectionString);

    const database = new Database(options.filename, {
      readonly: options.readonly,
      timeout: options.timeout,
    });

    return new SqliteConnection(database, this.dialect);
  }
}

class SqliteConnection implements SynchronousPhysicalConnectionContract {
  public readonly id = `sqlite-${Random.id()}`;

  public constructor(
    private readonly database: Database.Database,
    private readonly dialect: SqliteDialect,
  ) {}

  public async beginTransaction(
    isolationLevel: IsolationLevel,
  ): Promise<SynchronousPhysicalTransactionContract> {
    return this.beginTransactionSync(isolationLevel);
  }

  public beginTransactionSync(isolationLevel: IsolationLevel): SynchronousPhysicalTransactionContract {
    this.database.exec(this.dialect.beginStatement(isolationLevel));

    const commitSync = () => {
      this.database.exec("COMMIT");
    };

    const rollbackSync = () => {
      // SQLite may have rolled back already after certain errors
      if (this.database.inTransaction) {
        this.database.exec("ROLLBACK");
      }
    };

    return {
      isolationLevel,
      commitSync,
      rollbackSync,
      commit: async () => commitSync(),
      rollback: async () => rollbackSync(),
    };
  }

  public execute(statement: CompiledStatement): StatementResult {
    const prepared = this.database.prepare<unknown[], Row>(statement.sql);
    const values = statement.values.map(toSqliteValue);

    if (prepared.reader) {
      const rows = prepared.all(...values);

      return {
        rows,
        rowCount: rows.length,
        columns: prepared.columns().map((column) => column.name),
      };
    }

    return { rows: [], rowCount: prepared.run(...values).changes, columns: [] };
  }

  public async executeAsync(statement: CompiledStatement): Promise<StatementResult> {
    return this.execute(statement);
  }

  public closeSync(): void {
    this.database.close();
  }

  public async close(): Promise<void> {
    this.closeSync();
  }
}
