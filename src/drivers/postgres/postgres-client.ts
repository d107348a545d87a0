/**
 * PostgreSQL Client Implementation
 *
 * Opens physical connections for the `pg` package. One pool is kept per
 * connection string; a physical connection holds a pooled client until it
 * is closed.
 *
 * @module enlist-sql/drivers/postgres
 */

import { colors } from "@mongez/copper";
import { Random } from "@mongez/reinforcements";
import { log } from "@warlock.js/logger";
import type {
  CompiledStatement,
  DatabaseClientContract,
  PhysicalConnectionContract,
  PhysicalTransactionContract,
  StatementResult,
} from "../../contracts/database-client.contract";
import type { IsolationLevel, Row } from "../../types";
import { PostgresDialect } from "./postgres-dialect";
import type { PostgresPoolConfig } from "./types";

/**
 * Type imports from pg package.
 * These are resolved at runtime when the package is dynamically loaded.
 */
type PgPool = import("pg").Pool;
type PgPoolClient = import("pg").PoolClient;
type PgPoolConfig = import("pg").PoolConfig;

/**
 * Cached pg module reference.
 */
let pgModule: typeof import("pg").default | undefined;

/**
 * Lazily load the pg package.
 *
 * @returns The pg module
 * @throws Error if pg package is not installed
 */
async function loadPg(): Promise<typeof import("pg").default> {
  if (pgModule) {
    return pgModule;
  }

  try {
    pgModule = (await import("pg")).default;
    return pgModule;
  } catch (error) {
    throw new Error(
      'The "pg" package is required for PostgreSQL support. ' + "Please install it: npm install pg",
      { cause: error },
    );
  }
}

/**
 * Host and database of a URL connection string, without credentials.
 */
function describeTarget(connectionString: string): string {
  if (!URL.canParse(connectionString)) {
    return "database";
  }

  const url = new URL(connectionString);

  return `${url.host}${url.pathname}`;
}

/**
 * PostgreSQL client.
 *
 * @example
 * ```typescript
 * const client = new PostgresClient({ max: 20 });
 *
 * setTransactionConfigurations({
 *   client,
 *   connectionString: "postgres://app@localhost:5432/rates",
 * });
 *
 * // ...
 *
 * await client.end();
 * ```
 */
export class PostgresClient implements DatabaseClientContract {
  /**
   * Client name identifier.
   */
  public readonly name = "postgres" as const;

  /**
   * SQL dialect for PostgreSQL-specific syntax.
   */
  public readonly dialect = new PostgresDialect();

  /**
   * Pools keyed by connection string, stored while they are still connecting
   * so concurrent first connections share one pool.
   */
  private readonly pools = new Map<string, Promise<PgPool>>();

  public constructor(private readonly config: PostgresPoolConfig = {}) {}

  /**
   * Acquire a pooled client as a physical connection.
   */
  public async connect(connectionString: string): Promise<PhysicalConnectionContract> {
    const pool = await this.pool(connectionString);

    return new PostgresConnection(await pool.connect(), this.dialect);
  }

  /**
   * Close every pool.
   */
  public async end(): Promise<void> {
    for (const [connectionString, pending] of this.pools) {
      const [settled] = await Promise.allSettled([pending]);

      // a pool that failed to connect was ended when it failed
      if (settled.status === "rejected") continue;

      await settled.value.end();

      log.info(
        "database",
        "connection[Postgres]",
        `Closed connection pool of ${colors.bold(colors.yellowBright(describeTarget(connectionString)))}`,
      );
    }

    this.pools.clear();
  }

  private pool(connectionString: string): Promise<PgPool> {
    let pending = this.pools.get(connectionString);

    if (!pending) {
      pending = this.createPool(connectionString);
      this.pools.set(connectionString, pending);
    }

    return pending;
  }

  private async createPool(connectionString: string): Promise<PgPool> {
    try {
      return await this.openPool(connectionString);
    } catch (error) {
      this.pools.delete(connectionString);
      throw error;
    }
  }

  private async openPool(connectionString: string): Promise<PgPool> {
    const pg = await loadPg();
    const target = describeTarget(connectionString);

    const poolConfig: PgPoolConfig = {
      connectionString,
      max: this.config.max ?? 10,
      min: this.config.min ?? 0,
      idleTimeoutMillis: this.config.idleTimeoutMillis ?? 30000,
      connectionTimeoutMillis: this.config.connectionTimeoutMillis ?? 2000,
      maxUses: this.config.maxUses,
      application_name: this.config.application_name ?? "enlist-sql",
      ssl: this.config.ssl,
    };

    log.info(
      "database",
      "connection[Postgres]",
      `Connecting to database ${colors.bold(colors.yellowBright(target))}`,
    );

    const pool = new pg.Pool(poolConfig);

    try {
      // Test the connection
      const client = await pool.connect();
      client.release();
    } catch (error) {
      log.error("database", "connection[Postgres]", `Failed to connect to database ${target}`);
      await pool.end();
      throw error;
    }

    log.success(
      "database",
      "connection[Postgres]",
      `Connected to database ${colors.bold(colors.yellowBright(target))}`,
    );

    return pool;
  }
}

/**
 * A pooled client held for the lifetime of one physical connection.
 */
class PostgresConnection implements PhysicalConnectionContract {
  public readonly id = `postgres-${Random.id()}`;

  public constructor(
    private readonly client: PgPoolClient,
    private readonly dialect: PostgresDialect,
  ) {}

  public async beginTransaction(isolationLevel: IsolationLevel): Promise<PhysicalTransactionContract> {
    await this.client.query(this.dialect.beginStatement(isolationLevel));

    return {
      isolationLevel,
      commit: async () => {
        await this.client.query("COMMIT");
      },
      rollback: async () => {
        await this.client.query("ROLLBACK");
      },
    };
  }

  public async executeAsync(statement: CompiledStatement): Promise<StatementResult> {
    const result = await this.client.query<Row>(statement.sql, [...statement.values]);

    return {
      rows: result.rows,
      rowCount: result.rowCount ?? result.rows.length,
      columns: result.fields.map((field) => field.name),
    };
  }

  public async close(): Promise<void> {
    this.client.release();
  }
}
