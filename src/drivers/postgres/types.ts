/**
 * PostgreSQL Client Types
 *
 * Type definitions specific to the PostgreSQL client implementation.
 *
 * @module enlist-sql/drivers/postgres
 */

/**
 * PostgreSQL pool configuration options.
 *
 * The connection itself is described by the connection string each
 * connection is opened with; one pool is kept per connection string.
 */
export type PostgresPoolConfig = {
  /** Maximum number of clients in the pool (default: 10) */
  readonly max?: number;
  /** Minimum number of clients in the pool (default: 0) */
  readonly min?: number;
  /** How long a client can sit idle before being closed (ms) */
  readonly idleTimeoutMillis?: number;
  /** How long to wait for a client before timing out (ms) */
  readonly connectionTimeoutMillis?: number;
  /** Maximum times to use a connection before destroying it */
  readonly maxUses?: number;
  /** Application name for connection identification */
  readonly application_name?: string;
  /** SSL configuration */
  readonly ssl?:
    | boolean
    | {
        readonly rejectUnauthorized?: boolean;
        readonly ca?: string;
        readonly cert?: string;
        readonly key?: string;
      };
};
