import type { DatabaseClientContract } from "./contracts/database-client.contract";

/**
 * Transaction isolation levels understood by every client.
 */
export type IsolationLevel =
  | "read uncommitted"
  | "read committed"
  | "repeatable read"
  | "serializable";

/**
 * Values that can be bound to a statement parameter.
 */
export type SqlValue = string | number | bigint | boolean | null | Date | Uint8Array;

/**
 * Named statement parameters, keyed by the `@name` used in the statement text.
 */
export type StatementParameters = Record<string, SqlValue>;

/**
 * A row as returned by the store, keyed by column name.
 */
export type Row = Record<string, unknown>;

/**
 * How a new ambient scope relates to the one already active in the flow.
 *
 * - `required`: join the current ambient transaction, or start one
 * - `requiresNew`: always start an independent transaction
 * - `suppress`: run without any ambient transaction
 */
export type TransactionScopeOption = "required" | "requiresNew" | "suppress";

/**
 * What happens when an ambient transaction escalates to distributed mode.
 */
export type EscalationPolicy = "allow" | "reject";

export type TransactionConfigurations = {
  /**
   * Client used by commands and batches that open their own connection
   */
  client?: DatabaseClientContract;
  /**
   * Connection string used by commands and batches that open their own connection
   */
  connectionString?: string;
  /**
   * Isolation level of explicit transactions
   *
   * @default "read committed"
   */
  isolationLevel: IsolationLevel;
  /**
   * Isolation level of ambient transactions
   *
   * @default "serializable"
   */
  ambientIsolationLevel: IsolationLevel;
  /**
   * Whether ambient scopes follow asynchronous continuations
   *
   * @default false
   */
  asyncFlow: boolean;
  /**
   * @default "allow"
   */
  escalationPolicy: EscalationPolicy;
};
