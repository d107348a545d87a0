/**
 * PostgreSQL Client Exports
 *
 * @module enlist-sql/drivers/postgres
 */

export * from "./postgres-client";
export * from "./postgres-dialect";
export * from "./types";
