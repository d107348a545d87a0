/**
 * SQLite Client Exports
 *
 * @module enlist-sql/drivers/sqlite
 */

export * from "./sqlite-client";
export * from "./sqlite-dialect";
