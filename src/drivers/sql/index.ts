/**
 * SQL Driver Exports
 *
 * Central export file for shared SQL infrastructure.
 *
 * @module enlist-sql/drivers/sql
 */

export * from "./sql-dialect.contract";
