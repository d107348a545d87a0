// Configuration
export * from "./config";
export * from "./types";

// Context
export * from "./context/ambient-scope-context";

// Contracts
export * from "./contracts/database-client.contract";

// Connection
export * from "./connection/connection";
export * from "./connection/connection-string";

// Transactions
export * from "./transaction/ambient-transaction";
export * from "./transaction/explicit-transaction";
export * from "./transaction/transaction-context";
export * from "./transaction/transaction-scope";

// Commands
export * from "./command/option";
export * from "./command/result-shapes";
export * from "./command/row-sequence";
export * from "./command/sql-command";
export * from "./command/statement-compiler";
export * from "./command/statement-target";

// Batch Reconciler
export * from "./batch/batch-statements";
export * from "./batch/table-batch";

// Errors
export * from "./errors";

// Events
export * from "./events/transaction-events";

// Clients
export * from "./drivers/postgres";
export * from "./drivers/sql";
export * from "./drivers/sqlite";
