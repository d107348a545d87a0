export * from "./batch-apply.error";
export * from "./cardinality-violation.error";
export * from "./connection-in-use.error";
export * from "./connection-mismatch.error";
export * from "./invalid-state.error";
export * from "./missing-parameter.error";
export * from "./scope-nesting.error";
export * from "./transaction-canceled.error";
export * from "./transaction-context-lost.error";
export * from "./unexpected-distributed-transaction.error";
export * from "./unsupported-operation.error";
