import type { TransactionConfigurations } from "./types";

const defaultConfigurations: TransactionConfigurations = {
  isolationLevel: "read committed",
  ambientIsolationLevel: "serializable",
  asyncFlow: false,
  escalationPolicy: "allow",
};

let configurations: TransactionConfigurations = { ...defaultConfigurations };

export function setTransactionConfigurations(
  transactionConfigurations: Partial<TransactionConfigurations>,
) {
  configurations = {
    ...configurations,
    ...transactionConfigurations,
  };
}

export function getTransactionConfigurations(): TransactionConfigurations {
  return configurations;
}

export function getTransactionConfig<Key extends keyof TransactionConfigurations>(
  key: Key,
): TransactionConfigurations[Key] {
  return configurations[key];
}

/**
 * Restore the built-in defaults
 */
export function resetTransactionConfigurations() {
  configurations = { ...defaultConfigurations };
}
