import events, { type EventSubscription } from "@mongez/events";
import type { Connection } from "../connection/connection";
import type { TransactionContext } from "../transaction/transaction-context";

/**
 * Lifecycle events emitted by transaction contexts.
 *
 * - `enlisted`: a physical connection joined an ambient transaction
 * - `escalated`: an ambient transaction became distributed
 * - `committed`: the transaction committed
 * - `rolledBack`: the transaction rolled back
 */
export type TransactionEventName = "enlisted" | "escalated" | "committed" | "rolledBack";

export type TransactionEventListener = (
  transaction: TransactionContext,
  connection?: Connection,
) => void;

function eventName(event: TransactionEventName): string {
  return `transaction.${event}`;
}

export function triggerTransactionEvent(
  event: TransactionEventName,
  transaction: TransactionContext,
  connection?: Connection,
): void {
  events.triggerAll(eventName(event), transaction, connection);
}

/**
 * Listen for a transaction lifecycle event.
 *
 * @example
 * ```typescript
 * const subscription = onTransactionEvent("escalated", (transaction) => {
 *   console.log(`${transaction.id} is now distributed`);
 * });
 *
 * subscription.unsubscribe();
 * ```
 */
export function onTransactionEvent(
  event: TransactionEventName,
  listener: TransactionEventListener,
): EventSubscription {
  return events.subscribe(eventName(event), listener);
}
