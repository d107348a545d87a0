/**
 * Error thrown when an ambient transaction scope that does not flow across
 * asynchronous suspension is needed after the flow suspended, or by an
 * operation that is about to suspend.
 *
 * Enable `asyncFlow` on the scope, or pass the transaction explicitly.
 */
export class TransactionContextLostError extends Error {
  /**
   * Identity of the scope that could not be reached.
   */
  public readonly scopeId: string;

  public constructor(scopeId: string, message?: string) {
    super(
      message ??
        `Transaction scope "${scopeId}" does not flow across asynchronous continuations.`,
    );
    this.name = "TransactionContextLostError";
    this.scopeId = scopeId;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TransactionContextLostError);
    }
  }
}
