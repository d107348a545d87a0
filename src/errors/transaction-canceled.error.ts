/**
 * Error thrown when work is attempted on a transaction whose cancellation
 * signal was raised.
 */
export class TransactionCanceledError extends Error {
  /**
   * Identity of the canceled transaction.
   */
  public readonly transactionId: string;

  public constructor(transactionId: string, reason?: unknown) {
    super(`Transaction "${transactionId}" was canceled.`, { cause: reason });
    this.name = "TransactionCanceledError";
    this.transactionId = transactionId;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TransactionCanceledError);
    }
  }
}
