/**
 * Error thrown when an ambient transaction escalated to distributed mode
 * where the caller does not accept it.
 */
export class UnexpectedDistributedTransactionError extends Error {
  /**
   * Identity of the escalated transaction.
   */
  public readonly transactionId: string;

  public constructor(transactionId: string) {
    super(`Unexpected distributed transaction "${transactionId}".`);
    this.name = "UnexpectedDistributedTransactionError";
    this.transactionId = transactionId;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UnexpectedDistributedTransactionError);
    }
  }
}
