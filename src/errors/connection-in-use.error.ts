/**
 * Error thrown when a connection already bound to one transaction context
 * is used from another context.
 */
export class ConnectionInUseError extends Error {
  /**
   * Identity of the connection.
   */
  public readonly connectionId: string;

  /**
   * Identity of the transaction currently holding the connection.
   */
  public readonly transactionId: string;

  public constructor(connectionId: string, transactionId: string) {
    super(`Connection "${connectionId}" is in use by transaction "${transactionId}".`);
    this.name = "ConnectionInUseError";
    this.connectionId = connectionId;
    this.transactionId = transactionId;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConnectionInUseError);
    }
  }
}
