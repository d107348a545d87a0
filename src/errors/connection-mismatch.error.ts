/**
 * Error thrown when a command is given a connection and a transaction
 * that is bound to a different connection.
 */
export class ConnectionMismatchError extends Error {
  /**
   * Identity of the connection passed to the command.
   */
  public readonly connectionId: string;

  /**
   * Identity of the connection the transaction is bound to.
   */
  public readonly transactionConnectionId: string;

  public constructor(connectionId: string, transactionConnectionId: string) {
    super(
      `Connection "${connectionId}" does not match the connection "${transactionConnectionId}" the transaction is bound to.`,
    );
    this.name = "ConnectionMismatchError";
    this.connectionId = connectionId;
    this.transactionConnectionId = transactionConnectionId;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConnectionMismatchError);
    }
  }
}
