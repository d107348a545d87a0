/**
 * Error thrown when a client cannot perform the requested operation,
 * such as synchronous execution on a client that only runs asynchronously.
 */
export class UnsupportedOperationError extends Error {
  /**
   * Name of the client that refused the operation.
   */
  public readonly clientName: string;

  public constructor(clientName: string, operation: string) {
    super(`The "${clientName}" client does not support ${operation}.`);
    this.name = "UnsupportedOperationError";
    this.clientName = clientName;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UnsupportedOperationError);
    }
  }
}
