/**
 * Error thrown when an operation is attempted on an object whose state
 * does not allow it.
 *
 * This can occur when:
 * - Executing a statement or beginning a transaction on a closed connection
 * - Completing a transaction context that was already completed or released
 * - Completing a transaction that a nested scope or a failed statement doomed
 * - Iterating a row sequence a second time
 */
export class InvalidStateError extends Error {
  /**
   * Creates a new InvalidStateError.
   *
   * @param message - Descriptive error message
   * @param options - Optional underlying cause
   */
  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "InvalidStateError";

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InvalidStateError);
    }
  }
}
