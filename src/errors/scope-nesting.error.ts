/**
 * Fatal error thrown when ambient scopes are released out of order.
 *
 * This is a programming error. The unit of work that hit it is rolled back.
 */
export class ScopeNestingError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = "ScopeNestingError";

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ScopeNestingError);
    }
  }
}
