/**
 * Error thrown when a single-row command receives more than one row.
 */
export class CardinalityViolationError extends Error {
  /**
   * Number of rows the store returned.
   */
  public readonly rowCount: number;

  public constructor(rowCount: number) {
    super(`Expected at most one row, received ${rowCount}.`);
    this.name = "CardinalityViolationError";
    this.rowCount = rowCount;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CardinalityViolationError);
    }
  }
}
