/**
 * Error thrown when a batch could not be applied.
 *
 * No mutation of the batch is considered applied: `rowsAffected` is always
 * zero and every mutation stays pending for a retry.
 */
export class BatchApplyError extends Error {
  /**
   * Rows reported as applied.
   */
  public readonly rowsAffected = 0;

  /**
   * Table the batch targets.
   */
  public readonly table: string;

  /**
   * Number of mutations still pending.
   */
  public readonly pendingCount: number;

  public constructor(table: string, pendingCount: number, cause: unknown) {
    super(`Failed to apply ${pendingCount} pending mutation(s) to "${table}".`, { cause });
    this.name = "BatchApplyError";
    this.table = table;
    this.pendingCount = pendingCount;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, BatchApplyError);
    }
  }
}
