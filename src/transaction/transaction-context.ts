import { colors } from "@mongez/copper";
import { Random } from "@mongez/reinforcements";
import { log } from "@warlock.js/logger";
import { InvalidStateError } from "../errors/invalid-state.error";
import { TransactionCanceledError } from "../errors/transaction-canceled.error";
import { UnexpectedDistributedTransactionError } from "../errors/unexpected-distributed-transaction.error";
import { triggerTransactionEvent } from "../events/transaction-events";
import type { IsolationLevel } from "../types";

export type TransactionState = "active" | "committed" | "rolledBack";

export type TransactionKind = "explicit" | "ambient";

export type TransactionContextOptions = {
  isolationLevel: IsolationLevel;
  /**
   * Cooperative cancellation; once aborted the transaction can only roll back
   */
  signal?: AbortSignal;
};

/**
 * A unit-of-work boundary.
 *
 * The context stays `active` until it is released. Release commits only when
 * `complete()` succeeded beforehand; every other path (no completion, a failed
 * statement, cancellation) rolls back.
 */
export abstract class TransactionContext {
  public readonly id = `tx-${Random.id()}`;

  public readonly isolationLevel: IsolationLevel;

  public abstract readonly kind: TransactionKind;

  protected readonly signal?: AbortSignal;

  protected completionRequested = false;

  private _state: TransactionState = "active";

  private failure?: { error: unknown };

  private releasing?: Promise<void>;

  public constructor(options: TransactionContextOptions) {
    this.isolationLevel = options.isolationLevel;
    this.signal = options.signal;
  }

  public get state(): TransactionState {
    return this._state;
  }

  public get isActive(): boolean {
    return this._state === "active";
  }

  /**
   * Whether `complete()` was called successfully
   */
  public get isCompleted(): boolean {
    return this.completionRequested;
  }

  public get isCanceled(): boolean {
    return this.signal?.aborted ?? false;
  }

  /**
   * Whether a failure was recorded; such a transaction can only roll back
   */
  public get hasFailed(): boolean {
    return this.failure !== undefined;
  }

  public abstract get isDistributed(): boolean;

  /**
   * Signal that the unit of work succeeded.
   *
   * @throws InvalidStateError if the transaction was already completed or
   * released, or a failure was recorded
   * @throws TransactionCanceledError if the cancellation signal was raised
   */
  public complete(): void {
    this.assertActive();

    if (this.completionRequested) {
      throw new InvalidStateError(`Transaction "${this.id}" is already completed.`);
    }

    this.assertCompletable();

    this.completionRequested = true;
  }

  /**
   * Check everything `complete()` checks except a previous completion
   */
  public assertCompletable(): void {
    this.assertActive();
    this.assertNotCanceled();

    if (this.failure) {
      throw new InvalidStateError(
        `Transaction "${this.id}" cannot complete because it failed: ${describe(this.failure.error)}`,
        { cause: this.failure.error },
      );
    }
  }

  /**
   * Caller-invoked policy check for unexpected escalation
   *
   * @example
   * ```typescript
   * await transactionScope(async (scope) => {
   *   // ...
   *   scope.transaction?.ensureNotDistributed();
   *   scope.complete();
   * });
   * ```
   */
  public ensureNotDistributed(): void {
    if (this.isDistributed) {
      throw new UnexpectedDistributedTransactionError(this.id);
    }
  }

  /**
   * Record a failure; the first one wins
   */
  public markFailed(error: unknown): void {
    if (!this.failure) {
      this.failure = { error };
    }
  }

  public assertActive(): void {
    if (this._state !== "active") {
      throw new InvalidStateError(`Transaction "${this.id}" is already ${this._state}.`);
    }
  }

  public assertNotCanceled(): void {
    if (this.signal?.aborted) {
      throw new TransactionCanceledError(this.id, this.signal.reason);
    }
  }

  /**
   * Check the transaction can take another statement
   */
  public assertUsable(): void {
    this.assertActive();
    this.assertNotCanceled();
  }

  /**
   * Finish the transaction: commit when completed, roll back otherwise.
   *
   * Safe to call more than once; only the first call does any work.
   */
  public release(): Promise<void> {
    if (!this.releasing) {
      this.releasing = this.finish();
    }

    return this.releasing;
  }

  protected abstract commitPhysical(): Promise<void>;

  protected abstract rollbackPhysical(): Promise<void>;

  private async finish(): Promise<void> {
    if (this._state !== "active") {
      return;
    }

    const shouldCommit = this.completionRequested && !this.failure && !this.isCanceled;

    if (shouldCommit) {
      try {
        await this.commitPhysical();
      } catch (error) {
        this._state = "rolledBack";
        log.error(
          "transaction",
          "commit",
          `Failed to commit ${colors.yellow(this.id)}: ${describe(error)}`,
        );
        triggerTransactionEvent("rolledBack", this);
        throw error;
      }

      this._state = "committed";
      triggerTransactionEvent("committed", this);
      return;
    }

    if (this.failure) {
      log.warn(
        "transaction",
        "rollback",
        `Rolling back ${colors.yellow(this.id)}: ${describe(this.failure.error)}`,
      );
    }

    try {
      await this.rollbackPhysical();
    } finally {
      this._state = "rolledBack";
      triggerTransactionEvent("rolledBack", this);
    }
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
