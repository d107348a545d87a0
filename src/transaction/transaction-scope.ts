import { Random } from "@mongez/reinforcements";
import { log } from "@warlock.js/logger";
import { getTransactionConfig } from "../config";
import type { Connection } from "../connection/connection";
import { ambientScopes } from "../context/ambient-scope-context";
import { InvalidStateError } from "../errors/invalid-state.error";
import { ScopeNestingError } from "../errors/scope-nesting.error";
import type { EscalationPolicy, IsolationLevel, TransactionScopeOption } from "../types";
import { AmbientTransaction } from "./ambient-transaction";
import type { ExplicitTransaction } from "./explicit-transaction";

export type TransactionScopeOptions = {
  /**
   * @default "required"
   */
  option?: TransactionScopeOption;
  /**
   * Isolation level of a new transaction; a joined transaction must match it
   *
   * @default the configured `ambientIsolationLevel`
   */
  isolationLevel?: IsolationLevel;
  /**
   * Whether the scope stays reachable after the flow suspends
   *
   * @default the configured `asyncFlow`
   */
  asyncFlow?: boolean;
  /**
   * @default the configured `escalationPolicy`
   */
  escalationPolicy?: EscalationPolicy;
  signal?: AbortSignal;
};

export type ExplicitTransactionOptions = {
  isolationLevel?: IsolationLevel;
  signal?: AbortSignal;
};

/**
 * One frame of the ambient stack.
 *
 * A scope either owns its transaction, joins the transaction of the scope
 * around it, or suppresses the ambient transaction altogether.
 */
export class TransactionScope {
  public readonly id = `scope-${Random.id()}`;

  private completed = false;

  private released = false;

  private releasing?: Promise<void>;

  private constructor(
    public readonly option: TransactionScopeOption,
    public readonly asyncFlow: boolean,
    public readonly transaction: AmbientTransaction | undefined,
    public readonly ownsTransaction: boolean,
  ) {}

  /**
   * Create a scope without pushing it
   *
   * @throws InvalidStateError when a joined transaction has another isolation level
   */
  public static create(options: TransactionScopeOptions = {}): TransactionScope {
    const option = options.option ?? "required";
    const asyncFlow = options.asyncFlow ?? getTransactionConfig("asyncFlow");

    if (option === "suppress") {
      return new TransactionScope(option, asyncFlow, undefined, false);
    }

    if (option === "required") {
      const outer = ambientScopes.current();

      if (outer) {
        if (options.isolationLevel && options.isolationLevel !== outer.isolationLevel) {
          throw new InvalidStateError(
            `Cannot join transaction "${outer.id}" (${outer.isolationLevel}) with isolation level ${options.isolationLevel}.`,
          );
        }

        return new TransactionScope(option, asyncFlow, outer, false);
      }
    }

    const transaction = new AmbientTransaction({
      isolationLevel: options.isolationLevel ?? getTransactionConfig("ambientIsolationLevel"),
      escalationPolicy: options.escalationPolicy ?? getTransactionConfig("escalationPolicy"),
      signal: options.signal,
    });

    return new TransactionScope(option, asyncFlow, transaction, true);
  }

  public get isCompleted(): boolean {
    return this.completed;
  }

  public get isReleased(): boolean {
    return this.released;
  }

  public get isDistributed(): boolean {
    return this.transaction?.isDistributed ?? false;
  }

  /**
   * Vote to commit.
   *
   * A joined scope only records its own vote; the owning scope decides.
   */
  public complete(): void {
    if (this.released) {
      throw new InvalidStateError(`Transaction scope "${this.id}" is already released.`);
    }

    if (this.completed) {
      throw new InvalidStateError(`Transaction scope "${this.id}" is already completed.`);
    }

    if (this.transaction) {
      if (this.ownsTransaction) {
        this.transaction.complete();
      } else {
        this.transaction.assertCompletable();
      }
    }

    this.completed = true;
  }

  public ensureNotDistributed(): void {
    this.transaction?.ensureNotDistributed();
  }

  /**
   * Pop the scope (when it was pushed) and finish what it owns
   */
  public release(): Promise<void> {
    if (!this.releasing) {
      this.releasing = this.finish(true);
    }

    return this.releasing;
  }

  /**
   * Finish a scope that ran through `ambientScopes.run`
   *
   * @internal
   */
  public releaseRun(): Promise<void> {
    if (!this.releasing) {
      this.releasing = this.finish(false);
    }

    return this.releasing;
  }

  private async finish(pushed: boolean): Promise<void> {
    let nestingError: ScopeNestingError | undefined;

    if (pushed) {
      try {
        ambientScopes.pop(this);
      } catch (error) {
        if (!(error instanceof ScopeNestingError)) {
          throw error;
        }

        nestingError = error;
        log.error("transaction", "scope", error.message);
        this.transaction?.markFailed(error);
      }
    }

    this.released = true;

    if (this.transaction && !this.ownsTransaction && !this.completed) {
      this.transaction.markFailed(
        new InvalidStateError(
          `Nested transaction scope "${this.id}" was released without being completed.`,
        ),
      );
    }

    if (this.transaction && this.ownsTransaction) {
      await this.transaction.release();
    }

    if (nestingError) {
      throw nestingError;
    }
  }
}

/**
 * Create an ambient scope and push it for the rest of the calling flow.
 *
 * @example
 * ```typescript
 * const scope = beginAmbient();
 *
 * try {
 *   insertRate.execute({ code: "GBP", rate: 0.63 });
 *   scope.complete();
 * } finally {
 *   await scope.release();
 * }
 * ```
 */
export function beginAmbient(options: TransactionScopeOptions = {}): TransactionScope {
  const scope = TransactionScope.create(options);

  ambientScopes.push(scope);

  return scope;
}

/**
 * Run the body inside a new ambient scope and release it on every exit path
 */
export async function transactionScope<T>(
  body: (scope: TransactionScope) => T | Promise<T>,
  options: TransactionScopeOptions = {},
): Promise<T> {
  const scope = TransactionScope.create(options);

  return releaseAfter(
    scope.id,
    () => ambientScopes.run(scope, () => body(scope)),
    () => scope.releaseRun(),
  );
}

/**
 * Begin an explicit transaction on an open connection
 */
export function beginExplicit(
  connection: Connection,
  options: ExplicitTransactionOptions = {},
): Promise<ExplicitTransaction> {
  return connection.beginTransaction(
    options.isolationLevel ?? getTransactionConfig("isolationLevel"),
    { signal: options.signal },
  );
}

/**
 * Run the body inside an explicit transaction and release it on every exit path
 *
 * @example
 * ```typescript
 * const inserted = await withTransaction(connection, async (transaction) => {
 *   const insertRate = new SqlCommand({
 *     statement: "INSERT INTO rates (code, rate) VALUES (@code, @rate)",
 *     shape: ResultShapes.rowsAffected(),
 *     transaction,
 *   });
 *
 *   const count = await insertRate.executeAsync({ code: "GBP", rate: 0.63 });
 *   transaction.complete();
 *
 *   return count;
 * });
 * ```
 */
export async function withTransaction<T>(
  connection: Connection,
  body: (transaction: ExplicitTransaction) => T | Promise<T>,
  options: ExplicitTransactionOptions = {},
): Promise<T> {
  const transaction = await beginExplicit(connection, options);

  return releaseAfter(
    transaction.id,
    () => body(transaction),
    () => transaction.release(),
  );
}

/**
 * Run the body, then release.
 *
 * When the body throws, its error is the one rethrown; a release failure is
 * only logged.
 */
async function releaseAfter<T>(
  id: string,
  body: () => T | Promise<T>,
  release: () => Promise<void>,
): Promise<T> {
  let result: T;

  try {
    result = await body();
  } catch (error) {
    try {
      await release();
    } catch (releaseError) {
      log.error("transaction", "release", `Failed to release ${id}: ${releaseError}`);
    }

    throw error;
  }

  await release();

  return result;
}
