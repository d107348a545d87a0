import { AsyncLocalStorage } from "async_hooks";
import { ScopeNestingError } from "../errors/scope-nesting.error";
import { TransactionContextLostError } from "../errors/transaction-context-lost.error";
import type { AmbientTransaction } from "../transaction/ambient-transaction";
import type { TransactionScope } from "../transaction/transaction-scope";

type AmbientScopeFrame = {
  readonly scope: TransactionScope;
  readonly parent?: AmbientScopeFrame;
  /**
   * Whether the scope was popped; continuations that captured it skip it
   */
  released: boolean;
  /**
   * True while the code that pushed the scope is still running without
   * having suspended. Non-flowing scopes are only reachable inside it.
   */
  synchronousRegion: boolean;
};

type AmbientScopeStore = {
  readonly frame?: AmbientScopeFrame;
};

type CurrentOptions = {
  /**
   * The caller is about to suspend while using the transaction
   */
  suspending?: boolean;
};

/**
 * Ambient Scope Context
 *
 * Keeps the stack of ambient transaction scopes of each logical flow using
 * AsyncLocalStorage. Frames are immutable links, so concurrent flows forked
 * from the same parent never see each other's scopes.
 */
class AmbientScopeContext {
  private readonly storage = new AsyncLocalStorage<AmbientScopeStore>();

  /**
   * Get the innermost active scope of the calling flow
   */
  public currentScope(): TransactionScope | undefined {
    return this.innermostFrame()?.scope;
  }

  /**
   * Get the innermost ambient transaction of the calling flow
   *
   * Returns `undefined` outside any scope and inside a `suppress` scope.
   *
   * @throws TransactionContextLostError when the innermost scope does not flow
   * across asynchronous continuations and the caller resumed after it
   * suspended, or is about to suspend
   */
  public current(options: CurrentOptions = {}): AmbientTransaction | undefined {
    const frame = this.innermostFrame();

    if (!frame?.scope.transaction) {
      return undefined;
    }

    if (!frame.scope.asyncFlow) {
      if (options.suspending) {
        throw new TransactionContextLostError(
          frame.scope.id,
          `Transaction scope "${frame.scope.id}" does not flow across asynchronous continuations; enable asyncFlow to execute asynchronously inside it.`,
        );
      }

      if (!frame.synchronousRegion) {
        throw new TransactionContextLostError(frame.scope.id);
      }
    }

    return frame.scope.transaction;
  }

  /**
   * Number of active scopes in the calling flow
   */
  public depth(): number {
    let depth = 0;

    for (let frame = this.innermostFrame(); frame; frame = frame.parent) {
      if (!isReleased(frame)) {
        depth++;
      }
    }

    return depth;
  }

  /**
   * Push the scope for the rest of the calling flow
   *
   * Every push must be matched by exactly one `pop` of the same scope.
   */
  public push(scope: TransactionScope): void {
    const frame = this.createFrame(scope);

    // continuations of the caller are queued after this microtask
    queueMicrotask(() => {
      frame.synchronousRegion = false;
    });

    this.storage.enterWith({ frame });
  }

  /**
   * Pop the scope, which must be the innermost one of the calling flow
   *
   * @throws ScopeNestingError when scopes are released out of order
   */
  public pop(scope: TransactionScope): void {
    // frames released by continuations that outlived this flow are skipped
    const frame = this.innermostFrame();

    if (!frame || frame.scope !== scope) {
      throw new ScopeNestingError(
        `Transaction scope "${scope.id}" is not the innermost scope of this flow` +
          (frame ? ` ("${frame.scope.id}" is).` : "."),
      );
    }

    frame.released = true;
    this.storage.enterWith({ frame: frame.parent });
  }

  /**
   * Run the callback with the scope pushed
   */
  public run<T>(scope: TransactionScope, callback: () => T): T {
    const frame = this.createFrame(scope);

    return this.storage.run({ frame }, () => {
      try {
        return callback();
      } finally {
        frame.synchronousRegion = false;
      }
    });
  }

  private createFrame(scope: TransactionScope): AmbientScopeFrame {
    return {
      scope,
      parent: this.storage.getStore()?.frame,
      released: false,
      synchronousRegion: true,
    };
  }

  private innermostFrame(): AmbientScopeFrame | undefined {
    let frame = this.storage.getStore()?.frame;

    while (frame && isReleased(frame)) {
      frame = frame.parent;
    }

    return frame;
  }
}

function isReleased(frame: AmbientScopeFrame): boolean {
  return frame.released || frame.scope.isReleased;
}

export const ambientScopes = new AmbientScopeContext();
