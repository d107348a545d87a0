import type { Connection } from "../connection/connection";
import type { PhysicalTransactionContract } from "../contracts/database-client.contract";
import { TransactionContext, type TransactionContextOptions } from "./transaction-context";

/**
 * Transaction bound to exactly one connection.
 *
 * Created by `connection.beginTransaction()`; pass it to every command that
 * takes part in the unit of work together with the same connection.
 */
export class ExplicitTransaction extends TransactionContext {
  public readonly kind = "explicit" as const;

  public constructor(
    public readonly connection: Connection,
    public readonly physicalTransaction: PhysicalTransactionContract,
    options: TransactionContextOptions,
  ) {
    super(options);
  }

  /**
   * A single connection never escalates
   */
  public get isDistributed(): boolean {
    return false;
  }

  /**
   * Complete and commit right away
   */
  public async commit(): Promise<void> {
    this.complete();
    await this.release();
  }

  /**
   * Roll back right away, even if `complete()` was called
   */
  public async rollback(): Promise<void> {
    this.assertActive();
    this.completionRequested = false;
    await this.release();
  }

  protected async commitPhysical(): Promise<void> {
    try {
      await this.physicalTransaction.commit();
    } finally {
      this.connection.unbindTransaction(this);
    }
  }

  protected async rollbackPhysical(): Promise<void> {
    try {
      await this.physicalTransaction.rollback();
    } finally {
      this.connection.unbindTransaction(this);
    }
  }
}
