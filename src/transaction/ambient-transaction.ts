import { colors } from "@mongez/copper";
import { log } from "@warlock.js/logger";
import type { Connection } from "../connection/connection";
import type {
  DatabaseClientContract,
  PhysicalConnectionContract,
  PhysicalTransactionContract,
  SynchronousPhysicalConnectionContract,
} from "../contracts/database-client.contract";
import { InvalidStateError } from "../errors/invalid-state.error";
import { UnexpectedDistributedTransactionError } from "../errors/unexpected-distributed-transaction.error";
import { triggerTransactionEvent } from "../events/transaction-events";
import type { EscalationPolicy } from "../types";
import { TransactionContext, type TransactionContextOptions } from "./transaction-context";

export type AmbientTransactionOptions = TransactionContextOptions & {
  escalationPolicy: EscalationPolicy;
};

/**
 * A physical connection enlisted in an ambient transaction.
 *
 * The transaction keeps the physical connection until it finishes, even
 * after the handle that opened it is closed.
 */
export class Enlistment {
  /**
   * Open handle currently using the physical connection
   */
  public handle?: Connection;

  public constructor(
    public readonly transaction: AmbientTransaction,
    public readonly client: DatabaseClientContract,
    public readonly connectionString: string,
    public readonly physical: PhysicalConnectionContract,
    public readonly physicalTransaction: PhysicalTransactionContract,
  ) {}

  public get isOpen(): boolean {
    return this.handle !== undefined;
  }
}

/**
 * Transaction discovered from the ambient scope stack.
 *
 * Physical connections join it lazily when they are opened (or first used)
 * inside the scope. Once two enlisted physical connections are open at the
 * same time the transaction is distributed.
 */
export class AmbientTransaction extends TransactionContext {
  public readonly kind = "ambient" as const;

  public readonly escalationPolicy: EscalationPolicy;

  private readonly enlistments: Enlistment[] = [];

  private distributed = false;

  public constructor(options: AmbientTransactionOptions) {
    super(options);
    this.escalationPolicy = options.escalationPolicy;
  }

  public get isDistributed(): boolean {
    return this.distributed;
  }

  /**
   * Find a closed enlistment the connection can take over without opening a
   * new physical connection
   */
  public reusableEnlistment(connection: Connection): Enlistment | undefined {
    return this.enlistments.find(
      (enlistment) =>
        !enlistment.isOpen &&
        enlistment.client === connection.client &&
        enlistment.connectionString === connection.connectionString,
    );
  }

  /**
   * Hand a closed enlistment to a newly opened handle
   */
  public attach(enlistment: Enlistment, connection: Connection): void {
    this.assertUsable();
    this.detectEscalation(connection);
    enlistment.handle = connection;
  }

  /**
   * Begin the transaction on a physical connection and enlist it
   */
  public async enlist(
    connection: Connection,
    physical: PhysicalConnectionContract,
  ): Promise<Enlistment> {
    this.assertUsable();

    const physicalTransaction = await physical.beginTransaction(this.isolationLevel);

    if (!this.isActive) {
      await physicalTransaction.rollback();
      throw new InvalidStateError(`Transaction "${this.id}" finished while enlisting.`);
    }

    try {
      return this.register(connection, physical, physicalTransaction);
    } catch (error) {
      await physicalTransaction.rollback();
      throw error;
    }
  }

  public enlistSync(
    connection: Connection,
    physical: SynchronousPhysicalConnectionContract,
  ): Enlistment {
    this.assertUsable();

    const physicalTransaction = physical.beginTransactionSync(this.isolationLevel);

    try {
      return this.register(connection, physical, physicalTransaction);
    } catch (error) {
      physicalTransaction.rollbackSync();
      throw error;
    }
  }

  /**
   * Called when the handle using the enlistment closes
   */
  public detach(enlistment: Enlistment): void {
    enlistment.handle = undefined;
  }

  protected async commitPhysical(): Promise<void> {
    if (this.distributed) {
      log.warn(
        "transaction",
        "commit",
        `Committing distributed transaction ${colors.yellow(this.id)} across ${this.enlistments.length} connections without a coordinator`,
      );
    }

    let index = 0;

    try {
      for (; index < this.enlistments.length; index++) {
        await this.enlistments[index].physicalTransaction.commit();
      }
    } catch (error) {
      await this.rollbackEnlistments(this.enlistments.slice(index + 1));
      await this.releaseEnlistments();
      throw error;
    }

    await this.releaseEnlistments();
  }

  protected async rollbackPhysical(): Promise<void> {
    const failure = await this.rollbackEnlistments(this.enlistments);

    await this.releaseEnlistments();

    if (failure) {
      throw failure.error;
    }
  }

  private register(
    connection: Connection,
    physical: PhysicalConnectionContract,
    physicalTransaction: PhysicalTransactionContract,
  ): Enlistment {
    this.detectEscalation(connection);

    const enlistment = new Enlistment(
      this,
      connection.client,
      connection.connectionString,
      physical,
      physicalTransaction,
    );

    enlistment.handle = connection;
    this.enlistments.push(enlistment);

    triggerTransactionEvent("enlisted", this, connection);

    return enlistment;
  }

  /**
   * Runs before a physical connection becomes open inside the transaction
   */
  private detectEscalation(connection: Connection): void {
    if (!this.enlistments.some((enlistment) => enlistment.isOpen)) {
      return;
    }

    if (!this.distributed) {
      this.distributed = true;

      log.warn(
        "transaction",
        "escalation",
        `Transaction ${colors.yellow(this.id)} escalated to distributed: ${colors.bold(connection.id)} opened while another enlisted connection is open`,
      );

      triggerTransactionEvent("escalated", this, connection);
    }

    if (this.escalationPolicy === "reject") {
      const error = new UnexpectedDistributedTransactionError(this.id);
      this.markFailed(error);
      throw error;
    }
  }

  private async rollbackEnlistments(
    enlistments: Enlistment[],
  ): Promise<{ error: unknown } | undefined> {
    let failure: { error: unknown } | undefined;

    for (const enlistment of enlistments) {
      try {
        await enlistment.physicalTransaction.rollback();
      } catch (error) {
        log.error(
          "transaction",
          "rollback",
          `Failed to roll back ${colors.yellow(this.id)} on ${enlistment.physical.id}: ${error}`,
        );
        failure ??= { error };
      }
    }

    return failure;
  }

  private async releaseEnlistments(): Promise<void> {
    for (const enlistment of this.enlistments) {
      if (enlistment.handle) {
        enlistment.handle.detachEnlistment(enlistment);
        enlistment.handle = undefined;
      } else {
        await enlistment.physical.close();
      }
    }
  }
}
