import { Random } from "@mongez/reinforcements";
import { getTransactionConfig } from "../config";
import { ambientScopes } from "../context/ambient-scope-context";
import {
  isSynchronousClient,
  isSynchronousConnection,
  type DatabaseClientContract,
  type PhysicalConnectionContract,
  type SynchronousPhysicalConnectionContract,
} from "../contracts/database-client.contract";
import { ConnectionInUseError } from "../errors/connection-in-use.error";
import { InvalidStateError } from "../errors/invalid-state.error";
import { UnsupportedOperationError } from "../errors/unsupported-operation.error";
import type { AmbientTransaction, Enlistment } from "../transaction/ambient-transaction";
import { ExplicitTransaction } from "../transaction/explicit-transaction";
import type { TransactionContext } from "../transaction/transaction-context";
import type { IsolationLevel } from "../types";
import { parseConnectionString } from "./connection-string";

export type ConnectionOptions = {
  /**
   * Client opening the physical connection
   *
   * @default the configured `client`
   */
  client?: DatabaseClientContract;
  /**
   * Connection string; `Enlist=false` disables ambient auto-enlistment
   *
   * @default the configured `connectionString`
   */
  connectionString?: string;
};

export type BeginTransactionOptions = {
  signal?: AbortSignal;
};

/**
 * Handle owning a single physical connection to the store.
 *
 * Opening the handle inside an ambient transaction scope enlists it in the
 * scope's transaction, unless its connection string says `Enlist=false`.
 *
 * @example
 * ```typescript
 * await transactionScope(async (scope) => {
 *   const connection = new Connection({ client, connectionString });
 *   connection.openSync();
 *
 *   try {
 *     insertRate.execute({ code: "GBP", rate: 0.63 });
 *   } finally {
 *     connection.closeSync();
 *   }
 *
 *   scope.complete();
 * });
 * ```
 */
export class Connection {
  /**
   * Identity used to validate transaction bindings
   */
  public readonly id = `connection-${Random.id()}`;

  public readonly client: DatabaseClientContract;

  /**
   * Connection string as sent to the client, without the `Enlist` option
   */
  public readonly connectionString: string;

  /**
   * Whether the connection auto-enlists in ambient transactions
   */
  public readonly enlist: boolean;

  private physical?: PhysicalConnectionContract;

  private explicitTransaction?: ExplicitTransaction;

  private enlistment?: Enlistment;

  private busy = false;

  public constructor(options: ConnectionOptions = {}) {
    const client = options.client ?? getTransactionConfig("client");
    const connectionString = options.connectionString ?? getTransactionConfig("connectionString");

    if (!client) {
      throw new InvalidStateError("No client given and no default client configured.");
    }

    if (connectionString === undefined) {
      throw new InvalidStateError(
        "No connection string given and no default connection string configured.",
      );
    }

    const parsed = parseConnectionString(connectionString);

    this.client = client;
    this.connectionString = parsed.connectionString;
    this.enlist = parsed.enlist;
  }

  public get isOpen(): boolean {
    return this.physical !== undefined;
  }

  /**
   * Transaction the connection is currently bound to, if it is still active
   */
  public get transaction(): TransactionContext | undefined {
    if (this.explicitTransaction?.isActive) {
      return this.explicitTransaction;
    }

    if (this.enlistment?.transaction.isActive) {
      return this.enlistment.transaction;
    }

    return undefined;
  }

  /**
   * The physical connection
   *
   * @throws InvalidStateError if the connection is not open
   */
  public get physicalConnection(): PhysicalConnectionContract {
    if (!this.physical) {
      throw new InvalidStateError(`Connection "${this.id}" is not open.`);
    }

    return this.physical;
  }

  /**
   * Open the connection, enlisting it in the ambient transaction if any
   */
  public async open(): Promise<void> {
    this.assertClosed();

    const transaction = this.enlist ? ambientScopes.current() : undefined;

    if (transaction && this.reuseEnlistment(transaction)) {
      return;
    }

    this.busy = true;

    try {
      const physical = await this.client.connect(this.connectionString);

      if (transaction) {
        try {
          this.enlistment = await transaction.enlist(this, physical);
        } catch (error) {
          await physical.close();
          throw error;
        }
      }

      this.physical = physical;
    } finally {
      this.busy = false;
    }
  }

  /**
   * Open the connection without suspending; needs a synchronous client
   */
  public openSync(): void {
    this.assertClosed();

    const client = this.client;

    if (!isSynchronousClient(client)) {
      throw new UnsupportedOperationError(client.name, "synchronous connections");
    }

    const transaction = this.enlist ? ambientScopes.current() : undefined;

    if (transaction && this.reuseEnlistment(transaction)) {
      return;
    }

    const physical = client.connectSync(this.connectionString);

    if (transaction) {
      try {
        this.enlistment = transaction.enlistSync(this, physical);
      } catch (error) {
        physical.closeSync();
        throw error;
      }
    }

    this.physical = physical;
  }

  /**
   * Close the connection.
   *
   * A connection enlisted in an ambient transaction hands its physical
   * connection back to the transaction, which keeps it until it finishes.
   *
   * @throws InvalidStateError if an explicit transaction is still active
   */
  public async close(): Promise<void> {
    const physical = this.detach();

    if (physical) {
      await physical.close();
    }
  }

  public closeSync(): void {
    const physical = this.detach();

    if (!physical) {
      return;
    }

    if (!isSynchronousConnection(physical)) {
      throw new UnsupportedOperationError(this.client.name, "synchronous connections");
    }

    physical.closeSync();
  }

  /**
   * Begin an explicit transaction bound to this connection
   *
   * @throws InvalidStateError if the connection is not open
   * @throws ConnectionInUseError if the connection is already bound to a transaction
   */
  public async beginTransaction(
    isolationLevel: IsolationLevel = getTransactionConfig("isolationLevel"),
    options: BeginTransactionOptions = {},
  ): Promise<ExplicitTransaction> {
    const physical = this.physicalConnection;

    this.assertAvailable();

    this.busy = true;

    try {
      const physicalTransaction = await physical.beginTransaction(isolationLevel);

      this.explicitTransaction = new ExplicitTransaction(this, physicalTransaction, {
        isolationLevel,
        signal: options.signal,
      });

      return this.explicitTransaction;
    } finally {
      this.busy = false;
    }
  }

  /**
   * Enlist the already open connection in an ambient transaction
   *
   * @internal
   */
  public async enlistIn(transaction: AmbientTransaction): Promise<void> {
    const physical = this.physicalConnection;

    this.assertAvailable();

    this.enlistment = await transaction.enlist(this, physical);
  }

  /**
   * @internal
   */
  public enlistInSync(transaction: AmbientTransaction): void {
    const physical = this.physicalConnection;

    if (!isSynchronousConnection(physical)) {
      throw new UnsupportedOperationError(this.client.name, "synchronous execution");
    }

    this.assertAvailable();

    this.enlistment = transaction.enlistSync(this, physical);
  }

  /**
   * Called by a finishing ambient transaction; the handle keeps its physical
   * connection
   *
   * @internal
   */
  public detachEnlistment(enlistment: Enlistment): void {
    if (this.enlistment === enlistment) {
      this.enlistment = undefined;
    }
  }

  /**
   * Called by a finishing explicit transaction
   *
   * @internal
   */
  public unbindTransaction(transaction: ExplicitTransaction): void {
    if (this.explicitTransaction === transaction) {
      this.explicitTransaction = undefined;
    }
  }

  private reuseEnlistment(transaction: AmbientTransaction): boolean {
    const reusable = transaction.reusableEnlistment(this);

    if (!reusable) {
      return false;
    }

    transaction.attach(reusable, this);
    this.enlistment = reusable;
    this.physical = reusable.physical;

    return true;
  }

  private detach(): PhysicalConnectionContract | undefined {
    const physical = this.physical;

    if (!physical) {
      return undefined;
    }

    if (this.explicitTransaction?.isActive) {
      throw new InvalidStateError(
        `Connection "${this.id}" cannot close while transaction "${this.explicitTransaction.id}" is active.`,
      );
    }

    this.physical = undefined;
    this.explicitTransaction = undefined;

    if (this.enlistment) {
      const enlistment = this.enlistment;

      this.enlistment = undefined;

      if (enlistment.transaction.isActive) {
        enlistment.transaction.detach(enlistment);
        return undefined;
      }
    }

    return physical;
  }

  private assertClosed(): void {
    if (this.physical || this.busy) {
      throw new InvalidStateError(`Connection "${this.id}" is already open.`);
    }
  }

  private assertAvailable(): void {
    const bound = this.transaction;

    if (bound) {
      throw new ConnectionInUseError(this.id, bound.id);
    }

    if (this.busy) {
      throw new InvalidStateError(`Connection "${this.id}" is busy beginning a transaction.`);
    }
  }
}
