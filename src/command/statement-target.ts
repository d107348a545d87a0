import { Connection } from "../connection/connection";
import { ambientScopes } from "../context/ambient-scope-context";
import {
  isSynchronousConnection,
  type DatabaseClientContract,
  type PhysicalConnectionContract,
  type StatementResult,
  type SynchronousPhysicalConnectionContract,
} from "../contracts/database-client.contract";
import { ConnectionInUseError } from "../errors/connection-in-use.error";
import { ConnectionMismatchError } from "../errors/connection-mismatch.error";
import { UnsupportedOperationError } from "../errors/unsupported-operation.error";
import type { AmbientTransaction } from "../transaction/ambient-transaction";
import type { ExplicitTransaction } from "../transaction/explicit-transaction";
import type { TransactionContext } from "../transaction/transaction-context";

/**
 * What a command or batch was given to run on
 */
export type StatementBinding = {
  connection?: Connection;
  transaction?: ExplicitTransaction;
  /**
   * Client of an owned connection
   *
   * @default the configured `client`
   */
  client?: DatabaseClientContract;
  /**
   * Connection string of an owned connection
   *
   * @default the configured `connectionString`
   */
  connectionString?: string;
};

/**
 * Where statements run and which transaction they take part in
 */
export class StatementTarget {
  private constructor(
    public readonly connection: Connection,
    public transaction: TransactionContext | undefined,
    /**
     * Opened for this target and closed by `dispose`
     */
    public readonly owned: boolean,
    private readonly ambient: AmbientTransaction | undefined,
  ) {}

  /**
   * Resolve the binding against the ambient scope of the calling flow.
   *
   * Nothing is opened or enlisted yet.
   *
   * @throws TransactionContextLostError when the ambient scope cannot be used
   * @throws ConnectionInUseError when the connection is bound to another transaction
   */
  public static resolve(binding: StatementBinding, suspending: boolean): StatementTarget {
    assertBindingMatches(binding);

    if (binding.transaction) {
      binding.transaction.assertUsable();

      return new StatementTarget(
        binding.transaction.connection,
        binding.transaction,
        false,
        undefined,
      );
    }

    const connection = binding.connection;

    if (!connection) {
      return new StatementTarget(
        new Connection({ client: binding.client, connectionString: binding.connectionString }),
        undefined,
        true,
        ambientScopes.current({ suspending }),
      );
    }

    const ambient = connection.enlist ? ambientScopes.current({ suspending }) : undefined;
    const bound = connection.transaction;

    if (bound && (bound.kind === "explicit" || bound !== ambient)) {
      throw new ConnectionInUseError(connection.id, bound.id);
    }

    return new StatementTarget(connection, bound, false, ambient);
  }

  /**
   * Open an owned connection, or enlist a caller connection in the ambient
   * transaction
   */
  public async prepare(): Promise<void> {
    if (this.owned) {
      await this.connection.open();
      this.transaction = this.connection.transaction;
      return;
    }

    if (!this.transaction && this.ambient) {
      await this.connection.enlistIn(this.ambient);
      this.transaction = this.ambient;
    }
  }

  public prepareSync(): void {
    if (this.owned) {
      this.connection.openSync();
      this.transaction = this.connection.transaction;
      return;
    }

    if (!this.transaction && this.ambient) {
      this.connection.enlistInSync(this.ambient);
      this.transaction = this.ambient;
    }
  }

  public get synchronousPhysical(): SynchronousPhysicalConnectionContract {
    const physical = this.connection.physicalConnection;

    if (!isSynchronousConnection(physical)) {
      throw new UnsupportedOperationError(this.connection.client.name, "synchronous execution");
    }

    return physical;
  }

  /**
   * Send a statement; a failure is recorded on the transaction
   */
  public send(
    run: (physical: SynchronousPhysicalConnectionContract) => StatementResult,
  ): StatementResult {
    const physical = this.synchronousPhysical;

    this.transaction?.assertUsable();

    try {
      return run(physical);
    } catch (error) {
      this.transaction?.markFailed(error);
      throw error;
    }
  }

  public async sendAsync(
    run: (physical: PhysicalConnectionContract) => Promise<StatementResult>,
  ): Promise<StatementResult> {
    const physical = this.connection.physicalConnection;

    this.transaction?.assertUsable();

    try {
      return await run(physical);
    } catch (error) {
      this.transaction?.markFailed(error);
      throw error;
    }
  }

  /**
   * Close an owned connection
   */
  public async dispose(): Promise<void> {
    if (this.owned) {
      await this.connection.close();
    }
  }

  public disposeSync(): void {
    if (this.owned) {
      this.connection.closeSync();
    }
  }
}

/**
 * @throws ConnectionMismatchError when the transaction belongs to another connection
 */
export function assertBindingMatches(binding: StatementBinding): void {
  if (
    binding.transaction &&
    binding.connection &&
    binding.transaction.connection.id !== binding.connection.id
  ) {
    throw new ConnectionMismatchError(binding.connection.id, binding.transaction.connection.id);
  }
}
