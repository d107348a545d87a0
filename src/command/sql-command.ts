import type { Connection } from "../connection/connection";
import type { CompiledStatement } from "../contracts/database-client.contract";
import type { ExplicitTransaction } from "../transaction/explicit-transaction";
import type { StatementParameters } from "../types";
import type { ResultShape } from "./result-shapes";
import { compileStatement } from "./statement-compiler";
import { assertBindingMatches, StatementTarget, type StatementBinding } from "./statement-target";

export type SqlCommandOptions<TResult> = StatementBinding & {
  /**
   * Statement text with `@name` placeholders
   */
  statement: string;
  shape: ResultShape<TResult>;
};

/**
 * A parameterized statement with a fixed result shape.
 *
 * Without a connection every execution opens its own connection, enlists it
 * in the ambient transaction and closes it afterwards.
 *
 * @example
 * ```typescript
 * const insertRate = new SqlCommand<{ code: string; rate: number }, number>({
 *   statement: "INSERT INTO rates (code, rate) VALUES (@code, @rate)",
 *   shape: ResultShapes.rowsAffected(),
 * });
 *
 * await transactionScope((scope) => {
 *   insertRate.execute({ code: "GBP", rate: 0.63 });
 *   scope.complete();
 * });
 * ```
 */
export class SqlCommand<TParams extends StatementParameters, TResult> {
  public readonly statement: string;

  public readonly shape: ResultShape<TResult>;

  private readonly binding: StatementBinding;

  /**
   * @throws ConnectionMismatchError when the transaction belongs to another connection
   */
  public constructor(options: SqlCommandOptions<TResult>) {
    assertBindingMatches(options);

    this.statement = options.statement;
    this.shape = options.shape;
    this.binding = {
      connection: options.connection ?? options.transaction?.connection,
      transaction: options.transaction,
      client: options.client,
      connectionString: options.connectionString,
    };
  }

  public get connection(): Connection | undefined {
    return this.binding.connection;
  }

  public get transaction(): ExplicitTransaction | undefined {
    return this.binding.transaction;
  }

  /**
   * Execute without suspending; needs a synchronous client
   */
  public execute(params: TParams): TResult {
    const target = StatementTarget.resolve(this.binding, false);
    const statement = this.compile(target, params);

    target.prepareSync();

    try {
      return this.shape.read(target.send((physical) => physical.execute(statement)));
    } finally {
      target.disposeSync();
    }
  }

  /**
   * Execute asynchronously
   *
   * @throws TransactionContextLostError when the ambient scope does not flow
   * across asynchronous continuations
   */
  public async executeAsync(params: TParams): Promise<TResult> {
    const target = StatementTarget.resolve(this.binding, true);
    const statement = this.compile(target, params);

    await target.prepare();

    try {
      return this.shape.read(await target.sendAsync((physical) => physical.executeAsync(statement)));
    } finally {
      await target.dispose();
    }
  }

  private compile(target: StatementTarget, params: TParams): CompiledStatement {
    return compileStatement(this.statement, params, target.connection.client.dialect);
  }
}
