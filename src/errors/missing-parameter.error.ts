/**
 * Error thrown when a statement references a parameter that was not supplied.
 */
export class MissingParameterError extends Error {
  /**
   * The name of the missing parameter, without the `@` prefix.
   */
  public readonly parameterName: string;

  public constructor(parameterName: string) {
    super(`No value supplied for parameter "@${parameterName}".`);
    this.name = "MissingParameterError";
    this.parameterName = parameterName;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MissingParameterError);
    }
  }
}
