/**
 * Error thrown when a statement is sent to an alias the client does not have.
 */
export class UnknownConnectionError extends Error {
  public readonly name = 'UnknownConnectionError';

  constructor(
    public readonly alias: string,
    public readonly knownAliases: string[]
  ) {
    super(
      `No connection registered under alias "${alias}". ` +
      `Known aliases: ${knownAliases.length > 0 ? knownAliases.join(', ') : '(none)'}.`
    );

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UnknownConnectionError);
    }
  }
}
