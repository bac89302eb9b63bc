/**
 * Error thrown when per-connection results cannot be put back into the
 * caller's statement order, i.e. a connection returned a different number of
 * results than statements it was sent.
 */
export class ResultWeaveError extends Error {
  public readonly name = 'ResultWeaveError';

  constructor(
    public readonly expected: number,
    public readonly received: number
  ) {
    super(`Expected ${expected} results, received ${received}.`);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ResultWeaveError);
    }
  }
}
