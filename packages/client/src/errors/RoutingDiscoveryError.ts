/**
 * Error thrown when the routing table cannot be fetched or understood.
 *
 * Covers transport failures of the discovery statement, empty responses,
 * records missing `servers` or `ttl`, and failures while building the pool
 * for the discovered servers. The previously published routing table, if
 * any, stays in place.
 */
export class RoutingDiscoveryError extends Error {
  public readonly name = 'RoutingDiscoveryError';

  constructor(
    message: string,
    public readonly database: string,
    cause?: unknown
  ) {
    super(`Routing discovery failed for database "${database}": ${message}`, { cause });

    // Maintains proper stack trace for where error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RoutingDiscoveryError);
    }
  }
}
