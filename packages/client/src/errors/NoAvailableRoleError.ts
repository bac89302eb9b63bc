import type { RoutingRole } from '@cypher-router/core';

/**
 * Error thrown when a connection is requested for a role that the last
 * successful discovery reported no servers for.
 */
export class NoAvailableRoleError extends Error {
  public readonly name = 'NoAvailableRoleError';

  constructor(public readonly role: RoutingRole) {
    super(`No ${role} servers available in the current routing table.`);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, NoAvailableRoleError);
    }
  }
}
