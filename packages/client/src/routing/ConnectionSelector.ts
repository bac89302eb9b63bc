import { aliasFor } from '@cypher-router/core';
import type { RoutingRole, RoutingTable } from '@cypher-router/core';
import { NoAvailableRoleError } from '../errors/NoAvailableRoleError';

/**
 * Picks a pool alias uniformly at random among the servers of one role.
 *
 * Holds no counter, so concurrent callers need no coordination. Bounds come
 * from the routing table the pool was built from.
 */
export class ConnectionSelector {
  constructor(
    /** Highest valid leader index, undefined when no leader was discovered */
    public readonly maxLeaderIndex: number | undefined,
    /** Highest valid follower index, undefined when no follower was discovered */
    public readonly maxFollowerIndex: number | undefined,
    private readonly random: () => number = Math.random
  ) {}

  static fromRoutingTable(table: RoutingTable, random?: () => number): ConnectionSelector {
    return new ConnectionSelector(
      maxIndex(table.getWithRole('LEADER').length),
      maxIndex(table.getWithRole('FOLLOWER').length),
      random
    );
  }

  /**
   * @throws NoAvailableRoleError if no leader was discovered
   */
  public pickWriteAlias(): string {
    return this.pick('LEADER', this.maxLeaderIndex);
  }

  /**
   * @throws NoAvailableRoleError if no follower was discovered
   */
  public pickReadAlias(): string {
    return this.pick('FOLLOWER', this.maxFollowerIndex);
  }

  private pick(role: RoutingRole, max: number | undefined): string {
    if (max === undefined) {
      throw new NoAvailableRoleError(role);
    }
    // random() may return values arbitrarily close to 1
    const index = Math.min(Math.floor(this.random() * (max + 1)), max);
    return aliasFor(role, index);
  }
}

function maxIndex(count: number): number | undefined {
  return count > 0 ? count - 1 : undefined;
}
