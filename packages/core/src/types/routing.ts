/**
 * Routing types for cluster-aware sessions.
 *
 * A RoutingTable is the snapshot returned by one discovery call. It is never
 * patched: a stale table is replaced by a new one built from the next
 * discovery response.
 */

// ============================================
// Roles
// ============================================

export type RoutingRole = 'LEADER' | 'FOLLOWER';

export const ROUTING_ROLES: readonly RoutingRole[] = ['LEADER', 'FOLLOWER'];

export function isRoutingRole(role: string): role is RoutingRole {
  return role === 'LEADER' || role === 'FOLLOWER';
}

/** Prefix of the pool alias for each role, e.g. `leader-0`. */
export const ROLE_ALIAS_PREFIX: Record<RoutingRole, string> = {
  LEADER: 'leader',
  FOLLOWER: 'follower',
};

export function aliasFor(role: RoutingRole, index: number): string {
  return `${ROLE_ALIAS_PREFIX[role]}-${index}`;
}

// ============================================
// Routing Table
// ============================================

export interface DiscoveredServer {
  addresses: string[];
  role: string;
}

export class RoutingTable {
  private readonly serversByRole: ReadonlyMap<RoutingRole, readonly string[]>;

  constructor(
    serversByRole: ReadonlyMap<RoutingRole, readonly string[]>,
    /** Absolute expiry, epoch milliseconds */
    public readonly expiresAt: number
  ) {
    const copy = new Map<RoutingRole, readonly string[]>();
    for (const [role, addresses] of serversByRole) {
      copy.set(role, Object.freeze([...addresses]));
    }
    this.serversByRole = copy;
    Object.freeze(this);
  }

  /**
   * Build a table from the `servers` field of a discovery record.
   * Entries whose role is neither LEADER nor FOLLOWER are dropped.
   */
  static fromDiscovery(servers: readonly DiscoveredServer[], expiresAt: number): RoutingTable {
    const byRole = new Map<RoutingRole, string[]>();

    for (const server of servers) {
      if (!isRoutingRole(server.role)) {
        continue;
      }
      const existing = byRole.get(server.role) ?? [];
      existing.push(...server.addresses);
      byRole.set(server.role, existing);
    }

    return new RoutingTable(byRole, expiresAt);
  }

  getWithRole(role: RoutingRole): readonly string[] {
    return this.serversByRole.get(role) ?? [];
  }

  isExpired(now: number): boolean {
    return now >= this.expiresAt;
  }

  toJSON(): { servers: Record<RoutingRole, string[]>; expiresAt: number } {
    return {
      servers: {
        LEADER: [...this.getWithRole('LEADER')],
        FOLLOWER: [...this.getWithRole('FOLLOWER')],
      },
      expiresAt: this.expiresAt,
    };
  }
}
