/**
 * Configuration types shared between the routing core and session adapters.
 */

// ============================================
// Connection Configuration
// ============================================

export interface ConnectionConfig {
  /**
   * Route statements across the cluster. Connections created for individual
   * cluster members always have this disabled.
   */
  autoRouting: boolean;
  /** Target database name (default: 'neo4j') */
  database: string;
}

export const DEFAULT_CONNECTION_CONFIG: ConnectionConfig = {
  autoRouting: false,
  database: 'neo4j',
};

// ============================================
// Auto Routing Configuration
// ============================================

export interface AutoRoutingConfig {
  /** Database whose routing table is requested (default: 'neo4j') */
  database: string;
  /** Discovery statement; receives `$context` and `$database` */
  discoveryQuery: string;
}

export const DEFAULT_DISCOVERY_QUERY = 'CALL dbms.routing.getRoutingTable($context, $database)';

export const DEFAULT_AUTO_ROUTING_CONFIG: AutoRoutingConfig = {
  database: 'neo4j',
  discoveryQuery: DEFAULT_DISCOVERY_QUERY,
};
