export { createStatement } from './types/statement';
export type { Statement, StatementParameters, ResultRecord, StatementResult } from './types/statement';

export { RoutingTable, ROUTING_ROLES, ROLE_ALIAS_PREFIX, isRoutingRole, aliasFor } from './types/routing';
export type { RoutingRole, DiscoveredServer } from './types/routing';

export {
  DEFAULT_CONNECTION_CONFIG,
  DEFAULT_AUTO_ROUTING_CONFIG,
  DEFAULT_DISCOVERY_QUERY,
} from './types/config';
export type { ConnectionConfig, AutoRoutingConfig } from './types/config';

export { parseUrl, formatUrl, rebuildUrl } from './url';
export type { UrlComponents } from './url';

export * from './schemas';
