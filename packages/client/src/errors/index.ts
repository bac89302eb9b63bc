export { RoutingDiscoveryError } from './RoutingDiscoveryError';
export { NoAvailableRoleError } from './NoAvailableRoleError';
export { ResultWeaveError } from './ResultWeaveError';
export { UnknownConnectionError } from './UnknownConnectionError';
