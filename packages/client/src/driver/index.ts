/**
 * neo4j-driver adapter exports
 */

export { Neo4jClientBuilder, toDirectTarget, DIRECT_SCHEMES } from './Neo4jClientBuilder';
export type { Neo4jClientBuilderOptions, DriverFactory, DirectTarget } from './Neo4jClientBuilder';

export { DriverClient } from './DriverClient';
export { DirectSession } from './DirectSession';
export { DriverTransaction } from './DriverTransaction';
