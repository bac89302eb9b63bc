import { AutoRoutedSession } from './AutoRoutedSession';
import {
  TopologyManager,
  ConnectionSelector,
  RoutingState,
  classifyStatements,
  isWriteStatement,
  weaveResults,
  WRITE_KEYWORDS,
} from './routing';
import { Neo4jClientBuilder, DriverClient, DirectSession, DriverTransaction, toDirectTarget } from './driver';
import {
  RoutingDiscoveryError,
  NoAvailableRoleError,
  ResultWeaveError,
  UnknownConnectionError,
} from './errors';

// Type imports
import type { AutoRoutedSessionConfig } from './AutoRoutedSession';
import type { Session, Transaction, AliasedClient, ClientBuilder } from './types';
import type {
  TopologySnapshot,
  TopologyState,
  TopologyStats,
  TopologyManagerEvents,
  TopologyManagerOptions,
  RoutingStateChangeEvent,
  ClassifiedStatements,
  IndexedStatements,
} from './routing';
import type { Neo4jClientBuilderOptions, DriverFactory, DirectTarget } from './driver';

// Value exports
export { AutoRoutedSession, TopologyManager, ConnectionSelector, RoutingState };
export { classifyStatements, isWriteStatement, weaveResults, WRITE_KEYWORDS };
export { Neo4jClientBuilder, DriverClient, DirectSession, DriverTransaction, toDirectTarget };
export { RoutingDiscoveryError, NoAvailableRoleError, ResultWeaveError, UnknownConnectionError };
export { logger } from './utils/logger';

// Core re-exports
export { createStatement, RoutingTable, parseUrl, rebuildUrl } from '@cypher-router/core';
export type { Statement, StatementResult, ResultRecord, RoutingRole } from '@cypher-router/core';

// Type exports
export type {
  AutoRoutedSessionConfig,
  Session,
  Transaction,
  AliasedClient,
  ClientBuilder,
  TopologySnapshot,
  TopologyState,
  TopologyStats,
  TopologyManagerEvents,
  TopologyManagerOptions,
  RoutingStateChangeEvent,
  ClassifiedStatements,
  IndexedStatements,
  Neo4jClientBuilderOptions,
  DriverFactory,
  DirectTarget,
};
