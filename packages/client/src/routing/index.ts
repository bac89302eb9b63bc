/**
 * Routing module exports
 */

export { classifyStatements, isWriteStatement, WRITE_KEYWORDS } from './StatementClassifier';
export type { ClassifiedStatements, IndexedStatements } from './StatementClassifier';

export { ConnectionSelector } from './ConnectionSelector';

export { weaveResults } from './ResultWeaver';

export { RoutingState, VALID_ROUTING_TRANSITIONS, isValidRoutingTransition } from './RoutingState';

export { TopologyManager } from './TopologyManager';
export type {
  TopologySnapshot,
  TopologyState,
  TopologyStats,
  TopologyManagerEvents,
  TopologyManagerOptions,
  RoutingStateChangeEvent,
} from './TopologyManager';
