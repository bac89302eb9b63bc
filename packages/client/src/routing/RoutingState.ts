/**
 * Lifecycle states of a routed session's topology cache.
 */
export enum RoutingState {
  /** No discovery has succeeded yet */
  UNINITIALIZED = 'UNINITIALIZED',
  /** A routing table and its connection pool are published */
  READY = 'READY',
  /** The last refresh failed; the previous table and pool are still published */
  STALE_REFRESH_FAILED = 'STALE_REFRESH_FAILED',
}

/**
 * Valid state transitions. A failed first discovery leaves the state at
 * UNINITIALIZED, so it has no transition of its own.
 */
export const VALID_ROUTING_TRANSITIONS: Record<RoutingState, RoutingState[]> = {
  [RoutingState.UNINITIALIZED]: [RoutingState.READY],
  [RoutingState.READY]: [RoutingState.READY, RoutingState.STALE_REFRESH_FAILED],
  [RoutingState.STALE_REFRESH_FAILED]: [RoutingState.READY, RoutingState.STALE_REFRESH_FAILED],
};

export function isValidRoutingTransition(from: RoutingState, to: RoutingState): boolean {
  return VALID_ROUTING_TRANSITIONS[from].includes(to);
}
