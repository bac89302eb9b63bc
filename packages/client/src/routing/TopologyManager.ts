/**
 * TopologyManager - Keeps a routing table and its connection pool fresh
 *
 * Features:
 * - Lazily discovers cluster topology on first use
 * - Refreshes when the routing table's TTL has passed
 * - Builds each new pool off to the side and publishes table + pool together
 * - Collapses concurrent refreshes into a single discovery call
 * - Keeps the previous table usable when a refresh fails
 */

import {
  RoutingTable,
  DEFAULT_AUTO_ROUTING_CONFIG,
  DEFAULT_CONNECTION_CONFIG,
  DiscoveryParametersSchema,
  DiscoveryRecordSchema,
  aliasFor,
  createStatement,
  parseUrl,
  rebuildUrl,
} from '@cypher-router/core';
import type {
  AutoRoutingConfig,
  ConnectionConfig,
  DiscoveryRecord,
  RoutingRole,
  StatementResult,
  UrlComponents,
} from '@cypher-router/core';
import type { AliasedClient, ClientBuilder, Session } from '../types';
import { ConnectionSelector } from './ConnectionSelector';
import { RoutingState, isValidRoutingTransition } from './RoutingState';
import { RoutingDiscoveryError } from '../errors/RoutingDiscoveryError';
import { logger } from '../utils/logger';

/**
 * A routing table, the pool built from it and the selector bounded by it.
 * All three come from the same discovery response.
 */
export interface TopologySnapshot {
  readonly table: RoutingTable;
  readonly client: AliasedClient;
  readonly selector: ConnectionSelector;
  /** Unix timestamp (ms) when the snapshot was published */
  readonly refreshedAt: number;
}

export type TopologyState =
  | { status: RoutingState.UNINITIALIZED }
  | { status: RoutingState.READY; snapshot: TopologySnapshot }
  | { status: RoutingState.STALE_REFRESH_FAILED; snapshot: TopologySnapshot; error: RoutingDiscoveryError };

export interface RoutingStateChangeEvent {
  from: RoutingState;
  to: RoutingState;
  /** Unix timestamp (ms) when the transition occurred */
  timestamp: number;
}

export interface TopologyManagerEvents {
  'routingTable:updated': (table: RoutingTable) => void;
  'routingTable:refreshFailed': (error: RoutingDiscoveryError) => void;
  'state:changed': (event: RoutingStateChangeEvent) => void;
}

export interface TopologyManagerOptions {
  /** Session to any reachable cluster member, used only for discovery */
  referenceSession: Session;
  /** Seed URL; supplies scheme and credentials for discovered addresses */
  baseUrl: UrlComponents | string;
  /** Returns an empty builder for each rebuilt pool */
  createClientBuilder: () => ClientBuilder;
  config?: Partial<AutoRoutingConfig>;
  /** Settings applied to every pooled connection; auto routing is always disabled */
  connectionConfig?: Partial<ConnectionConfig>;
  /** Random source for alias selection (default: Math.random) */
  random?: () => number;
}

export interface TopologyStats {
  state: RoutingState;
  leaders: number;
  followers: number;
  expiresAt: number | null;
  lastRefresh: number | null;
  refreshCount: number;
  failedRefreshCount: number;
  retiredPools: number;
}

export class TopologyManager {
  private readonly listeners: { [E in keyof TopologyManagerEvents]: Set<TopologyManagerEvents[E]> } = {
    'routingTable:updated': new Set(),
    'routingTable:refreshFailed': new Set(),
    'state:changed': new Set(),
  };
  private readonly referenceSession: Session;
  private readonly baseUrl: UrlComponents;
  private readonly createClientBuilder: () => ClientBuilder;
  private readonly config: AutoRoutingConfig;
  private readonly leafConfig: ConnectionConfig;
  private readonly random: () => number;

  private state: TopologyState = { status: RoutingState.UNINITIALIZED };
  private pendingRefresh: Promise<TopologySnapshot> | null = null;
  private invalidated: boolean = false;
  // Bumped by invalidate(); a refresh only clears invalidations issued before it started
  private invalidationGeneration: number = 0;
  private refreshCount: number = 0;
  private failedRefreshCount: number = 0;

  // Pools stay open while a dispatch or transaction still uses them
  private readonly inFlight: Map<AliasedClient, number> = new Map();
  private readonly retired: Set<AliasedClient> = new Set();

  constructor(options: TopologyManagerOptions) {
    this.referenceSession = options.referenceSession;
    this.baseUrl = typeof options.baseUrl === 'string' ? parseUrl(options.baseUrl) : options.baseUrl;
    this.createClientBuilder = options.createClientBuilder;
    this.config = {
      ...DEFAULT_AUTO_ROUTING_CONFIG,
      ...options.config,
    };
    this.leafConfig = {
      ...DEFAULT_CONNECTION_CONFIG,
      database: this.config.database,
      ...options.connectionConfig,
      autoRouting: false,
    };
    this.random = options.random ?? Math.random;
  }

  // ============================================
  // Event Methods
  // ============================================

  public on<E extends keyof TopologyManagerEvents>(event: E, listener: TopologyManagerEvents[E]): this {
    this.listeners[event].add(listener);
    return this;
  }

  public off<E extends keyof TopologyManagerEvents>(event: E, listener: TopologyManagerEvents[E]): this {
    this.listeners[event].delete(listener);
    return this;
  }

  /**
   * Subscribe to state transitions.
   * @returns An unsubscribe function
   */
  public onStateChange(listener: (event: RoutingStateChangeEvent) => void): () => void {
    this.on('state:changed', listener);
    return () => {
      this.off('state:changed', listener);
    };
  }

  private notify<E extends keyof TopologyManagerEvents>(
    event: E,
    invoke: (listener: TopologyManagerEvents[E]) => void
  ): void {
    for (const listener of this.listeners[event]) {
      try {
        invoke(listener);
      } catch (err) {
        logger.error({ event, err }, 'Error in topology listener');
      }
    }
  }

  // ============================================
  // Topology Access
  // ============================================

  public getState(): RoutingState {
    return this.state.status;
  }

  /**
   * Currently published routing table, or null before the first discovery.
   */
  public getRoutingTable(): RoutingTable | null {
    return this.state.status === RoutingState.UNINITIALIZED ? null : this.state.snapshot.table;
  }

  /**
   * Error of the last refresh, if it failed.
   */
  public getLastError(): RoutingDiscoveryError | null {
    return this.state.status === RoutingState.STALE_REFRESH_FAILED ? this.state.error : null;
  }

  /**
   * Make sure an unexpired routing table and matching pool are published.
   * Discovers topology when none exists or the table has expired.
   *
   * @throws RoutingDiscoveryError if a required refresh fails
   */
  public async ensureFresh(): Promise<TopologySnapshot> {
    const state = this.state;
    if (
      state.status === RoutingState.UNINITIALIZED ||
      this.invalidated ||
      state.snapshot.table.isExpired(Date.now())
    ) {
      return this.refresh();
    }

    if (state.status === RoutingState.STALE_REFRESH_FAILED) {
      // A forced refresh failed but the published table is still valid
      this.state = { status: RoutingState.READY, snapshot: state.snapshot };
      this.transition(RoutingState.STALE_REFRESH_FAILED, RoutingState.READY);
    }
    return state.snapshot;
  }

  /**
   * Force a discovery call. Concurrent callers share one in-flight refresh.
   */
  public refresh(): Promise<TopologySnapshot> {
    if (this.pendingRefresh) {
      return this.pendingRefresh;
    }

    const pending = this.doRefresh().finally(() => {
      this.pendingRefresh = null;
    });
    this.pendingRefresh = pending;
    return pending;
  }

  /**
   * Treat the current table as expired; the next call refreshes it.
   */
  public invalidate(): void {
    this.invalidated = true;
    this.invalidationGeneration++;
    logger.debug({ database: this.config.database }, 'Routing table invalidated');
  }

  /**
   * Fresh snapshot, held open until release() is called for it.
   */
  public async acquire(): Promise<TopologySnapshot> {
    const snapshot = await this.ensureFresh();
    this.inFlight.set(snapshot.client, (this.inFlight.get(snapshot.client) ?? 0) + 1);
    return snapshot;
  }

  public release(snapshot: TopologySnapshot): void {
    const count = (this.inFlight.get(snapshot.client) ?? 0) - 1;
    if (count > 0) {
      this.inFlight.set(snapshot.client, count);
      return;
    }

    this.inFlight.delete(snapshot.client);
    if (this.retired.delete(snapshot.client)) {
      this.closePool(snapshot.client);
    }
  }

  public getStats(): TopologyStats {
    const table = this.getRoutingTable();
    return {
      state: this.state.status,
      leaders: table?.getWithRole('LEADER').length ?? 0,
      followers: table?.getWithRole('FOLLOWER').length ?? 0,
      expiresAt: table?.expiresAt ?? null,
      lastRefresh: this.state.status === RoutingState.UNINITIALIZED ? null : this.state.snapshot.refreshedAt,
      refreshCount: this.refreshCount,
      failedRefreshCount: this.failedRefreshCount,
      retiredPools: this.retired.size,
    };
  }

  /**
   * Close the published pool and every retired one, and forget the table.
   */
  public async close(): Promise<void> {
    if (this.pendingRefresh) {
      await this.pendingRefresh.catch(err => {
        logger.debug({ err }, 'Pending refresh failed during close');
      });
    }

    const clients = [...this.retired];
    if (this.state.status !== RoutingState.UNINITIALIZED) {
      clients.push(this.state.snapshot.client);
    }

    this.state = { status: RoutingState.UNINITIALIZED };
    this.retired.clear();
    this.inFlight.clear();

    await Promise.all(clients.map(client => client.close()));
    logger.info({ database: this.config.database, pools: clients.length }, 'Topology closed');
  }

  // ============================================
  // Private Methods
  // ============================================

  private async doRefresh(): Promise<TopologySnapshot> {
    const database = this.config.database;
    const generation = this.invalidationGeneration;
    logger.debug({ database }, 'Refreshing routing table');

    let snapshot: TopologySnapshot;
    try {
      const record = await this.discover();
      snapshot = this.buildSnapshot(record);
    } catch (err) {
      const error = err instanceof RoutingDiscoveryError
        ? err
        : new RoutingDiscoveryError(errorMessage(err), database, err);
      this.recordFailure(error);
      throw error;
    }

    this.publish(snapshot, generation);
    return snapshot;
  }

  private async discover(): Promise<DiscoveryRecord> {
    const database = this.config.database;
    const parameters = DiscoveryParametersSchema.parse({ context: {}, database });
    const statement = createStatement(this.config.discoveryQuery, parameters);

    let results: StatementResult[];
    try {
      results = await this.referenceSession.run([statement]);
    } catch (err) {
      throw new RoutingDiscoveryError(`discovery statement failed: ${errorMessage(err)}`, database, err);
    }

    const first = results[0]?.[0];
    if (first === undefined) {
      throw new RoutingDiscoveryError('discovery returned no records', database);
    }

    const parsed = DiscoveryRecordSchema.safeParse(first);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new RoutingDiscoveryError(`malformed discovery record (${issues})`, database, parsed.error);
    }

    return parsed.data;
  }

  private buildSnapshot(record: DiscoveryRecord): TopologySnapshot {
    const now = Date.now();
    const table = RoutingTable.fromDiscovery(record.servers, now + record.ttl * 1000);

    let client: AliasedClient;
    try {
      const builder = this.createClientBuilder();
      this.addRole(builder, table, 'LEADER');
      this.addRole(builder, table, 'FOLLOWER');
      client = builder.build();
    } catch (err) {
      throw new RoutingDiscoveryError(
        `failed to build connection pool: ${errorMessage(err)}`,
        this.config.database,
        err
      );
    }

    return {
      table,
      client,
      selector: ConnectionSelector.fromRoutingTable(table, this.random),
      refreshedAt: now,
    };
  }

  private addRole(builder: ClientBuilder, table: RoutingTable, role: RoutingRole): void {
    table.getWithRole(role).forEach((address, index) => {
      builder.addConnection(aliasFor(role, index), rebuildUrl(this.baseUrl, address), this.leafConfig);
    });
  }

  private publish(snapshot: TopologySnapshot, generation: number): void {
    const previous = this.state;

    this.state = { status: RoutingState.READY, snapshot };
    if (generation === this.invalidationGeneration) {
      this.invalidated = false;
    }
    this.refreshCount++;

    if (previous.status !== RoutingState.UNINITIALIZED) {
      this.retire(previous.snapshot.client);
    }

    logger.info({
      database: this.config.database,
      leaders: snapshot.table.getWithRole('LEADER').length,
      followers: snapshot.table.getWithRole('FOLLOWER').length,
      expiresAt: snapshot.table.expiresAt,
    }, 'Routing table updated');

    this.transition(previous.status, RoutingState.READY);
    this.notify('routingTable:updated', listener => listener(snapshot.table));
  }

  private recordFailure(error: RoutingDiscoveryError): void {
    const current = this.state;
    this.failedRefreshCount++;

    if (current.status === RoutingState.UNINITIALIZED) {
      logger.error({ err: error, database: this.config.database }, 'Initial routing discovery failed');
    } else {
      logger.warn(
        { err: error, database: this.config.database, expiresAt: current.snapshot.table.expiresAt },
        'Routing table refresh failed, keeping previous table'
      );
      this.state = { status: RoutingState.STALE_REFRESH_FAILED, snapshot: current.snapshot, error };
      this.transition(current.status, RoutingState.STALE_REFRESH_FAILED);
    }

    this.notify('routingTable:refreshFailed', listener => listener(error));
  }

  private transition(from: RoutingState, to: RoutingState): void {
    if (!isValidRoutingTransition(from, to)) {
      logger.warn({ from, to }, `Invalid routing state transition: ${from} → ${to}`);
      return;
    }
    if (from === to) {
      return;
    }

    const event: RoutingStateChangeEvent = { from, to, timestamp: Date.now() };
    logger.debug({ from, to }, `Routing state transition: ${from} → ${to}`);
    this.notify('state:changed', listener => listener(event));
  }

  private retire(client: AliasedClient): void {
    if ((this.inFlight.get(client) ?? 0) > 0) {
      this.retired.add(client);
      return;
    }
    this.closePool(client);
  }

  private closePool(client: AliasedClient): void {
    client.close().catch(err => {
      logger.warn({ err, aliases: client.getAliases() }, 'Failed to close retired connection pool');
    });
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
