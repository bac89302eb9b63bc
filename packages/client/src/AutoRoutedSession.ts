/**
 * AutoRoutedSession - Session that spreads statements across a cluster
 *
 * Read statements go to a random follower, write statements to a random
 * leader. Topology comes from a routing table discovered through a plain
 * reference session and cached until its TTL passes.
 *
 * Reads and writes of one batch are sent as two sequential calls: reads
 * first, then writes. The two calls are not atomic together. If the write
 * call fails after the reads succeeded, the whole run fails and the read
 * results are dropped.
 */

import type { AutoRoutingConfig, ConnectionConfig, RoutingTable, Statement, StatementResult, UrlComponents } from '@cypher-router/core';
import type { ClientBuilder, Session, Transaction } from './types';
import { TopologyManager } from './routing/TopologyManager';
import type { RoutingStateChangeEvent, TopologySnapshot, TopologyStats } from './routing/TopologyManager';
import { RoutingState } from './routing/RoutingState';
import { classifyStatements } from './routing/StatementClassifier';
import { weaveResults } from './routing/ResultWeaver';
import { logger } from './utils/logger';

export interface AutoRoutedSessionConfig {
  /** Plain session to any cluster member; used to discover the routing table */
  referenceSession: Session;
  /** Seed URL; its scheme and credentials are reused for discovered servers */
  baseUrl: UrlComponents | string;
  /** Returns an empty builder for every rebuilt connection pool */
  createClientBuilder: () => ClientBuilder;
  routing?: Partial<AutoRoutingConfig>;
  connection?: Partial<ConnectionConfig>;
  /** Close the reference session when this session is closed (default: false) */
  ownsReferenceSession?: boolean;
  /** Random source for server selection (default: Math.random) */
  random?: () => number;
}

export class AutoRoutedSession implements Session {
  private readonly topology: TopologyManager;
  private readonly referenceSession: Session;
  private readonly ownsReferenceSession: boolean;

  constructor(config: AutoRoutedSessionConfig) {
    this.referenceSession = config.referenceSession;
    this.ownsReferenceSession = config.ownsReferenceSession ?? false;
    this.topology = new TopologyManager({
      referenceSession: config.referenceSession,
      baseUrl: config.baseUrl,
      createClientBuilder: config.createClientBuilder,
      config: config.routing,
      connectionConfig: config.connection,
      random: config.random,
    });
  }

  /**
   * Run a batch, routing reads to followers and writes to leaders.
   *
   * @returns One result per statement, in input order
   * @throws RoutingDiscoveryError if the routing table had to be refreshed and could not be
   * @throws NoAvailableRoleError if a needed role has no servers
   */
  public async run(statements: Iterable<Statement>): Promise<StatementResult[]> {
    const snapshot = await this.topology.acquire();
    try {
      return await this.dispatch(snapshot, statements);
    } finally {
      this.topology.release(snapshot);
    }
  }

  public async runStatement(statement: Statement): Promise<StatementResult> {
    const [result] = await this.run([statement]);
    return result;
  }

  /**
   * Open a transaction. Without an alias it goes to a random leader, since
   * statements inside a transaction are not classified.
   */
  public async openTransaction(
    statements?: Iterable<Statement>,
    connectionAlias?: string
  ): Promise<Transaction> {
    const snapshot = await this.topology.acquire();
    try {
      const alias = connectionAlias ?? snapshot.selector.pickWriteAlias();
      logger.debug({ alias }, 'Opening routed transaction');
      const transaction = await snapshot.client.openTransaction(statements, alias);
      return new LeasedTransaction(transaction, () => this.topology.release(snapshot));
    } catch (err) {
      this.topology.release(snapshot);
      throw err;
    }
  }

  public runOverTransaction(transaction: Transaction, statements: Iterable<Statement>): Promise<StatementResult[]> {
    return transaction.runStatements(statements);
  }

  public commitTransaction(transaction: Transaction, statements: Iterable<Statement>): Promise<StatementResult[]> {
    return transaction.commit(statements);
  }

  public rollbackTransaction(transaction: Transaction): Promise<void> {
    return transaction.rollback();
  }

  public getState(): RoutingState {
    return this.topology.getState();
  }

  public getRoutingTable(): RoutingTable | null {
    return this.topology.getRoutingTable();
  }

  public getStats(): TopologyStats {
    return this.topology.getStats();
  }

  /**
   * Subscribe to routing state transitions.
   * @returns An unsubscribe function
   */
  public onStateChange(listener: (event: RoutingStateChangeEvent) => void): () => void {
    return this.topology.onStateChange(listener);
  }

  /**
   * Discard the cached routing table; the next call rediscovers topology.
   */
  public invalidate(): void {
    this.topology.invalidate();
  }

  public async close(): Promise<void> {
    await this.topology.close();
    if (this.ownsReferenceSession) {
      await this.referenceSession.close();
    }
  }

  private async dispatch(snapshot: TopologySnapshot, statements: Iterable<Statement>): Promise<StatementResult[]> {
    const { reads, writes } = classifyStatements(statements);
    const { client, selector } = snapshot;

    let readResults: StatementResult[] = [];
    if (reads.size > 0) {
      const alias = selector.pickReadAlias();
      logger.debug({ alias, statements: reads.size }, 'Dispatching reads');
      readResults = await client.runStatements([...reads.values()], alias);
    }

    let writeResults: StatementResult[] = [];
    if (writes.size > 0) {
      const alias = selector.pickWriteAlias();
      logger.debug({ alias, statements: writes.size }, 'Dispatching writes');
      writeResults = await client.runStatements([...writes.values()], alias);
    }

    return weaveResults(reads, readResults, writes, writeResults);
  }
}

/**
 * Keeps the pool a transaction was opened on alive until the transaction ends.
 */
class LeasedTransaction implements Transaction {
  private released: boolean = false;

  constructor(
    private readonly inner: Transaction,
    private readonly onEnd: () => void
  ) {}

  public runStatements(statements: Iterable<Statement>): Promise<StatementResult[]> {
    return this.inner.runStatements(statements);
  }

  public async commit(statements?: Iterable<Statement>): Promise<StatementResult[]> {
    try {
      return await this.inner.commit(statements);
    } finally {
      this.end();
    }
  }

  public async rollback(): Promise<void> {
    try {
      await this.inner.rollback();
    } finally {
      this.end();
    }
  }

  private end(): void {
    if (!this.released) {
      this.released = true;
      this.onEnd();
    }
  }
}
