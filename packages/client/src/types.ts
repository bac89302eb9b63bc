/**
 * Session Types
 *
 * Contracts between the routing layer and the code that actually talks to a
 * database node. AutoRoutedSession implements Session on top of an
 * AliasedClient that a ClientBuilder assembles from discovered addresses.
 */

import type { ConnectionConfig, Statement, StatementResult } from '@cypher-router/core';

/**
 * An open transaction on a single connection.
 */
export interface Transaction {
  /**
   * Run statements inside the transaction.
   * @returns One result per statement, in input order
   */
  runStatements(statements: Iterable<Statement>): Promise<StatementResult[]>;

  /**
   * Run the given statements, then commit.
   */
  commit(statements?: Iterable<Statement>): Promise<StatementResult[]>;

  rollback(): Promise<void>;
}

/**
 * A session runs statements against one logical target.
 *
 * Implementations:
 * - DirectSession: a single database server
 * - AutoRoutedSession: a cluster, split by read/write role
 */
export interface Session {
  /**
   * Run a batch of statements.
   * @returns One result per statement, in input order
   */
  run(statements: Iterable<Statement>): Promise<StatementResult[]>;

  /**
   * Open a transaction, optionally running statements in it right away.
   *
   * @param connectionAlias - Connection to open the transaction on, where the
   *   session has more than one
   */
  openTransaction(statements?: Iterable<Statement>, connectionAlias?: string): Promise<Transaction>;

  runOverTransaction(transaction: Transaction, statements: Iterable<Statement>): Promise<StatementResult[]>;

  commitTransaction(transaction: Transaction, statements: Iterable<Statement>): Promise<StatementResult[]>;

  rollbackTransaction(transaction: Transaction): Promise<void>;

  close(): Promise<void>;
}

/**
 * A set of named connections. This is the connection pool the routing layer
 * rebuilds after every discovery.
 */
export interface AliasedClient {
  /**
   * Run statements on one connection.
   * @param alias - Registered alias; the default connection when omitted
   * @throws UnknownConnectionError if the alias is not registered
   */
  runStatements(statements: Iterable<Statement>, alias?: string): Promise<StatementResult[]>;

  openTransaction(statements?: Iterable<Statement>, alias?: string): Promise<Transaction>;

  hasConnection(alias: string): boolean;

  getAliases(): string[];

  /**
   * Close every connection in the client.
   */
  close(): Promise<void>;
}

/**
 * Assembles an AliasedClient from URLs.
 */
export interface ClientBuilder {
  addConnection(alias: string, url: string, config?: Partial<ConnectionConfig>): this;

  build(): AliasedClient;
}
