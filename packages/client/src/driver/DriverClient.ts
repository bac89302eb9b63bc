import type { Statement, StatementResult } from '@cypher-router/core';
import type { AliasedClient, Session, Transaction } from '../types';
import { UnknownConnectionError } from '../errors/UnknownConnectionError';
import { logger } from '../utils/logger';

/**
 * Named sessions built by Neo4jClientBuilder. The first alias registered is
 * the default.
 */
export class DriverClient implements AliasedClient {
  private readonly sessions: ReadonlyMap<string, Session>;
  private readonly defaultAlias: string | undefined;

  constructor(sessions: ReadonlyMap<string, Session>) {
    this.sessions = sessions;
    this.defaultAlias = sessions.keys().next().value;
  }

  public async runStatements(statements: Iterable<Statement>, alias?: string): Promise<StatementResult[]> {
    return this.getSession(alias).run(statements);
  }

  public async runStatement(statement: Statement, alias?: string): Promise<StatementResult> {
    const [result] = await this.runStatements([statement], alias);
    return result;
  }

  public async openTransaction(statements?: Iterable<Statement>, alias?: string): Promise<Transaction> {
    return this.getSession(alias).openTransaction(statements);
  }

  public hasConnection(alias: string): boolean {
    return this.sessions.has(alias);
  }

  public getAliases(): string[] {
    return [...this.sessions.keys()];
  }

  /**
   * @throws UnknownConnectionError if the alias is not registered
   */
  public getSession(alias: string | undefined = this.defaultAlias): Session {
    const session = alias === undefined ? undefined : this.sessions.get(alias);
    if (!session) {
      throw new UnknownConnectionError(alias ?? '(default)', this.getAliases());
    }
    return session;
  }

  public async close(): Promise<void> {
    const failures: unknown[] = [];
    await Promise.all([...this.sessions].map(async ([alias, session]) => {
      try {
        await session.close();
      } catch (err) {
        logger.warn({ alias, err }, 'Failed to close connection');
        failures.push(err);
      }
    }));

    if (failures.length > 0) {
      throw failures[0];
    }
  }
}
