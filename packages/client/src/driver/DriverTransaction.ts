import type { Session as DriverSession, Transaction as Neo4jTransaction } from 'neo4j-driver';
import type { Statement, StatementResult } from '@cypher-router/core';
import type { Transaction } from '../types';
import { runAll } from './records';

/**
 * Explicit transaction on one driver session. The session is closed when the
 * transaction commits or rolls back.
 */
export class DriverTransaction implements Transaction {
  constructor(
    private readonly session: DriverSession,
    private readonly transaction: Neo4jTransaction
  ) {}

  public runStatements(statements: Iterable<Statement>): Promise<StatementResult[]> {
    return runAll(statements, (text, parameters) => this.transaction.run(text, parameters));
  }

  public async commit(statements: Iterable<Statement> = []): Promise<StatementResult[]> {
    try {
      const results = await this.runStatements(statements);
      await this.transaction.commit();
      return results;
    } finally {
      await this.session.close();
    }
  }

  public async rollback(): Promise<void> {
    try {
      await this.transaction.rollback();
    } finally {
      await this.session.close();
    }
  }
}
