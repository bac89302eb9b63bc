import type { Driver } from 'neo4j-driver';
import type { ConnectionConfig, Statement, StatementResult } from '@cypher-router/core';
import type { Session, Transaction } from '../types';
import { DriverTransaction } from './DriverTransaction';
import { runAll } from './records';
import { logger } from '../utils/logger';

/**
 * Session bound to a single server through one driver. Does no routing of
 * its own; used for leaf connections and as the discovery channel of an
 * AutoRoutedSession.
 */
export class DirectSession implements Session {
  constructor(
    private readonly driver: Pick<Driver, 'session' | 'close'>,
    private readonly config: Pick<ConnectionConfig, 'database'>
  ) {}

  public async run(statements: Iterable<Statement>): Promise<StatementResult[]> {
    const session = this.driver.session({ database: this.config.database });
    try {
      return await runAll(statements, (text, parameters) => session.run(text, parameters));
    } finally {
      await session.close();
    }
  }

  public async openTransaction(statements?: Iterable<Statement>): Promise<Transaction> {
    const session = this.driver.session({ database: this.config.database });

    let transaction: DriverTransaction;
    try {
      transaction = new DriverTransaction(session, session.beginTransaction());
    } catch (err) {
      await session.close();
      throw err;
    }

    if (statements !== undefined) {
      try {
        await transaction.runStatements(statements);
      } catch (err) {
        logger.debug({ err }, 'Initial transaction statements failed, rolling back');
        try {
          await transaction.rollback();
        } catch (rollbackErr) {
          logger.warn({ err: rollbackErr }, 'Rollback after failed initial statements failed');
        }
        throw err;
      }
    }

    return transaction;
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

  public close(): Promise<void> {
    return this.driver.close();
  }
}
