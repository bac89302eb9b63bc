import type { QueryResult } from 'neo4j-driver';
import type { Statement, StatementParameters, StatementResult } from '@cypher-router/core';

export type StatementRunner = (text: string, parameters: StatementParameters) => PromiseLike<QueryResult>;

/**
 * Run statements one after another, collecting each statement's records as
 * plain objects.
 */
export async function runAll(statements: Iterable<Statement>, run: StatementRunner): Promise<StatementResult[]> {
  const results: StatementResult[] = [];
  for (const statement of statements) {
    const result = await run(statement.text, statement.parameters);
    results.push(result.records.map(record => record.toObject()));
  }
  return results;
}
