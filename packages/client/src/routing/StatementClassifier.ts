import type { Statement } from '@cypher-router/core';

/**
 * Keywords that mark a statement as a write. Matched as case-sensitive
 * substrings: a keyword inside a longer upper-case identifier (`RESET`,
 * `CALLER`) counts, lower-case text (`merge`, `offset`) does not.
 */
export const WRITE_KEYWORDS = ['CREATE', 'SET', 'MERGE', 'DELETE', 'CALL'] as const;

const WRITE_PATTERN = new RegExp(`(${WRITE_KEYWORDS.join('|')})`, 'm');

/** Statements keyed by their position in the caller's batch. */
export type IndexedStatements = Map<number, Statement>;

export interface ClassifiedStatements {
  reads: IndexedStatements;
  writes: IndexedStatements;
}

export function isWriteStatement(statement: Statement): boolean {
  return WRITE_PATTERN.test(statement.text);
}

/**
 * Split a batch into reads and writes. Every statement lands in exactly one
 * map, under its original index; both maps keep input order.
 */
export function classifyStatements(statements: Iterable<Statement>): ClassifiedStatements {
  const reads: IndexedStatements = new Map();
  const writes: IndexedStatements = new Map();

  let index = 0;
  for (const statement of statements) {
    if (isWriteStatement(statement)) {
      writes.set(index, statement);
    } else {
      reads.set(index, statement);
    }
    index++;
  }

  return { reads, writes };
}
