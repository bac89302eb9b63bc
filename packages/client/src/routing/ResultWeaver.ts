import type { StatementResult } from '@cypher-router/core';
import type { IndexedStatements } from './StatementClassifier';
import { ResultWeaveError } from '../errors/ResultWeaveError';

/**
 * Merge read and write results back into the caller's statement order.
 *
 * `readResults[i]` belongs to the i-th entry of `reads` in iteration order,
 * likewise for writes. Position p of the output holds the result of the
 * statement that was at position p of the original batch.
 */
export function weaveResults(
  reads: IndexedStatements,
  readResults: readonly StatementResult[],
  writes: IndexedStatements,
  writeResults: readonly StatementResult[]
): StatementResult[] {
  const total = reads.size + writes.size;
  const woven = new Array<StatementResult | undefined>(total).fill(undefined);

  place(woven, reads, readResults);
  place(woven, writes, writeResults);

  const complete: StatementResult[] = [];
  for (const result of woven) {
    if (result === undefined) {
      throw new ResultWeaveError(total, complete.length);
    }
    complete.push(result);
  }
  return complete;
}

function place(
  target: (StatementResult | undefined)[],
  reference: IndexedStatements,
  results: readonly StatementResult[]
): void {
  if (results.length !== reference.size) {
    throw new ResultWeaveError(reference.size, results.length);
  }

  let i = 0;
  for (const position of reference.keys()) {
    target[position] = results[i];
    i++;
  }
}
