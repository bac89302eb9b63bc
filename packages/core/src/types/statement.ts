/**
 * Statement and result types shared by every session implementation.
 */

export type StatementParameters = Readonly<Record<string, unknown>>;

/**
 * A query text plus its named parameters. Frozen once created.
 */
export interface Statement {
  readonly text: string;
  readonly parameters: StatementParameters;
}

/** One record returned by a statement, keyed by column name. */
export type ResultRecord = Readonly<Record<string, unknown>>;

/** All records returned by a single statement. */
export type StatementResult = ResultRecord[];

export function createStatement(text: string, parameters: Record<string, unknown> = {}): Statement {
  return Object.freeze({
    text,
    parameters: Object.freeze({ ...parameters }),
  });
}
