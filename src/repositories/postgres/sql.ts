import { QueryResultRow } from 'pg';

/**
 * The part of a `pg` client the repositories use. A `PoolClient` satisfies it.
 */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rows: QueryResultRow[] }>;
}

const UNIQUE_VIOLATION = '23505';

/**
 * True for PostgreSQL errors raised by a unique index or constraint.
 */
export const isUniqueViolation = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === UNIQUE_VIOLATION;

/**
 * Builds `col = $n` assignments for the defined keys of `changes`.
 * Parameter numbering starts at `firstParam`; returns the next free index.
 */
export const buildSetClause = (
  changes: object,
  firstParam = 1
): { setParts: string[]; values: unknown[]; nextParam: number } => {
  const setParts: string[] = [];
  const values: unknown[] = [];
  let paramIndex = firstParam;

  for (const [column, value] of Object.entries(changes)) {
    if (value === undefined) continue;
    setParts.push(`${column} = $${paramIndex++}`);
    values.push(value);
  }

  return { setParts, values, nextParam: paramIndex };
};
