import { QueryResultRow } from 'pg';
import { SqlClient } from '../../src/repositories/postgres/sql';

export interface RecordedQuery {
  /** Query text with whitespace collapsed. */
  text: string;
  values: unknown[];
}

type Reply = { rows: QueryResultRow[] } | { error: unknown };

/**
 * Stand-in for a `pg` client: records every query and answers with queued replies
 * (an empty result once the queue runs out).
 */
export class RecordingSqlClient implements SqlClient {
  readonly queries: RecordedQuery[] = [];
  private readonly replies: Reply[] = [];

  reply(...rows: QueryResultRow[]): this {
    this.replies.push({ rows });
    return this;
  }

  fail(error: unknown): this {
    this.replies.push({ error });
    return this;
  }

  get lastQuery(): RecordedQuery | undefined {
    return this.queries.at(-1);
  }

  async query(text: string, values: unknown[] = []): Promise<{ rows: QueryResultRow[] }> {
    this.queries.push({ text: text.replace(/\s+/g, ' ').trim(), values });
    const next = this.replies.shift();
    if (!next) return { rows: [] };
    if ('error' in next) throw next.error;
    return { rows: next.rows };
  }
}
