import pg from 'pg';
import type { Connection, Queryable, QueryResult, Row, SqlValue } from './connection.js';

function toResult(res: pg.QueryResult<Row>): QueryResult {
  return { rows: res.rows, rowCount: res.rowCount ?? 0 };
}

export class PostgresConnection implements Connection {
  readonly dialect = 'postgres';
  private pool: pg.Pool;

  constructor(connectionString: string) {
    this.pool = new pg.Pool({ connectionString });
  }

  async query(text: string, params: SqlValue[] = []): Promise<QueryResult> {
    return toResult(await this.pool.query<Row>(text, params));
  }

  async exec(sql: string): Promise<void> {
    await this.pool.query(sql);
  }

  // One pooled client holds the whole transaction.
  async transaction<T>(fn: (tx: Queryable) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    const tx: Queryable = {
      dialect: 'postgres',
      query: async (text, params = []) => toResult(await client.query<Row>(text, params)),
    };
    try {
      await client.query('BEGIN');
      const result = await fn(tx);
      await client.query('COMMIT');
      return result;
    } catch (err) {
      await client.query('ROLLBACK');
      throw err;
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
