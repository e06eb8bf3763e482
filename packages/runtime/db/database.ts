import Database from 'better-sqlite3';
import type { Connection, Queryable, QueryResult, Row, SqlValue } from './connection.js';

type SqliteValue = string | number | null;

function toSqlite(value: SqlValue): SqliteValue {
  if (typeof value === 'boolean') return value ? 1 : 0;
  return value;
}

export class DatabaseConnection implements Connection {
  readonly dialect = 'sqlite';
  private db: Database.Database;
  // Settles when the running transaction ends; statements from outside it wait.
  private pending: Promise<unknown> = Promise.resolve();
  private readonly scope: Queryable = {
    dialect: 'sqlite',
    query: async (text, params = []) => this.run(text, params),
  };

  constructor(filename: string = ':memory:') {
    this.db = new Database(filename);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
  }

  // Same call shape as the PostgreSQL pool: $1, $2 placeholders become ?
  async query(text: string, params: SqlValue[] = []): Promise<QueryResult> {
    await this.pending;
    return this.run(text, params);
  }

  // Raw SQL, used for schema creation
  async exec(sql: string): Promise<void> {
    await this.pending;
    this.db.exec(sql);
  }

  // better-sqlite3's own transaction() only takes synchronous functions.
  async transaction<T>(fn: (tx: Queryable) => Promise<T>): Promise<T> {
    const result = this.pending.then(() => this.runTransaction(fn));
    this.pending = result.catch(() => undefined);
    return result;
  }

  async close(): Promise<void> {
    await this.pending;
    this.db.close();
  }

  private async runTransaction<T>(fn: (tx: Queryable) => Promise<T>): Promise<T> {
    this.db.exec('BEGIN');
    try {
      const result = await fn(this.scope);
      this.db.exec('COMMIT');
      return result;
    } catch (err) {
      this.db.exec('ROLLBACK');
      throw err;
    }
  }

  private run(text: string, params: SqlValue[]): QueryResult {
    const stmt = this.db.prepare<SqliteValue[], Row>(text.replace(/\$(\d+)/g, '?'));
    const args = params.map(toSqlite);

    if (stmt.reader) {
      const rows = stmt.all(...args);
      return { rows, rowCount: rows.length };
    }

    const info = stmt.run(...args);
    return { rows: [], rowCount: info.changes };
  }
}
