export type SqlValue = string | number | boolean | null;

export type Row = Record<string, unknown>;

export interface QueryResult {
  rows: Row[];
  rowCount: number;
}

export type Dialect = 'sqlite' | 'postgres';

/**
 * What the stores need to run SQL. Queries are written with PostgreSQL `$n`
 * placeholders; adapters translate where they must.
 */
export interface Queryable {
  readonly dialect: Dialect;
  query(text: string, params?: SqlValue[]): Promise<QueryResult>;
}

export interface Connection extends Queryable {
  exec(sql: string): Promise<void>;
  /**
   * Runs `fn` inside BEGIN/COMMIT, rolling back when it throws. Statements
   * inside must go through `tx`.
   */
  transaction<T>(fn: (tx: Queryable) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}
