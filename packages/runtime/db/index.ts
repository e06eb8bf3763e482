import type { Connection } from './connection.js';
import { DatabaseConnection } from './database.js';
import { PostgresConnection } from './postgres.js';

export type { Connection, Dialect, Queryable, QueryResult, Row, SqlValue } from './connection.js';
export { DatabaseConnection } from './database.js';
export { PostgresConnection } from './postgres.js';
export { migrate, schemaFor } from './schema.js';

export interface StoreOptions {
  databaseUrl?: string;
  sqliteFile: string;
}

export function openConnection(options: StoreOptions): Connection {
  const url = options.databaseUrl;
  if (url && /^postgres(ql)?:\/\//i.test(url)) {
    return new PostgresConnection(url);
  }
  if (url) {
    throw new Error(`Unsupported DATABASE_URL scheme: ${url.split(':')[0]}`);
  }
  return new DatabaseConnection(options.sqliteFile);
}
