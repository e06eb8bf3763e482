import { parseBool, parseList, type Env } from './env.js';
import { loadAuthConfigFromEnv, type AuthConfig } from './http/auth.js';

export interface RuntimeConfig {
  port: number;
  host: string;
  databaseUrl?: string;
  sqliteFile: string;
  logLevel: string;
  logPretty: boolean;
  corsOrigins: string[] | true;
  auditLogFile?: string;
  auth: AuthConfig | null;
}

function parsePort(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    console.warn(`Invalid PORT "${value}", using ${fallback}.`);
    return fallback;
  }
  return port;
}

export function loadConfigFromEnv(env: Env = process.env): RuntimeConfig {
  return {
    port: parsePort(env.PORT, 3001),
    host: env.HOST || '0.0.0.0',
    databaseUrl: env.DATABASE_URL || undefined,
    sqliteFile: env.SQLITE_FILE || ':memory:',
    logLevel: env.LOG_LEVEL || 'info',
    logPretty: parseBool(env.LOG_PRETTY, env.NODE_ENV !== 'production'),
    corsOrigins: parseList(env.CORS_ORIGINS) ?? true,
    auditLogFile: env.AUDIT_LOG_FILE || undefined,
    auth: loadAuthConfigFromEnv(env),
  };
}
