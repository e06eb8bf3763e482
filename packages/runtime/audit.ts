import fs from 'node:fs/promises';
import path from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import type { Queryable } from './db/connection.js';
import type { Logger } from './logger.js';

export type AuditModel = 'post' | 'comment';

export interface AuditEvent {
  id: string;
  timestamp: string;
  type: string;
  userId?: number;
  model?: AuditModel;
  data?: unknown;
}

export interface AuditOptions {
  db?: Queryable;
  logFilePath?: string;
  logger?: Logger;
}

/**
 * Append-only record of successful writes, inserted into `audit_log` and,
 * when configured, mirrored to a JSONL file. Without either sink events are
 * kept in memory.
 */
export class AuditLogger {
  private logs: AuditEvent[] = [];
  private readonly db?: Queryable;
  private readonly logFilePath?: string;
  private readonly logger?: Logger;

  constructor(options: AuditOptions = {}) {
    this.db = options.db;
    this.logFilePath = options.logFilePath;
    this.logger = options.logger;
  }

  /** Pass `db` to insert through an open transaction instead of the default handle. */
  async record(
    type: string,
    details: Omit<AuditEvent, 'id' | 'timestamp' | 'type'> = {},
    db: Queryable | undefined = this.db,
  ): Promise<AuditEvent> {
    const event: AuditEvent = {
      id: uuidv4(),
      timestamp: new Date().toISOString(),
      type,
      ...details,
    };
    if (!db && !this.logFilePath) {
      this.logs.push(event);
    }

    if (db) {
      await db.query(
        `INSERT INTO audit_log (id, timestamp, type, user_id, model, data)
         VALUES ($1, $2, $3, $4, $5, $6)`,
        [
          event.id,
          event.timestamp,
          event.type,
          event.userId ?? null,
          event.model ?? null,
          event.data === undefined ? null : JSON.stringify(event.data),
        ],
      );
    }
    if (this.logFilePath) {
      await this.appendToFile(this.logFilePath, event);
    }
    return event;
  }

  getLogs(): AuditEvent[] {
    return this.logs;
  }

  clear(): void {
    this.logs = [];
  }

  // A broken mirror file must not fail the write it describes.
  private async appendToFile(file: string, event: AuditEvent): Promise<void> {
    try {
      await fs.mkdir(path.dirname(file), { recursive: true });
      await fs.appendFile(file, JSON.stringify(event) + '\n', 'utf8');
    } catch (err) {
      this.logger?.error({ err, file }, 'Failed to append audit log');
    }
  }
}
