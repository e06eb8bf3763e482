import { z } from 'zod';
import type { AuditEvent, Connection } from '../../runtime/index.js';
import type { SqlValue } from '../../runtime/db/connection.js';

export interface AuditFilters {
  model?: string;
  type?: string;
  user?: number;
}

const auditRow = z.object({
  id: z.string(),
  timestamp: z.string(),
  type: z.string(),
  user_id: z.coerce.number().nullable(),
  model: z.enum(['post', 'comment']).nullable(),
  data: z.string().nullable(),
});

function toEvent(row: unknown): AuditEvent {
  const r = auditRow.parse(row);
  return {
    id: r.id,
    timestamp: r.timestamp,
    type: r.type,
    userId: r.user_id ?? undefined,
    model: r.model ?? undefined,
    data: r.data === null ? undefined : JSON.parse(r.data),
  };
}

/** Most recent events first. */
export async function tailAuditEvents(
  db: Connection,
  filters: AuditFilters = {},
  options: { limit: number } = { limit: 20 },
): Promise<AuditEvent[]> {
  const where: string[] = [];
  const params: SqlValue[] = [];
  if (filters.model) {
    params.push(filters.model);
    where.push(`model = $${params.length}`);
  }
  if (filters.type) {
    params.push(filters.type);
    where.push(`type = $${params.length}`);
  }
  if (filters.user !== undefined) {
    params.push(filters.user);
    where.push(`user_id = $${params.length}`);
  }
  params.push(options.limit);
  const clause = where.length ? `WHERE ${where.join(' AND ')}` : '';
  const res = await db.query(
    `SELECT id, timestamp, type, user_id, model, data FROM audit_log ${clause}
     ORDER BY timestamp DESC, id DESC LIMIT $${params.length}`,
    params,
  );
  return res.rows.map(toEvent);
}

export function formatEvent(event: AuditEvent): string {
  const parts = [
    event.timestamp,
    event.userId !== undefined ? `user=${event.userId}` : '',
    event.model ? `model=${event.model}` : '',
    `type=${event.type}`,
    event.id,
  ].filter(Boolean);
  return parts.join(' | ');
}
