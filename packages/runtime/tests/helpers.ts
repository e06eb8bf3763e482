import { AuditLogger } from '../audit.js';
import type { ControllerContext } from '../controllers/context.js';
import { DatabaseConnection } from '../db/database.js';
import { migrate } from '../db/schema.js';
import { silentLogger } from '../logger.js';
import type { Caller, IdentifiedCaller } from '../policy/caller.js';
import { createStore, type Store } from '../store/index.js';

export const anonymous: Caller = { role: 'anonymous' };
export const alice: IdentifiedCaller = { role: 'authenticated', id: 1, username: 'alice' };
export const bob: IdentifiedCaller = { role: 'authenticated', id: 2, username: 'bob' };
export const staff: IdentifiedCaller = { role: 'staff', id: 9, username: 'editor' };

export interface Fixture {
  db: DatabaseConnection;
  store: Store;
  audit: AuditLogger;
  ctx: ControllerContext;
}

export async function createFixture(now: () => Date = () => new Date('2024-05-01T10:00:00.000Z')): Promise<Fixture> {
  const db = new DatabaseConnection(':memory:');
  await migrate(db);
  const store = createStore(db);
  const audit = new AuditLogger({ db });
  return { db, store, audit, ctx: { store, audit, logger: silentLogger, now } };
}

export interface SeedPost {
  author: IdentifiedCaller;
  title: string;
  published: boolean;
  createdAt: string;
}

export async function seedPost(store: Store, post: SeedPost): Promise<number> {
  await store.users.upsert({ id: post.author.id, username: post.author.username });
  return store.posts.insert({
    slug: post.title.toLowerCase(),
    title: post.title,
    body: `${post.title} body`,
    authorId: post.author.id,
    isPublished: post.published,
    createdAt: post.createdAt,
  });
}

export async function seedComment(store: Store, postId: number, author: IdentifiedCaller, body: string): Promise<number> {
  await store.users.upsert({ id: author.id, username: author.username });
  return store.comments.insert({ postId, authorId: author.id, body });
}

export interface AuditRow {
  type: string;
  userId: number | null;
  model: string | null;
  data: unknown;
}

export async function auditTrail(db: DatabaseConnection): Promise<AuditRow[]> {
  const res = await db.query('SELECT type, user_id, model, data FROM audit_log ORDER BY rowid');
  return res.rows.map(row => ({
    type: String(row.type),
    userId: typeof row.user_id === 'number' ? row.user_id : null,
    model: typeof row.model === 'string' ? row.model : null,
    data: typeof row.data === 'string' ? JSON.parse(row.data) : null,
  }));
}
