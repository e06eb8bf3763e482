import type { Queryable, SqlValue } from '../db/connection.js';
import type { Caller } from '../policy/caller.js';
import { visibilityClause } from '../policy/visibility.js';
import type { PostDetail, PostSummary } from '../types.js';
import { toId, toPostRecord, toPostSummary } from './rows.js';

export type PostRecord = Omit<PostDetail, 'comments'>;

export interface NewPost {
  slug: string;
  title: string;
  body: string;
  authorId: number;
  isPublished: boolean;
  createdAt: string;
}

export interface PostChanges {
  slug?: string;
  title?: string;
  body?: string;
  is_published?: boolean;
}

const selectPost = `
  SELECT p.id, p.slug, p.title, p.body, p.is_published, p.created_at,
         u.id AS author_id, u.username AS author_username
  FROM posts p
  JOIN users u ON u.id = p.author_id`;

const changeColumns = ['slug', 'title', 'body', 'is_published'] as const;

export class PostStore {
  constructor(private readonly db: Queryable) {}

  async listVisible(caller: Caller): Promise<PostSummary[]> {
    const res = await this.db.query(
      `${selectPost}
       WHERE ${visibilityClause(caller)}
       ORDER BY p.created_at DESC, p.id DESC`,
    );
    return res.rows.map(toPostSummary);
  }

  async findVisible(caller: Caller, id: number): Promise<PostRecord | null> {
    const res = await this.db.query(`${selectPost} WHERE ${visibilityClause(caller)} AND p.id = $1`, [id]);
    const row = res.rows[0];
    return row ? toPostRecord(row) : null;
  }

  async insert(post: NewPost): Promise<number> {
    const res = await this.db.query(
      `INSERT INTO posts (slug, title, body, author_id, is_published, created_at)
       VALUES ($1, $2, $3, $4, $5, $6)
       RETURNING id`,
      [post.slug, post.title, post.body, post.authorId, post.isPublished, post.createdAt],
    );
    return toId(res.rows[0]);
  }

  async update(id: number, changes: PostChanges): Promise<void> {
    const sets: string[] = [];
    const params: SqlValue[] = [];
    for (const column of changeColumns) {
      const value = changes[column];
      if (value === undefined) continue;
      params.push(value);
      sets.push(`${column} = $${params.length}`);
    }
    if (!sets.length) return;
    params.push(id);
    await this.db.query(`UPDATE posts SET ${sets.join(', ')} WHERE id = $${params.length}`, params);
  }

  async delete(id: number): Promise<boolean> {
    const res = await this.db.query('DELETE FROM posts WHERE id = $1', [id]);
    return res.rowCount > 0;
  }
}
