import type { Queryable, SqlValue } from '../db/connection.js';
import type { CommentView } from '../types.js';
import { toComment, toId } from './rows.js';

export interface NewComment {
  postId: number;
  authorId: number;
  body: string;
}

export interface CommentChanges {
  body?: string;
  is_approved?: boolean;
}

const selectComment = `
  SELECT c.id, c.post_id, c.body, c.is_approved,
         u.id AS author_id, u.username AS author_username
  FROM comments c
  JOIN users u ON u.id = c.author_id`;

const changeColumns = ['body', 'is_approved'] as const;

export class CommentStore {
  constructor(private readonly db: Queryable) {}

  async listForPost(postId: number): Promise<CommentView[]> {
    const res = await this.db.query(`${selectComment} WHERE c.post_id = $1 ORDER BY c.id ASC`, [postId]);
    return res.rows.map(toComment);
  }

  async find(id: number): Promise<CommentView | null> {
    const res = await this.db.query(`${selectComment} WHERE c.id = $1`, [id]);
    const row = res.rows[0];
    return row ? toComment(row) : null;
  }

  // New comments always start unapproved.
  async insert(comment: NewComment): Promise<number> {
    const res = await this.db.query(
      `INSERT INTO comments (post_id, author_id, body, is_approved)
       VALUES ($1, $2, $3, $4)
       RETURNING id`,
      [comment.postId, comment.authorId, comment.body, false],
    );
    return toId(res.rows[0]);
  }

  async update(id: number, changes: CommentChanges): Promise<void> {
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
    await this.db.query(`UPDATE comments SET ${sets.join(', ')} WHERE id = $${params.length}`, params);
  }

  async delete(id: number): Promise<boolean> {
    const res = await this.db.query('DELETE FROM comments WHERE id = $1', [id]);
    return res.rowCount > 0;
  }
}
