import { z } from 'zod';
import type { Row } from '../db/connection.js';
import type { CommentView, PostDetail, PostSummary } from '../types.js';

// SQLite hands booleans back as 0/1, PostgreSQL as true/false.
const flag = z.union([z.boolean(), z.number()]).transform(value => value === true || value === 1);
const id = z.coerce.number().int().positive();

const postRow = z.object({
  id,
  slug: z.string(),
  title: z.string(),
  author_id: id,
  author_username: z.string(),
  is_published: flag,
  created_at: z.string(),
});

const postDetailRow = postRow.extend({ body: z.string() });

const commentRow = z.object({
  id,
  post_id: id,
  author_id: id,
  author_username: z.string(),
  body: z.string(),
  is_approved: flag,
});

const idRow = z.object({ id });

export function toPostSummary(row: Row): PostSummary {
  const r = postRow.parse(row);
  return {
    id: r.id,
    slug: r.slug,
    title: r.title,
    author: { id: r.author_id, username: r.author_username },
    is_published: r.is_published,
    created_at: r.created_at,
  };
}

export function toPostRecord(row: Row): Omit<PostDetail, 'comments'> {
  const r = postDetailRow.parse(row);
  return { ...toPostSummary(row), body: r.body };
}

export function toComment(row: Row): CommentView {
  const r = commentRow.parse(row);
  return {
    id: r.id,
    post: r.post_id,
    author: { id: r.author_id, username: r.author_username },
    body: r.body,
    is_approved: r.is_approved,
  };
}

export function toId(row: Row | undefined): number {
  return idRow.parse(row).id;
}
