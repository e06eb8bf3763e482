import type { Caller } from './caller.js';

export interface PublishState {
  is_published: boolean;
}

export type VisibilityPredicate = (post: PublishState) => boolean;

const everything: VisibilityPredicate = () => true;
const publishedOnly: VisibilityPredicate = post => post.is_published === true;

// Unpublished posts stay hidden from their own non-staff authors.
export function visibleSet(caller: Caller): VisibilityPredicate {
  return caller.role === 'staff' ? everything : publishedOnly;
}

/**
 * The same rule as a WHERE fragment over the `posts` table aliased as `p`,
 * so the store filters before a row is ever loaded.
 */
export function visibilityClause(caller: Caller): string {
  return caller.role === 'staff' ? 'TRUE' : 'p.is_published = TRUE';
}
