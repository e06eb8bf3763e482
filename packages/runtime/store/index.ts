import type { Connection, Queryable } from '../db/connection.js';
import { CommentStore } from './comments.js';
import { PostStore } from './posts.js';
import { UserStore } from './users.js';

export { CommentStore, type CommentChanges, type NewComment } from './comments.js';
export { PostStore, type NewPost, type PostChanges, type PostRecord } from './posts.js';
export { UserStore } from './users.js';

export interface Repositories {
  /** The handle these repositories write through; audit inserts share it. */
  db: Queryable;
  users: UserStore;
  posts: PostStore;
  comments: CommentStore;
}

export interface Store extends Repositories {
  /** Repositories bound to one transaction, committed when `fn` resolves. */
  transaction<T>(fn: (tx: Repositories) => Promise<T>): Promise<T>;
}

function repositories(db: Queryable): Repositories {
  return {
    db,
    users: new UserStore(db),
    posts: new PostStore(db),
    comments: new CommentStore(db),
  };
}

export function createStore(db: Connection): Store {
  return {
    ...repositories(db),
    transaction<T>(fn: (tx: Repositories) => Promise<T>): Promise<T> {
      return db.transaction(tx => fn(repositories(tx)));
    },
  };
}
