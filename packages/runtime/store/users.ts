import type { Queryable } from '../db/connection.js';
import type { AuthorRef } from '../types.js';

export class UserStore {
  constructor(private readonly db: Queryable) {}

  // Identity comes from the token issuer; the row only carries display fields.
  async upsert(user: AuthorRef): Promise<void> {
    await this.db.query(
      `INSERT INTO users (id, username) VALUES ($1, $2)
       ON CONFLICT (id) DO UPDATE SET username = excluded.username`,
      [user.id, user.username],
    );
  }
}
