import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DatabaseConnection } from '../db/database.js';

describe('DatabaseConnection', () => {
  let db: DatabaseConnection;

  beforeEach(async () => {
    db = new DatabaseConnection(':memory:');
    await db.exec('CREATE TABLE flags (id INTEGER PRIMARY KEY AUTOINCREMENT, name TEXT NOT NULL, enabled INTEGER NOT NULL)');
  });

  afterEach(async () => {
    await db.close();
  });

  it('translates $n placeholders and booleans', async () => {
    await db.query('INSERT INTO flags (name, enabled) VALUES ($1, $2)', ['dark-mode', true]);
    const res = await db.query('SELECT name, enabled FROM flags WHERE enabled = $1', [true]);
    expect(res.rows).toEqual([{ name: 'dark-mode', enabled: 1 }]);
    expect(res.rowCount).toBe(1);
  });

  it('returns rows from INSERT ... RETURNING', async () => {
    const first = await db.query('INSERT INTO flags (name, enabled) VALUES ($1, $2) RETURNING id', ['a', false]);
    const second = await db.query('INSERT INTO flags (name, enabled) VALUES ($1, $2) RETURNING id', ['b', false]);
    expect(first.rows).toEqual([{ id: 1 }]);
    expect(second.rows).toEqual([{ id: 2 }]);
  });

  it('reports affected rows for writes', async () => {
    await db.query('INSERT INTO flags (name, enabled) VALUES ($1, $2)', ['a', false]);
    await db.query('INSERT INTO flags (name, enabled) VALUES ($1, $2)', ['b', false]);
    const res = await db.query('UPDATE flags SET enabled = $1', [true]);
    expect(res).toEqual({ rows: [], rowCount: 2 });
  });

  describe('transaction', () => {
    it('commits what the callback wrote', async () => {
      const id = await db.transaction(async tx => {
        const res = await tx.query('INSERT INTO flags (name, enabled) VALUES ($1, $2) RETURNING id', ['a', true]);
        return res.rows[0]?.id;
      });

      expect(id).toBe(1);
      expect((await db.query('SELECT name FROM flags')).rows).toEqual([{ name: 'a' }]);
    });

    it('rolls back when the callback throws', async () => {
      await expect(
        db.transaction(async tx => {
          await tx.query('INSERT INTO flags (name, enabled) VALUES ($1, $2)', ['a', true]);
          throw new Error('boom');
        }),
      ).rejects.toThrow('boom');

      expect((await db.query('SELECT name FROM flags')).rows).toEqual([]);
    });

    it('holds outside statements until the transaction ends', async () => {
      const failing = db.transaction(async tx => {
        await tx.query('INSERT INTO flags (name, enabled) VALUES ($1, $2)', ['inside', true]);
        await new Promise(resolve => setTimeout(resolve, 10));
        throw new Error('boom');
      });
      const outside = db.query('INSERT INTO flags (name, enabled) VALUES ($1, $2)', ['outside', false]);

      await expect(failing).rejects.toThrow('boom');
      await outside;

      expect((await db.query('SELECT name FROM flags')).rows).toEqual([{ name: 'outside' }]);
    });
  });
});
