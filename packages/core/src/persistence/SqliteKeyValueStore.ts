import type BetterSqlite3 from 'better-sqlite3';
import { NotFoundError } from '@fleetmon/shared';
import type { KeyValuePair, KeyValueStore } from './KeyValueStore.js';

interface ValueRow {
  value: string;
}

/**
 * KeyValueStore over the `kv` table. better-sqlite3 is synchronous; the
 * async signatures keep the adapter interchangeable with remote stores.
 */
export class SqliteKeyValueStore implements KeyValueStore {
  private db: BetterSqlite3.Database;
  private putStmt: BetterSqlite3.Statement;
  private getStmt: BetterSqlite3.Statement;
  private listStmt: BetterSqlite3.Statement;
  private deleteStmt: BetterSqlite3.Statement;

  constructor(db: BetterSqlite3.Database) {
    this.db = db;
    this.putStmt = db.prepare(`
      INSERT INTO kv (key, value, updated_at) VALUES (@key, @value, unixepoch())
      ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at
    `);
    this.getStmt = db.prepare('SELECT value FROM kv WHERE key = ?');
    // substr comparison instead of LIKE: LIKE is case-insensitive and treats % and _ as wildcards
    this.listStmt = db.prepare(
      'SELECT key, value FROM kv WHERE substr(key, 1, length(@prefix)) = @prefix ORDER BY key',
    );
    this.deleteStmt = db.prepare('DELETE FROM kv WHERE key = ?');
  }

  async put(key: string, value: string): Promise<void> {
    this.putStmt.run({ key, value });
  }

  async get(key: string): Promise<string> {
    const row = this.getStmt.get(key) as ValueRow | undefined;
    if (!row) {
      throw new NotFoundError(key);
    }
    return row.value;
  }

  async listByPrefix(prefix: string): Promise<KeyValuePair[]> {
    return this.listStmt.all({ prefix }) as KeyValuePair[];
  }

  async delete(key: string): Promise<void> {
    this.deleteStmt.run(key);
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
