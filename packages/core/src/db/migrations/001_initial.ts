import type BetterSqlite3 from 'better-sqlite3';

/** Monitoring entities live as JSON strings under path-like keys. */
export function createKeyValueTable(db: BetterSqlite3.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS kv (
      key TEXT PRIMARY KEY NOT NULL,
      value TEXT NOT NULL,
      updated_at INTEGER NOT NULL DEFAULT (unixepoch())
    );
  `);
}
