import BetterSqlite3 from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { FLEETMON_DB_FILE } from '@fleetmon/shared';
import { runMigrations } from './migrations/index.js';

export function openDatabase(dbPath: string = FLEETMON_DB_FILE): BetterSqlite3.Database {
  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const db = new BetterSqlite3(dbPath);

  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');

  runMigrations(db);

  return db;
}
