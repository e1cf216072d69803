import type BetterSqlite3 from 'better-sqlite3';
import { getLogger } from '@fleetmon/shared';
import { createKeyValueTable } from './001_initial.js';

export interface SchemaMigration {
  version: number;
  name: string;
  apply: (db: BetterSqlite3.Database) => void;
}

export const schemaMigrations: readonly SchemaMigration[] = [
  { version: 1, name: 'create_kv', apply: createKeyValueTable },
];

/** Schema version recorded in the database header (`PRAGMA user_version`). */
export function schemaVersion(db: BetterSqlite3.Database): number {
  const version = db.pragma('user_version', { simple: true });
  return typeof version === 'number' ? version : 0;
}

/**
 * Apply every migration newer than the recorded schema version in one
 * transaction and return the versions applied. A failing migration leaves
 * the schema and its version unchanged.
 */
export function runMigrations(
  db: BetterSqlite3.Database,
  migrations: readonly SchemaMigration[] = schemaMigrations,
): number[] {
  const current = schemaVersion(db);
  const pending = migrations
    .filter((m) => m.version > current)
    .sort((a, b) => a.version - b.version);

  if (pending.length === 0) return [];

  db.transaction(() => {
    for (const migration of pending) {
      migration.apply(db);
      db.pragma(`user_version = ${migration.version}`);
    }
  })();

  for (const migration of pending) {
    getLogger().info(
      { version: migration.version, name: migration.name },
      'Applied schema migration',
    );
  }
  return pending.map((m) => m.version);
}
