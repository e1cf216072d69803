import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import BetterSqlite3 from 'better-sqlite3';
import { NotFoundError } from '@fleetmon/shared';
import { runMigrations, schemaMigrations, schemaVersion } from '../db/migrations/index.js';
import { openDatabase } from '../db/Database.js';
import { SqliteKeyValueStore } from '../persistence/SqliteKeyValueStore.js';

describe('Database', () => {
  let db: BetterSqlite3.Database;

  beforeEach(() => {
    db = new BetterSqlite3(':memory:');
    runMigrations(db);
  });

  afterEach(() => {
    if (db.open) db.close();
  });

  describe('migrations', () => {
    it('should create the kv table', () => {
      const tables = db
        .prepare("SELECT name FROM sqlite_master WHERE type='table' AND name='kv'")
        .all();
      expect(tables).toHaveLength(1);
    });

    it('should record the schema version', () => {
      expect(schemaVersion(db)).toBe(1);
    });

    it('should report the versions it applies', () => {
      const fresh = new BetterSqlite3(':memory:');
      expect(schemaVersion(fresh)).toBe(0);
      expect(runMigrations(fresh)).toEqual([1]);
      fresh.close();
    });

    it('should be safe to run twice', () => {
      expect(runMigrations(db)).toEqual([]);
      expect(schemaVersion(db)).toBe(1);
    });

    it('should apply only migrations newer than the recorded version', () => {
      const applied = runMigrations(db, [
        ...schemaMigrations,
        {
          version: 2,
          name: 'index_kv_updated_at',
          apply: (target) => target.exec('CREATE INDEX idx_kv_updated_at ON kv (updated_at)'),
        },
      ]);

      expect(applied).toEqual([2]);
      expect(schemaVersion(db)).toBe(2);
      const indexes = db
        .prepare("SELECT name FROM sqlite_master WHERE type='index' AND name='idx_kv_updated_at'")
        .all();
      expect(indexes).toHaveLength(1);
    });

    it('should leave the version unchanged when a migration fails', () => {
      const failing = [
        ...schemaMigrations,
        {
          version: 2,
          name: 'broken',
          apply: (target: BetterSqlite3.Database) => target.exec('CREATE TABLE kv (key TEXT)'),
        },
      ];

      expect(() => runMigrations(db, failing)).toThrow();
      expect(schemaVersion(db)).toBe(1);
    });
  });

  describe('openDatabase', () => {
    it('should open an in-memory database with migrations applied', () => {
      const memory = openDatabase(':memory:');
      const tables = memory
        .prepare("SELECT name FROM sqlite_master WHERE type='table' AND name='kv'")
        .all();
      expect(tables).toHaveLength(1);
      memory.close();
    });
  });

  describe('SqliteKeyValueStore', () => {
    let kv: SqliteKeyValueStore;

    beforeEach(() => {
      kv = new SqliteKeyValueStore(db);
    });

    it('should store and read back a value', async () => {
      await kv.put('monitoring/nodes/n1', '{"a":1}');
      expect(await kv.get('monitoring/nodes/n1')).toBe('{"a":1}');
    });

    it('should overwrite an existing key', async () => {
      await kv.put('k', 'first');
      await kv.put('k', 'second');

      expect(await kv.get('k')).toBe('second');
      const count = db.prepare('SELECT COUNT(*) as count FROM kv').get() as { count: number };
      expect(count.count).toBe(1);
    });

    it('should throw NotFoundError for a missing key', async () => {
      await expect(kv.get('missing')).rejects.toThrow(NotFoundError);
      await expect(kv.get('missing')).rejects.toThrow('Not found: missing');
    });

    it('should list by exact prefix in key order', async () => {
      await kv.put('monitoring/socs/10.0.0.210', 's2');
      await kv.put('monitoring/socs/10.0.0.200', 's1');
      await kv.put('monitoring/nodes/n1', 'n');
      await kv.put('Monitoring/socs/upper', 'x');
      await kv.put('monitoring_socs_lookalike', 'y');

      expect(await kv.listByPrefix('monitoring/socs/')).toEqual([
        { key: 'monitoring/socs/10.0.0.200', value: 's1' },
        { key: 'monitoring/socs/10.0.0.210', value: 's2' },
      ]);
    });

    it('should treat wildcard characters in a prefix literally', async () => {
      await kv.put('a_b/1', 'match');
      await kv.put('axb/1', 'other');
      await kv.put('a%/1', 'percent');

      expect(await kv.listByPrefix('a_b/')).toEqual([{ key: 'a_b/1', value: 'match' }]);
    });

    it('should delete a key and ignore a missing one', async () => {
      await kv.put('k', 'v');
      await kv.delete('k');
      await kv.delete('never-there');

      await expect(kv.get('k')).rejects.toThrow(NotFoundError);
    });

    it('should close the database once', () => {
      kv.close();
      expect(db.open).toBe(false);
      expect(() => kv.close()).not.toThrow();
    });
  });
});
