import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'libsql';
import {
  MIGRATIONS,
  MigrationError,
  runMigrations,
  runMigrationsWithRollback,
} from './migrations.js';

function tableNames(db: Database.Database): string[] {
  const rows = db
    .prepare("SELECT name FROM sqlite_master WHERE type='table' ORDER BY name")
    .all() as { name: string }[];
  return rows.map(r => r.name);
}

function columnNames(db: Database.Database, table: string): string[] {
  const rows = db.prepare(`PRAGMA table_info(${table})`).all() as { name: string }[];
  return rows.map(r => r.name);
}

describe('migrations', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = new Database(':memory:');
  });

  afterEach(() => {
    db.close();
  });

  it('applies every migration once', () => {
    const first = runMigrations(db);
    const second = runMigrations(db);

    expect(first.applied).toEqual(MIGRATIONS.map(m => m.id));
    expect(second.applied).toEqual([]);
    expect(second.skipped).toEqual(MIGRATIONS.map(m => m.id));
  });

  it('creates the fact tables', () => {
    runMigrations(db);

    expect(columnNames(db, 'tasks')).toEqual(
      expect.arrayContaining(['id', 'description', 'lifecycle', 'queue_position', 'tags'])
    );
    expect(columnNames(db, 'sessions')).toEqual(
      expect.arrayContaining(['id', 'task_id', 'start_ts', 'end_ts', 'origin'])
    );
    expect(columnNames(db, 'externals')).toEqual(
      expect.arrayContaining(['task_id', 'recipient', 'note', 'sent_ts', 'status', 'collected_ts'])
    );
    expect(columnNames(db, 'annotations')).toEqual(
      expect.arrayContaining(['task_id', 'session_id', 'note', 'entry_ts'])
    );
  });

  describe('schema constraints', () => {
    beforeEach(() => {
      runMigrations(db);
      db.prepare("INSERT INTO tasks (description, created_ts, modified_ts) VALUES ('a', 1, 1)").run();
      db.prepare("INSERT INTO tasks (description, created_ts, modified_ts) VALUES ('b', 1, 1)").run();
    });

    it('rejects duplicate queue positions', () => {
      db.prepare('UPDATE tasks SET queue_position = 0 WHERE id = 1').run();
      expect(() => db.prepare('UPDATE tasks SET queue_position = 0 WHERE id = 2').run()).toThrow();
    });

    it('rejects a second open session', () => {
      db.prepare('INSERT INTO sessions (task_id, start_ts, created_ts) VALUES (1, 10, 10)').run();
      expect(() =>
        db.prepare('INSERT INTO sessions (task_id, start_ts, created_ts) VALUES (2, 20, 20)').run()
      ).toThrow();
    });

    it('allows any number of closed sessions', () => {
      db.prepare('INSERT INTO sessions (task_id, start_ts, end_ts, created_ts) VALUES (1, 10, 20, 10)').run();
      db.prepare('INSERT INTO sessions (task_id, start_ts, end_ts, created_ts) VALUES (1, 30, 40, 30)').run();
      db.prepare('INSERT INTO sessions (task_id, start_ts, created_ts) VALUES (2, 50, 50)').run();
      const row = db.prepare('SELECT COUNT(*) AS n FROM sessions').get() as { n: number };
      expect(row.n).toBe(3);
    });

    it('rejects two waiting records for one task', () => {
      db.prepare("INSERT INTO externals (task_id, recipient, sent_ts) VALUES (1, 'alice', 1)").run();
      expect(() =>
        db.prepare("INSERT INTO externals (task_id, recipient, sent_ts) VALUES (1, 'bob', 2)").run()
      ).toThrow();
    });

    it('makes the events table append-only', () => {
      db.prepare(
        "INSERT INTO events (event_id, task_id, type, data, timestamp) VALUES ('E1', 1, 'task_created', '{}', 1)"
      ).run();
      expect(() => db.prepare("UPDATE events SET type = 'x'").run()).toThrow(/append-only/);
      expect(() => db.prepare('DELETE FROM events').run()).toThrow(/append-only/);
    });
  });

  it('registers the projects tasks already use', () => {
    runMigrationsWithRollback(db, MIGRATIONS.slice(0, 2));
    db.prepare("INSERT INTO tasks (description, project, created_ts, modified_ts) VALUES ('a', 'home', 10, 40)").run();
    db.prepare("INSERT INTO tasks (description, project, created_ts, modified_ts) VALUES ('b', 'home', 20, 30)").run();
    db.prepare("INSERT INTO tasks (description, created_ts, modified_ts) VALUES ('c', 5, 5)").run();

    const result = runMigrations(db);

    expect(result.applied).toEqual(['0003_projects']);
    expect(db.prepare('SELECT name, archived, created_ts, modified_ts FROM projects').all()).toEqual([
      { name: 'home', archived: 0, created_ts: 10, modified_ts: 40 },
    ]);
  });

  it('rolls back every pending migration when one fails', () => {
    const migrations = [
      { id: '0001_ok', up: 'CREATE TABLE first_table (id INTEGER);' },
      { id: '0002_broken', up: 'CREATE TABLE broken (' },
    ];

    expect(() => runMigrationsWithRollback(db, migrations)).toThrow(MigrationError);
    expect(tableNames(db)).not.toContain('first_table');
    const applied = db.prepare('SELECT migration_id FROM schema_migrations').all();
    expect(applied).toEqual([]);
  });
});
