import type Database from 'libsql';
import crypto from 'crypto';
import { FACTS_SCHEMA_V1, EVENTS_SCHEMA_V1, PROJECTS_SCHEMA_V1, PRAGMAS } from './schema.js';

export interface Migration {
  id: string;
  up: string;
}

export interface MigrationResult {
  success: boolean;
  applied: string[];
  skipped: string[];
  error?: string;
}

export class MigrationError extends Error {
  constructor(
    message: string,
    public readonly failedMigration: string,
    public readonly rolledBack: string[]
  ) {
    super(message);
    this.name = 'MigrationError';
  }
}

export const MIGRATIONS: Migration[] = [
  { id: '0001_facts', up: FACTS_SCHEMA_V1 },
  { id: '0002_events', up: EVENTS_SCHEMA_V1 },
  { id: '0003_projects', up: PROJECTS_SCHEMA_V1 },
];

function computeChecksum(sql: string): string {
  return crypto.createHash('sha256').update(sql).digest('hex').slice(0, 16);
}

function ensureMigrationsTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      migration_id TEXT PRIMARY KEY,
      applied_at_ms INTEGER NOT NULL,
      checksum TEXT NOT NULL
    )
  `);
}

function getAppliedMigrations(db: Database.Database): Set<string> {
  const rows = db.prepare('SELECT migration_id FROM schema_migrations').all() as { migration_id: string }[];
  return new Set(rows.map(r => r.migration_id));
}

/**
 * Run migrations with atomic rollback on failure.
 * All pending migrations are run in a single transaction.
 * If any migration fails, ALL changes are rolled back.
 */
export function runMigrationsWithRollback(
  db: Database.Database,
  migrations: Migration[] = MIGRATIONS
): MigrationResult {
  ensureMigrationsTable(db);

  const applied: string[] = [];
  const skipped: string[] = [];
  const alreadyApplied = getAppliedMigrations(db);

  const pendingMigrations = migrations.filter(m => {
    if (alreadyApplied.has(m.id)) {
      skipped.push(m.id);
      return false;
    }
    return true;
  });

  if (pendingMigrations.length === 0) {
    return { success: true, applied, skipped };
  }

  db.exec('BEGIN IMMEDIATE');
  for (const migration of pendingMigrations) {
    try {
      db.exec(migration.up);
      db.prepare(
        'INSERT INTO schema_migrations (migration_id, applied_at_ms, checksum) VALUES (?, ?, ?)'
      ).run(migration.id, Date.now(), computeChecksum(migration.up));
      applied.push(migration.id);
    } catch (err) {
      db.exec('ROLLBACK');
      throw new MigrationError(
        `Migration ${migration.id} failed: ${err instanceof Error ? err.message : String(err)}`,
        migration.id,
        applied // applied before the failure, now rolled back
      );
    }
  }
  db.exec('COMMIT');

  return { success: true, applied, skipped };
}

/**
 * Apply connection pragmas and bring the schema up to date.
 */
export function runMigrations(db: Database.Database): MigrationResult {
  db.exec(PRAGMAS);
  return runMigrationsWithRollback(db, MIGRATIONS);
}
