import Database from 'libsql';
import path from 'path';
import fs from 'fs';
import { runMigrations } from './migrations.js';

export const MEMORY_DB = ':memory:';

/**
 * Open (creating if needed) a docket database and migrate it.
 */
export function createConnection(dbPath: string = MEMORY_DB): Database.Database {
  if (dbPath !== MEMORY_DB) {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(dbPath);
  runMigrations(db);
  return db;
}
