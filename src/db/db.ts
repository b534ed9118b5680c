import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { resolvePath } from '../shared/utils.js';
import { DbError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { runMigrations } from './migrate.js';

export type Db = Database.Database;

/**
 * Open (creating if needed) the cache database and bring its schema up to date.
 * Callers own the handle and must `close()` it.
 */
export function openDb(dbPath: string): Db {
  const resolved = dbPath === ':memory:' ? ':memory:' : resolvePath(dbPath);

  let db: Db;
  try {
    if (resolved !== ':memory:') {
      fs.mkdirSync(path.dirname(resolved), { recursive: true });
    }
    db = new Database(resolved);
    db.pragma('journal_mode = WAL');
    db.pragma('busy_timeout = 5000');
  } catch (err) {
    throw new DbError(`Failed to initialize database at ${resolved}`, {
      path: resolved,
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  try {
    runMigrations(db);
  } catch (err) {
    db.close();
    throw err;
  }

  logger.debug({ path: resolved }, 'Database initialized');
  return db;
}
