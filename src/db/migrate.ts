import fs from 'node:fs';
import path from 'node:path';
import type { Db } from './db.js';
import { DbError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { getPackageRoot } from '../shared/utils.js';

export interface Migration {
  name: string;
  sql: string;
}

export interface MigrationResult {
  applied: string[];
  skipped: string[];
}

export function migrationsDir(): string {
  return path.join(getPackageRoot(), 'src', 'db', 'migrations');
}

/** `NNN_name.sql` files in lexical order. */
export function readMigrations(dir: string = migrationsDir()): Migration[] {
  if (!fs.existsSync(dir)) {
    throw new DbError(`Migrations directory not found: ${dir}`);
  }
  return fs
    .readdirSync(dir)
    .filter((f) => f.endsWith('.sql'))
    .sort()
    .map((name) => ({ name, sql: fs.readFileSync(path.join(dir, name), 'utf-8') }));
}

/**
 * Apply every migration not yet recorded in `_migrations`, each in its own
 * transaction together with its bookkeeping row.
 */
export function runMigrations(db: Db, migrations: readonly Migration[] = readMigrations()): MigrationResult {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      name       TEXT PRIMARY KEY,
      applied_at INTEGER NOT NULL
    );
  `);

  const done = new Set(
    db
      .prepare<[], { name: string }>('SELECT name FROM _migrations')
      .all()
      .map((r) => r.name),
  );
  const record = db.prepare<[string, number]>('INSERT INTO _migrations (name, applied_at) VALUES (?, ?)');

  const result: MigrationResult = { applied: [], skipped: [] };
  for (const migration of migrations) {
    if (done.has(migration.name)) {
      result.skipped.push(migration.name);
      continue;
    }

    try {
      db.transaction(() => {
        db.exec(migration.sql);
        record.run(migration.name, Date.now());
      })();
    } catch (err) {
      throw new DbError(`Migration failed: ${migration.name}`, {
        migration: migration.name,
        cause: err instanceof Error ? err.message : String(err),
      });
    }
    result.applied.push(migration.name);
    logger.debug({ migration: migration.name }, 'Migration applied');
  }

  return result;
}
