import fs from 'node:fs';
import path from 'node:path';
import { config } from '../config/env';
import { logger } from './logger';
import { getDatabase, persistDatabase } from './db';

/**
 * Applies every `*.sql` file in the migrations directory that has not been
 * recorded in `schema_migrations`, in file-name order. Each file runs in its
 * own transaction together with its bookkeeping row.
 */
export function runMigrations(dir: string = config.MIGRATIONS_DIR): string[] {
  const { sqlite } = getDatabase();
  const migrationsDir = path.resolve(process.cwd(), dir);

  sqlite.run('CREATE TABLE IF NOT EXISTS schema_migrations (name TEXT PRIMARY KEY, applied_at INTEGER NOT NULL)');

  const applied = new Set(
    sqlite.exec('SELECT name FROM schema_migrations').flatMap((result) => result.values.map((row) => String(row[0])))
  );

  const pending = fs
    .readdirSync(migrationsDir)
    .filter((file) => file.endsWith('.sql') && !applied.has(file))
    .sort();

  for (const file of pending) {
    const sql = fs.readFileSync(path.join(migrationsDir, file), 'utf8');
    sqlite.run('BEGIN');
    try {
      sqlite.exec(sql);
      sqlite.run('INSERT INTO schema_migrations (name, applied_at) VALUES (?, ?)', [file, Date.now()]);
      sqlite.run('COMMIT');
    } catch (err) {
      sqlite.run('ROLLBACK');
      throw err;
    }
    logger.info({ event: 'db.migration.applied', migration: file }, `Applied migration ${file}`);
  }

  if (pending.length > 0) {
    persistDatabase();
  }
  return pending;
}
