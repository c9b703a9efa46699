import fs from 'node:fs';
import path from 'node:path';
import crypto from 'node:crypto';
import initSqlJs, { type Database } from 'sql.js';
import { drizzle, type SQLJsDatabase } from 'drizzle-orm/sql-js';
import type { Logger as DrizzleLogger } from 'drizzle-orm';
import { config } from '../config/env';
import { logger } from './logger';
import * as schema from './schema';

export type Db = SQLJsDatabase<typeof schema>;

export type DatabaseHandle = {
  sqlite: Database;
  db: Db;
  // Absolute path of the backing file, null for ":memory:".
  file: string | null;
};

// Query logging:
// - Dev: log query text (truncated), never params
// - Elsewhere: nothing, SQL text can carry message bodies
class QueryLogger implements DrizzleLogger {
  logQuery(query: string): void {
    const qhash = crypto.createHash('sha256').update(query).digest('hex').slice(0, 12);
    logger.debug({ qhash }, `[SQL] ${query.slice(0, 200)}`);
  }
}

let handle: DatabaseHandle | null = null;
let pending: Promise<DatabaseHandle> | null = null;
let flushTimer: NodeJS.Timeout | null = null;

function applyPragmas(sqlite: Database): void {
  sqlite.run('PRAGMA foreign_keys = ON');
}

async function open(url: string): Promise<DatabaseHandle> {
  const SQL = await initSqlJs();
  const file = url === ':memory:' ? null : path.resolve(process.cwd(), url);
  const sqlite = file && fs.existsSync(file) ? new SQL.Database(fs.readFileSync(file)) : new SQL.Database();
  applyPragmas(sqlite);

  const db: Db = drizzle(sqlite, {
    schema,
    logger: config.NODE_ENV === 'development' ? new QueryLogger() : false,
  });

  if (file) {
    flushTimer = setInterval(persistDatabase, config.DB_FLUSH_INTERVAL_MS);
    flushTimer.unref();
  }

  logger.info({ event: 'db.opened', file: file ?? ':memory:' }, 'Database opened');
  return { sqlite, db, file };
}

/**
 * Loads the SQLite engine and opens `DATABASE_URL`, reading an existing file
 * into memory. Call once at startup; later calls return the same handle.
 */
export async function initDatabase(url: string = config.DATABASE_URL): Promise<DatabaseHandle> {
  if (handle) return handle;
  if (!pending) {
    pending = open(url)
      .then((opened) => {
        handle = opened;
        return opened;
      })
      .finally(() => {
        pending = null;
      });
  }
  return pending;
}

/**
 * Returns the open database.
 * Throws if initDatabase() hasn't been called.
 */
export function getDatabase(): DatabaseHandle {
  if (!handle) {
    throw new Error('Database not initialized. Call initDatabase() at startup.');
  }
  return handle;
}

export function getDb(): Db {
  return getDatabase().db;
}

/**
 * Writes the in-memory image to the backing file (temp file + rename).
 * No-op for ":memory:".
 */
export function persistDatabase(): void {
  if (!handle?.file) return;
  const { sqlite, file } = handle;

  const image = sqlite.export();
  // export() reopens the connection, which resets pragmas.
  applyPragmas(sqlite);

  const tmp = `${file}.tmp`;
  fs.writeFileSync(tmp, image);
  fs.renameSync(tmp, file);
}

export function closeDatabase(): void {
  if (!handle) return;
  if (flushTimer) {
    clearInterval(flushTimer);
    flushTimer = null;
  }
  persistDatabase();
  handle.sqlite.close();
  handle = null;
}
