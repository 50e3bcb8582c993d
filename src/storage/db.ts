/**
 * SQLite connection for the vector and lexical stores.
 */

import Database from 'better-sqlite3';
import { mkdirSync, readFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { resolvePath } from '../config/workspace-config.js';
import { StorageError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('db');

export type Db = Database.Database;

/** Version written by the current schema.sql. */
export const SCHEMA_VERSION = 1;

const SCHEMA_URL = new URL('./schema.sql', import.meta.url);

/** Schema DDL, read from schema.sql beside this module. */
export function readSchema(): string {
  return readFileSync(SCHEMA_URL, 'utf-8');
}

/**
 * Open (creating if needed) a database and apply the schema.
 *
 * @param path - File path (`~` expanded) or ':memory:'
 */
export function openDatabase(path: string = ':memory:'): Db {
  const inMemory = path === ':memory:';
  const resolvedPath = inMemory ? path : resolvePath(path);

  let db: Db;
  try {
    if (!inMemory) {
      mkdirSync(dirname(resolvedPath), { recursive: true });
    }
    db = new Database(resolvedPath);
  } catch (error) {
    throw new StorageError(`Failed to open database at ${resolvedPath}`, 'DB_OPEN_FAILED', error);
  }

  db.pragma('foreign_keys = ON');
  if (!inMemory) {
    // WAL lets the HTTP server read while the CLI indexes
    db.pragma('journal_mode = WAL');
  }

  applySchema(db);
  log.debug('Database opened', { path: resolvedPath });
  return db;
}

/**
 * Apply schema.sql. Every statement is idempotent.
 */
export function applySchema(db: Db): void {
  const apply = db.transaction(() => {
    db.exec(readSchema());
    db.prepare('INSERT OR IGNORE INTO schema_version (version) VALUES (?)').run(SCHEMA_VERSION);
  });
  apply();
}

/**
 * Get current schema version.
 */
export function getSchemaVersion(db: Db): number {
  const row = db
    .prepare<[], { version: number | null }>('SELECT MAX(version) as version FROM schema_version')
    .get();
  return row?.version ?? 0;
}
