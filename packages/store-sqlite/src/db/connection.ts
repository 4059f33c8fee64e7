/**
 * SQLite database connection for the parcel store.
 *
 * PRAGMAs applied on every new connection:
 *   1. journal_mode = WAL (file databases only)
 *   2. foreign_keys = ON
 *   3. busy_timeout = 5000
 */

import Database from 'better-sqlite3';
import type { Database as DatabaseType } from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema.js';

export interface DatabaseConnection {
  sqlite: DatabaseType;
  db: BetterSQLite3Database<typeof schema>;
}

export const IN_MEMORY = ':memory:';

/**
 * Create the parcel table and its indexes if they do not exist yet.
 */
export function ensureParcelSchema(sqlite: DatabaseType): void {
  sqlite.exec(schema.PARCEL_SCHEMA_SQL);
}

/**
 * Open a SQLite database with the PRAGMAs applied and the parcel schema in place.
 *
 * @param dbPath - Path to the SQLite database file, or ':memory:' for in-memory.
 */
export function createDatabase(dbPath: string = IN_MEMORY): DatabaseConnection {
  const sqlite = new Database(dbPath);

  if (dbPath !== IN_MEMORY) {
    sqlite.pragma('journal_mode = WAL');
  }
  sqlite.pragma('foreign_keys = ON');
  sqlite.pragma('busy_timeout = 5000');

  ensureParcelSchema(sqlite);

  const db = drizzle(sqlite, { schema });
  return { sqlite, db };
}

/**
 * Close the connection. File databases get a WAL checkpoint first.
 * Closing an already closed connection does nothing.
 */
export function closeDatabase(sqlite: DatabaseType): void {
  if (!sqlite.open) return;
  if (!sqlite.memory) {
    sqlite.pragma('wal_checkpoint(TRUNCATE)');
  }
  sqlite.close();
}
