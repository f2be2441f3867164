import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database, { type Database as DatabaseType } from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema.js';

export type AppDatabase = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  sqlite: DatabaseType;
  db: AppDatabase;
}

/**
 * Open a SQLite database and wrap it in a typed Drizzle instance.
 * Pass ':memory:' for an ephemeral database (tests).
 */
export function openDatabase(path: string): DatabaseHandle {
  if (path !== ':memory:') {
    // Ensure the data directory exists before opening the database file
    mkdirSync(dirname(path), { recursive: true });
  }

  const sqlite: DatabaseType = new Database(path);

  // WAL lets the API read while camera loops write
  sqlite.pragma('journal_mode = WAL');

  // - synchronous = NORMAL: Safe in WAL mode, skips fsync on most writes
  // - busy_timeout: wait for a competing writer instead of failing with SQLITE_BUSY
  // - temp_store = MEMORY: Temp tables and indices kept in RAM
  sqlite.pragma('synchronous = NORMAL');
  sqlite.pragma('busy_timeout = 5000');
  sqlite.pragma('temp_store = MEMORY');

  const db = drizzle(sqlite, { schema });
  return { sqlite, db };
}
