import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';

export type SqliteDatabase = Database.Database;

export const DATABASE_FILE = 'space-guard.db';

/**
 * Open (and initialize) the state database. Pass ':memory:' for an
 * ephemeral database.
 */
export function openDatabase(location: string): SqliteDatabase {
  let dbPath = location;
  if (location !== ':memory:') {
    // Ensure data directory exists
    if (!fs.existsSync(location)) {
      fs.mkdirSync(location, { recursive: true });
    }
    dbPath = path.join(location, DATABASE_FILE);
  }

  const db = new Database(dbPath);

  // Enable WAL mode for better concurrency
  db.pragma('journal_mode = WAL');

  initSchema(db);
  return db;
}

export function initSchema(db: SqliteDatabase): void {
  // Items paused by the scheduler itself (never by the user)
  db.exec(`
    CREATE TABLE IF NOT EXISTS managed_pauses (
      downloader_id TEXT NOT NULL,
      hash TEXT NOT NULL,
      name TEXT NOT NULL,
      directory TEXT NOT NULL,
      paused_at INTEGER NOT NULL,
      size_remaining INTEGER NOT NULL DEFAULT 0,
      free_at_pause INTEGER NOT NULL DEFAULT 0,
      PRIMARY KEY (downloader_id, hash)
    )
  `);

  // Migration: Add free_at_pause column to ledgers created before it existed
  const pauseColumns = db.prepare<[], { name: string }>('PRAGMA table_info(managed_pauses)').all();
  if (!pauseColumns.some((column) => column.name === 'free_at_pause')) {
    db.exec('ALTER TABLE managed_pauses ADD COLUMN free_at_pause INTEGER NOT NULL DEFAULT 0');
  }

  db.exec(`
    CREATE TABLE IF NOT EXISTS cycle_reports (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      downloader_id TEXT NOT NULL,
      trigger_kind TEXT NOT NULL,
      outcome TEXT NOT NULL,
      started_at INTEGER NOT NULL,
      finished_at INTEGER NOT NULL,
      report TEXT NOT NULL
    )
  `);

  // Indexes
  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_managed_pauses_directory ON managed_pauses(downloader_id, directory);
    CREATE INDEX IF NOT EXISTS idx_cycle_reports_downloader ON cycle_reports(downloader_id, id);
  `);

  console.log('[DB] Schema initialized');
}
