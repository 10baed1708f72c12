import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';

export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }
  const db = new Database(dbPath);
  if (dbPath !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  return db;
}

/** Creates the offers table (under a configurable name) and the run log if missing. */
export function initializeSchema(db: Database.Database, tableName: string): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS ${tableName} (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      source TEXT NOT NULL,
      name TEXT NOT NULL,
      url TEXT NOT NULL UNIQUE,
      description TEXT,
      analysis TEXT,
      offer_rating INTEGER DEFAULT 0,
      candidate_rating INTEGER DEFAULT 0,
      added_date TIMESTAMP DEFAULT CURRENT_TIMESTAMP
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS scrape_runs (
      id TEXT PRIMARY KEY,
      source TEXT NOT NULL,
      started_at TEXT NOT NULL,
      completed_at TEXT,
      status TEXT NOT NULL DEFAULT 'running',
      offers_found INTEGER DEFAULT 0,
      offers_new INTEGER DEFAULT 0,
      error TEXT
    )
  `);

  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_${tableName}_added ON ${tableName}(added_date);
    CREATE INDEX IF NOT EXISTS idx_${tableName}_source ON ${tableName}(source);
    CREATE INDEX IF NOT EXISTS idx_scrape_runs_started ON scrape_runs(started_at);
  `);
}
