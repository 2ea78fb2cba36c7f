import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { getEnv } from './env';

let db: Database.Database | null = null;

/**
 * Get or create the database connection
 */
export function getDb(): Database.Database {
  if (!db) {
    const dbPath = getEnv().DB_PATH;
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
    }

    db = new Database(dbPath);
    db.pragma('journal_mode = WAL');
    initSchema(db);
  }
  return db;
}

/**
 * Initialize database schema
 */
export function initSchema(database: Database.Database): void {
  database.exec(`
    CREATE TABLE IF NOT EXISTS scheduled_slots (
      slot_at INTEGER PRIMARY KEY,
      page_id TEXT,
      post_id TEXT,
      reserved_at INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS processed_posts (
      page_id TEXT NOT NULL,
      post_id TEXT NOT NULL,
      post_url TEXT NOT NULL,
      processed_at INTEGER NOT NULL,
      PRIMARY KEY (page_id, post_id)
    );
  `);
}

/**
 * Close the database connection
 */
export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}
