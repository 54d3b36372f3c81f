import Database from 'better-sqlite3';
import { createLogger } from '../utils/logger.js';
import { join, dirname as pathDirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { mkdirSync } from 'node:fs';

const __filename = fileURLToPath(import.meta.url);
const __dirname = pathDirname(__filename);

const logger = createLogger({ component: 'database' });

export const DEFAULT_DATABASE_PATH = join(__dirname, '../../data', 'sleep-diary.db');

let db: Database.Database | null = null;

export function getDatabase(dbPath: string = DEFAULT_DATABASE_PATH): Database.Database {
  if (db) {
    return db;
  }
  db = openDatabase(dbPath);
  return db;
}

/** Opens (creating if needed) and migrates a database. `:memory:` is accepted. */
export function openDatabase(dbPath: string): Database.Database {
  logger.info({ dbPath }, 'Initializing database');

  if (dbPath !== ':memory:') {
    mkdirSync(pathDirname(dbPath), { recursive: true });
  }

  const database = new Database(dbPath);
  if (dbPath !== ':memory:') {
    database.pragma('journal_mode = WAL');
  }
  database.pragma('foreign_keys = ON');

  runMigrations(database);
  return database;
}

export function runMigrations(database: Database.Database): void {
  logger.info('Running database migrations');

  // Single-row table: one diary per database
  database.exec(`
    CREATE TABLE IF NOT EXISTS diary_profile (
      id INTEGER PRIMARY KEY CHECK (id = 1),
      name TEXT NOT NULL,
      created_on TEXT NOT NULL,
      updated_at INTEGER DEFAULT (strftime('%s', 'now'))
    );
  `);

  database.exec(`
    CREATE TABLE IF NOT EXISTS diary_entries (
      log_date TEXT PRIMARY KEY,
      bedtime TEXT,
      lights_off TEXT,
      sleep_onset TEXT,
      final_wake TEXT,
      rise_time TEXT,
      awakenings TEXT NOT NULL DEFAULT '[]',
      naps TEXT NOT NULL DEFAULT '[]',
      notes TEXT,
      updated_at INTEGER DEFAULT (strftime('%s', 'now'))
    );
  `);

  database.exec(`
    CREATE TABLE IF NOT EXISTS window_history (
      effective_from TEXT PRIMARY KEY,
      target_wake_time TEXT NOT NULL,
      duration_minutes INTEGER NOT NULL,
      rationale TEXT NOT NULL,
      created_at INTEGER DEFAULT (strftime('%s', 'now'))
    );
  `);

  logger.info('Database migrations completed');
}

export function closeDatabase(): void {
  if (db) {
    logger.info('Closing database connection');
    db.close();
    db = null;
  }
}
