import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';

export type Db = Database.Database;

/**
 * Open (or create) the ledger database and make sure the schema exists.
 * Pass ':memory:' for a throwaway database.
 */
export function openDatabase(filename: string): Db {
  if (filename !== ':memory:') {
    fs.mkdirSync(path.dirname(path.resolve(filename)), { recursive: true });
  }

  const db = new Database(filename);

  // Enable WAL mode for better performance
  if (filename !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  // Required for ON DELETE SET NULL on transactions.category_id
  db.pragma('foreign_keys = ON');

  db.exec(`
    CREATE TABLE IF NOT EXISTS categories (
      id TEXT PRIMARY KEY,
      name TEXT NOT NULL UNIQUE CHECK (length(name) BETWEEN 1 AND 100),
      color TEXT,
      monthly_budget REAL CHECK (monthly_budget IS NULL OR monthly_budget >= 0)
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS transactions (
      id TEXT PRIMARY KEY,
      date TEXT NOT NULL,
      description TEXT NOT NULL CHECK (length(description) BETWEEN 1 AND 255),
      amount REAL NOT NULL CHECK (amount <> 0),
      category_id TEXT REFERENCES categories(id) ON DELETE SET NULL,
      created_at TEXT NOT NULL
    )
  `);

  // Window queries filter on date, alerts/breakdowns on date + category
  db.exec(`CREATE INDEX IF NOT EXISTS idx_transactions_date ON transactions(date)`);
  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_transactions_date_category
    ON transactions(date, category_id)
  `);

  // Settings table (single-row); the row itself is created lazily by the store
  db.exec(`
    CREATE TABLE IF NOT EXISTS settings (
      id INTEGER PRIMARY KEY CHECK (id = 1),
      global_monthly_budget REAL CHECK (global_monthly_budget IS NULL OR global_monthly_budget >= 0),
      updated_at TEXT NOT NULL
    )
  `);

  return db;
}

// Helper function to generate cuid-like IDs
export function generateId(): string {
  const timestamp = Date.now().toString(36);
  const randomPart = Math.random().toString(36).substring(2, 9);
  return `c${timestamp}${randomPart}`;
}

// Row shapes as stored
export interface CategoryRow {
  id: string;
  name: string;
  color: string | null;
  monthly_budget: number | null;
}

export interface TransactionRow {
  id: string;
  date: string;
  description: string;
  amount: number;
  category_id: string | null;
  created_at: string;
}

export interface SettingsRow {
  id: number;
  global_monthly_budget: number | null;
  updated_at: string;
}
