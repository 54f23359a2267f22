import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';

export type Db = Database.Database;

/**
 * Open (or create) the ledger database and make sure the schema exists.
 * Pass ':memory:' for a throwaway database.
 */
export function openDatabase(file: string): Db {
  if (file !== ':memory:') {
    fs.mkdirSync(path.dirname(file), { recursive: true });
  }

  const db = new Database(file);

  // Enable WAL mode for better performance
  if (file !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  // Child rows go away with their user
  db.pragma('foreign_keys = ON');

  db.exec(`
    CREATE TABLE IF NOT EXISTS users (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL DEFAULT '',
      username TEXT NOT NULL UNIQUE,
      password TEXT NOT NULL,
      currency TEXT NOT NULL DEFAULT 'UAH',
      created TEXT NOT NULL DEFAULT (date('now', 'localtime'))
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS transactions (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      type TEXT NOT NULL CHECK (type IN ('income', 'expense')),
      category TEXT NOT NULL DEFAULT 'Other',
      amount REAL NOT NULL DEFAULT 0,
      payment_method TEXT NOT NULL DEFAULT 'Cash',
      date TEXT NOT NULL,
      description TEXT NOT NULL DEFAULT ''
    )
  `);

  // Create index on (user, date) for the per-user listings
  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_transactions_user_date ON transactions(user_id, date)
  `);

  // No UNIQUE(user_id, category): saveBudget keeps categories 1:1
  db.exec(`
    CREATE TABLE IF NOT EXISTS budgets (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      category TEXT NOT NULL,
      amount REAL NOT NULL DEFAULT 0
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS goals (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      name TEXT NOT NULL,
      target REAL NOT NULL DEFAULT 0,
      current REAL NOT NULL DEFAULT 0,
      deadline TEXT DEFAULT NULL
    )
  `);

  // express-session rows; expires is epoch milliseconds
  db.exec(`
    CREATE TABLE IF NOT EXISTS sessions (
      sid TEXT PRIMARY KEY,
      sess TEXT NOT NULL,
      expires INTEGER NOT NULL
    )
  `);

  return db;
}

/** Liveness probe; throws whatever the driver throws */
export function pingDatabase(db: Db): void {
  db.prepare('SELECT 1').get();
}

// Row shapes as stored

export interface UserRow {
  id: number;
  name: string;
  username: string;
  password: string;
  currency: string;
  created: string;
}

export interface TransactionRow {
  id: number;
  user_id: number;
  type: string;
  category: string;
  amount: number;
  payment_method: string;
  date: string;
  description: string;
}

export interface BudgetRow {
  id: number;
  user_id: number;
  category: string;
  amount: number;
}

export interface GoalRow {
  id: number;
  user_id: number;
  name: string;
  target: number;
  current: number;
  deadline: string | null;
}
