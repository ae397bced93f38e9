import Database from 'better-sqlite3';
import type BetterSqlite3 from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';
import { fileURLToPath } from 'url';

// Get __dirname equivalent in ES modules
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Use isolated test DB when running tests, otherwise use production/dev DB.
const dbPath = process.env.NODE_ENV === 'test'
  ? path.join(__dirname, '../data/quote_poster_test.db')
  : process.env.DB_PATH ?? path.join(__dirname, '../data/quote_poster.db');

fs.mkdirSync(path.dirname(dbPath), { recursive: true });

const db: BetterSqlite3.Database = new Database(dbPath);

// Set WAL for better performance
db.pragma('journal_mode = WAL');

// Schedule state is in-memory only; this table is the operator-visible
// record of deliveries and failures behind the get_logs command.
db.exec(`
  CREATE TABLE IF NOT EXISTS activity_log (
    id TEXT PRIMARY KEY,
    level TEXT NOT NULL CHECK(level IN ('info', 'error')),
    event TEXT NOT NULL,
    destination TEXT,
    message TEXT NOT NULL,
    created_at TEXT NOT NULL
  )
`);

db.exec(`
  CREATE INDEX IF NOT EXISTS idx_activity_log_level_created
    ON activity_log(level, created_at)
`);

export const generateUUID = (): string => {
  return randomUUID();
};

export default db;
