/**
 * Drizzle ORM Database Setup
 * SQLite database using better-sqlite3
 */

import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import * as schema from './schema';

export type VectorDatabase = BetterSQLite3Database<typeof schema>;

const CREATE_PRODUCT_VECTORS = `
CREATE TABLE IF NOT EXISTS product_vectors (
  id TEXT PRIMARY KEY,
  embedding TEXT NOT NULL,
  metadata TEXT
)`;

/**
 * Open (or create) the vector database. Pass ":memory:" for an in-process database.
 */
export function openVectorDatabase(dbPath: string): VectorDatabase {
  if (dbPath !== ':memory:') {
    const dataDir = path.dirname(path.resolve(dbPath));
    if (!fs.existsSync(dataDir)) {
      fs.mkdirSync(dataDir, { recursive: true });
    }
  }

  const sqlite = new Database(dbPath);
  sqlite.pragma('journal_mode = WAL');
  sqlite.exec(CREATE_PRODUCT_VECTORS);
  return drizzle(sqlite, { schema });
}
