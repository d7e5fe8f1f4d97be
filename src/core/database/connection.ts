/**
 * Database connection management
 */

import Database from "better-sqlite3";
import { type BetterSQLite3Database, drizzle } from "drizzle-orm/better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import * as schema from "../../../schema";
import { DB_CONSTANTS } from "../constants/index";
import { initSchema } from "./schema";

export type MovieDb = BetterSQLite3Database<typeof schema>;

/**
 * Database connection handles
 */
export interface DbHandles {
  sqlite: Database.Database;
  db: MovieDb;
}

/**
 * Opens a database connection with optimized settings and initializes schema
 * @param dbPath - Path to the SQLite database file, or ":memory:"
 */
export function openDb(dbPath: string): DbHandles {
  if (dbPath !== ":memory:") {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }
  const sqlite = new Database(dbPath);
  sqlite.pragma(`journal_mode = ${DB_CONSTANTS.JOURNAL_MODE}`);
  sqlite.pragma(`synchronous = ${DB_CONSTANTS.SYNCHRONOUS}`);
  sqlite.pragma("foreign_keys = ON");
  sqlite.pragma(`cache_size = ${DB_CONSTANTS.CACHE_SIZE}`);
  sqlite.pragma("temp_store = MEMORY");
  sqlite.pragma(`mmap_size = ${DB_CONSTANTS.MMAP_SIZE}`);
  initSchema(sqlite);
  return { sqlite, db: drizzle(sqlite, { schema }) };
}

/**
 * Closes a database connection
 */
export function closeDb(h: DbHandles): void {
  h.sqlite.close();
}
