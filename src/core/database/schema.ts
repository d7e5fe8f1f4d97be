/**
 * Database schema initialization and migrations
 */

import type Database from "better-sqlite3";

/**
 * Creates the tables and indexes described in /schema.ts when missing and
 * adds columns that older databases lack
 * @param db - Database connection to initialize
 */
export function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS movies (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      product_id TEXT,
      title TEXT NOT NULL,
      format TEXT NOT NULL,
      url TEXT NOT NULL,
      image_url TEXT,
      production_year INTEGER,
      tmdb_id INTEGER,
      content_type TEXT NOT NULL DEFAULT 'movie',
      available INTEGER NOT NULL DEFAULT 1,
      first_seen TEXT NOT NULL,
      last_updated TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS price_history (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      movie_id INTEGER NOT NULL,
      product_id TEXT,
      price REAL NOT NULL,
      availability TEXT,
      checked_at TEXT NOT NULL,
      FOREIGN KEY (movie_id) REFERENCES movies(id)
    );

    CREATE TABLE IF NOT EXISTS watchlist (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      movie_id INTEGER NOT NULL UNIQUE,
      product_id TEXT,
      target_price REAL NOT NULL,
      notify_on_availability INTEGER NOT NULL DEFAULT 1,
      created_at TEXT NOT NULL,
      FOREIGN KEY (movie_id) REFERENCES movies(id)
    );

    CREATE TABLE IF NOT EXISTS price_alerts (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      movie_id INTEGER NOT NULL,
      product_id TEXT,
      old_price REAL NOT NULL,
      new_price REAL NOT NULL,
      alert_type TEXT NOT NULL,
      created_at TEXT NOT NULL,
      notified INTEGER NOT NULL DEFAULT 0,
      FOREIGN KEY (movie_id) REFERENCES movies(id)
    );

    CREATE TABLE IF NOT EXISTS ignored_movies (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      movie_id INTEGER NOT NULL UNIQUE,
      product_id TEXT,
      ignored_at TEXT NOT NULL,
      FOREIGN KEY (movie_id) REFERENCES movies(id)
    );
  `);

  // --- lightweight migration: add missing columns on existing DBs ---
  const cols = columnNames(db, "movies");
  if (!cols.has("production_year")) {
    db.exec(`ALTER TABLE movies ADD COLUMN production_year INTEGER`);
  }
  if (!cols.has("tmdb_id")) {
    db.exec(`ALTER TABLE movies ADD COLUMN tmdb_id INTEGER`);
  }
  if (!cols.has("content_type")) {
    db.exec(
      `ALTER TABLE movies ADD COLUMN content_type TEXT NOT NULL DEFAULT 'movie'`,
    );
  }

  db.exec(`
    CREATE UNIQUE INDEX IF NOT EXISTS ux_movies_product_id ON movies(product_id);
    CREATE INDEX IF NOT EXISTS idx_movies_title_format ON movies(title, format);
    CREATE INDEX IF NOT EXISTS idx_price_history_movie ON price_history(movie_id);
    CREATE INDEX IF NOT EXISTS idx_price_alerts_notified ON price_alerts(notified);
  `);
}

function columnNames(db: Database.Database, table: string): Set<string> {
  const rows: unknown[] = db.prepare(`PRAGMA table_info(${table})`).all();
  const names = new Set<string>();
  for (const row of rows) {
    if (typeof row === "object" && row !== null && "name" in row && typeof row.name === "string") {
      names.add(row.name);
    }
  }
  return names;
}
