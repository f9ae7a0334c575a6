import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';

export type SqliteDatabase = Database.Database;
export type Statement<Params extends unknown[], Row = unknown> = Database.Statement<
  Params,
  Row
>;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS order_pages (
    market_id INTEGER NOT NULL,
    page INTEGER NOT NULL,
    total_pages INTEGER NOT NULL,
    fetched_at INTEGER NOT NULL,
    orders_json TEXT NOT NULL,
    PRIMARY KEY (market_id, page)
  );

  CREATE TABLE IF NOT EXISTS items (
    item_id INTEGER PRIMARY KEY,
    name TEXT NOT NULL,
    bulk REAL NOT NULL DEFAULT 1.0,
    placeholder INTEGER NOT NULL DEFAULT 0,
    fetched_at INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS opportunities (
    id TEXT PRIMARY KEY,
    scan_id TEXT NOT NULL,
    scanned_at INTEGER NOT NULL,
    source_market TEXT NOT NULL,
    destination_market TEXT NOT NULL,
    item_id INTEGER NOT NULL,
    item_name TEXT NOT NULL,
    item_bulk REAL NOT NULL,
    buy_price REAL NOT NULL,
    sell_price REAL NOT NULL,
    volume_available INTEGER NOT NULL,
    net_profit_per_unit REAL NOT NULL,
    profit_margin_pct REAL NOT NULL,
    total_profit_potential REAL NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_opportunities_route
    ON opportunities (source_market, destination_market);
`;

/**
 * Opens (creating if needed) the SQLite file holding the market cache and the
 * scan results. `:memory:` gives a private in-process database.
 */
export function openDatabase(filePath: string): SqliteDatabase {
  if (filePath !== ':memory:') {
    const dir = path.dirname(path.resolve(filePath));
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(filePath);
  db.pragma('journal_mode = WAL');
  db.exec(SCHEMA);
  return db;
}
