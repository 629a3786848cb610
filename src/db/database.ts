import Database, { type Database as DatabaseType } from "better-sqlite3";
import path from "path";
import fs from "fs";
import { config } from "../config.js";
import { logDb } from "../logging.js";
import { MARKET_SCHEMA_SQL } from "./schema.js";

/**
 * Open a SQLite database and apply the schema. `:memory:` gives a private
 * throwaway database (tests); any other path is created with its parent dir.
 */
export function openDatabase(dbPath: string): DatabaseType {
  if (dbPath !== ":memory:") {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  }

  const db = new Database(dbPath);

  // WAL mode prevents event loop blocking during concurrent reads/writes
  db.pragma("journal_mode = WAL");
  db.pragma("synchronous = NORMAL");
  db.pragma("foreign_keys = ON");

  db.exec(MARKET_SCHEMA_SQL);
  return db;
}

let shared: DatabaseType | null = null;

/** Process-wide connection at config.db.path, opened on first use. */
export function getDb(): DatabaseType {
  if (shared === null) {
    shared = openDatabase(config.db.path);
    logDb.info({ path: config.db.path }, "Database opened");
  }
  return shared;
}

export function closeDb(): void {
  if (shared === null) return;
  shared.close();
  shared = null;
  logDb.info("Database closed");
}
