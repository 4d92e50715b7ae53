/**
 * SQLite database connection
 *
 * One process-wide connection, opened at startup by the runner.
 */

import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname, isAbsolute, join } from "path";
import { DEFAULT_DB_PATH } from "@/constants";

let db: Database.Database | null = null;

/**
 * Resolve the database file path (explicit > DB_PATH > default under cwd)
 * and make sure its directory exists
 */
function resolveDbPath(explicitPath?: string): string {
  const configured = explicitPath || process.env.DB_PATH || DEFAULT_DB_PATH;
  if (configured === ":memory:") {
    return configured;
  }

  const dbPath = isAbsolute(configured) ? configured : join(process.cwd(), configured);
  mkdirSync(dirname(dbPath), { recursive: true });
  return dbPath;
}

/**
 * Open database connection with required pragmas
 * Returns existing connection if already open
 */
export function openDb(dbPath?: string): Database.Database {
  if (db) {
    return db;
  }

  db = new Database(resolveDbPath(dbPath));
  db.pragma("foreign_keys = ON");
  db.pragma("journal_mode = WAL");

  return db;
}

export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * Get current database connection (must be opened first)
 */
export function getDb(): Database.Database {
  if (!db) {
    throw new Error("Database not opened. Call openDb() first.");
  }
  return db;
}

/**
 * Inject a database into the singleton
 *
 * @internal Test use only
 */
export function setDbForTesting(testDb: Database.Database | null): void {
  db = testDb;
}
