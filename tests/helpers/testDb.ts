/**
 * Test database harness
 *
 * Creates a fresh temporary SQLite file per test, applies the real
 * migrations and injects the connection into the db singleton so repos
 * work unchanged.
 *
 * Usage:
 *   const harness = createTestDb();
 *   // ... repos / ledger / runner ...
 *   harness.cleanup();
 */

import Database from "better-sqlite3";
import { mkdirSync, rmSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { applyPendingMigrations, setDbForTesting } from "@/db";

export interface TestDbHarness {
  db: Database.Database;
  dbPath: string;
  /** Close the connection, clear the singleton, delete the files */
  cleanup: () => void;
}

function tempDbPath(): string {
  const dir = join(tmpdir(), "deal-relay-tests");
  mkdirSync(dir, { recursive: true });
  const random = Math.random().toString(36).substring(2, 8);
  return join(dir, `test-${Date.now()}-${random}.db`);
}

export function createTestDb(): TestDbHarness {
  const dbPath = tempDbPath();
  const db = new Database(dbPath);
  db.pragma("foreign_keys = ON");
  applyPendingMigrations(db);
  setDbForTesting(db);

  const cleanup = () => {
    setDbForTesting(null);
    db.close();
    for (const suffix of ["", "-wal", "-shm"]) {
      rmSync(dbPath + suffix, { force: true });
    }
  };

  return { db, dbPath, cleanup };
}
