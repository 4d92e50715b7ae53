/**
 * Database migration runner
 *
 * Applies migrations/*.sql in file name order, each in its own
 * transaction, and records them in schema_migrations.
 */

import type Database from "better-sqlite3";
import { readdirSync, readFileSync } from "fs";
import { join } from "path";
import { openDb } from "./connection";
import { getErrorMessage } from "@/utils";
import * as logger from "@/logger";

export function defaultMigrationsDir(): string {
  return join(process.cwd(), "migrations");
}

function ensureMigrationsTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      version TEXT NOT NULL UNIQUE,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);
}

function getAppliedMigrations(db: Database.Database): Set<string> {
  const rows = db.prepare("SELECT version FROM schema_migrations").all() as {
    version: string;
  }[];
  return new Set(rows.map((r) => r.version));
}

/**
 * @throws {Error} When the directory cannot be read
 */
function listMigrationFiles(migrationsDir: string): string[] {
  let files: string[];
  try {
    files = readdirSync(migrationsDir);
  } catch (err) {
    throw new Error(`Migrations directory not readable: ${migrationsDir} (${getErrorMessage(err)})`);
  }
  return files.filter((f) => f.endsWith(".sql")).sort();
}

/**
 * Apply every pending migration to the given connection
 *
 * @returns File names applied by this call
 */
export function applyPendingMigrations(
  db: Database.Database,
  migrationsDir: string = defaultMigrationsDir(),
): string[] {
  ensureMigrationsTable(db);

  const applied = getAppliedMigrations(db);
  const pending = listMigrationFiles(migrationsDir).filter((f) => !applied.has(f));

  for (const filename of pending) {
    const sql = readFileSync(join(migrationsDir, filename), "utf-8");
    const transaction = db.transaction(() => {
      db.exec(sql);
      db.prepare("INSERT INTO schema_migrations (version) VALUES (?)").run(filename);
    });
    transaction();
    logger.info("Migration applied", { migration: filename });
  }

  return pending;
}

/**
 * Open the database (if needed) and bring the schema up to date
 */
export function runMigrations(dbPath?: string): string[] {
  const applied = applyPendingMigrations(openDb(dbPath));
  if (applied.length === 0) {
    logger.debug("No pending migrations");
  }
  return applied;
}
