/**
 * Publish runs repository
 *
 * Data access layer for publish_runs table.
 */

import type { PublishRun, PublishRunUpdate } from "@/types";
import { getDb } from "../connection";

/**
 * Create a new publish run
 * Returns the run id
 */
export function createPublishRun(): number {
  const result = getDb().prepare("INSERT INTO publish_runs DEFAULT VALUES").run();
  return Number(result.lastInsertRowid);
}

const UPDATABLE_COLUMNS = [
  "finished_at",
  "status",
  "messages_scanned",
  "candidates_seen",
  "posts_published",
  "duplicates_skipped",
  "errors_count",
  "notes",
] as const;

/**
 * Update/finish a publish run (only the fields present are written)
 */
export function finishPublishRun(runId: number, update: PublishRunUpdate): void {
  const fields: string[] = [];
  const values: Array<string | number | null> = [];

  for (const column of UPDATABLE_COLUMNS) {
    const value = update[column];
    if (value !== undefined) {
      fields.push(`${column} = ?`);
      values.push(value);
    }
  }

  if (fields.length === 0) {
    return;
  }

  values.push(runId);
  getDb()
    .prepare(`UPDATE publish_runs SET ${fields.join(", ")} WHERE id = ?`)
    .run(...values);
}

export function getPublishRunById(id: number): PublishRun | undefined {
  return getDb().prepare("SELECT * FROM publish_runs WHERE id = ?").get(id) as
    | PublishRun
    | undefined;
}
