/**
 * Source cursor repository
 *
 * Keeps the last consumed offset per message source so a restart does
 * not replay updates. The posts themselves are kept in channel_posts.
 */

import type { CursorStore, SourceCursorRow } from "@/types";
import { getDb } from "../connection";

export function getSourceCursor(source: string): string | null {
  const row = getDb()
    .prepare("SELECT * FROM source_cursor WHERE source = ?")
    .get(source) as SourceCursorRow | undefined;
  return row?.cursor ?? null;
}

export function setSourceCursor(source: string, cursor: string): void {
  getDb()
    .prepare(
      `
    INSERT INTO source_cursor (source, cursor, updated_at)
    VALUES (?, ?, datetime('now'))
    ON CONFLICT(source) DO UPDATE SET
      cursor = excluded.cursor,
      updated_at = excluded.updated_at
  `,
    )
    .run(source, cursor);
}

/**
 * CursorStore backed by the source_cursor table
 */
export const sqliteCursorStore: CursorStore = {
  getCursor: getSourceCursor,
  setCursor: setSourceCursor,
};
