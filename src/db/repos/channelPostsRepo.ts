/**
 * Channel posts repository
 *
 * Keeps the newest posts of every source channel so each pass can
 * re-scan them; older rows are pruned past the retention window.
 */

import type { ChannelPostRow, ChannelPostStore, SourceMessage, StoredChannelPost } from "@/types";
import { getDb } from "../connection";
import { CHANNEL_POST_RETENTION } from "@/constants/clients/telegram";

function toSourceMessage(row: ChannelPostRow): SourceMessage {
  return {
    id: row.source_id,
    text: row.text,
    media: row.media_ref ? { kind: "photo", ref: row.media_ref } : null,
    viewCount: row.view_count,
    timestamp: row.posted_at,
  };
}

/**
 * Upsert posts and prune every touched channel to `retention` rows
 */
export function saveChannelPosts(
  posts: StoredChannelPost[],
  retention: number = CHANNEL_POST_RETENTION,
): void {
  if (posts.length === 0) {
    return;
  }

  const db = getDb();
  const upsert = db.prepare(`
    INSERT INTO channel_posts
      (channel, message_id, posted_date, source_id, text, media_ref, view_count, posted_at)
    VALUES
      (@channel, @message_id, @posted_date, @source_id, @text, @media_ref, @view_count, @posted_at)
    ON CONFLICT(channel, message_id) DO UPDATE SET
      posted_date = excluded.posted_date,
      source_id = excluded.source_id,
      text = excluded.text,
      media_ref = excluded.media_ref,
      view_count = excluded.view_count,
      posted_at = excluded.posted_at
  `);
  const prune = db.prepare(`
    DELETE FROM channel_posts
    WHERE channel = @channel
      AND message_id NOT IN (
        SELECT message_id FROM channel_posts
        WHERE channel = @channel
        ORDER BY posted_date DESC, message_id DESC
        LIMIT @retention
      )
  `);

  db.transaction(() => {
    const channels = new Set<string>();
    for (const post of posts) {
      const row: ChannelPostRow = {
        channel: post.channel,
        message_id: post.messageId,
        posted_date: post.date,
        source_id: post.message.id,
        text: post.message.text,
        media_ref: post.message.media?.ref ?? null,
        view_count: post.message.viewCount,
        posted_at: post.message.timestamp,
      };
      upsert.run(row);
      channels.add(post.channel);
    }
    for (const channel of channels) {
      prune.run({ channel, retention });
    }
  })();
}

/**
 * Newest posts of a channel, newest first
 */
export function getRecentChannelPosts(channel: string, limit: number): SourceMessage[] {
  const rows = getDb()
    .prepare(
      `
    SELECT * FROM channel_posts
    WHERE channel = ?
    ORDER BY posted_date DESC, message_id DESC
    LIMIT ?
  `,
    )
    .all(channel, limit) as ChannelPostRow[];
  return rows.map(toSourceMessage);
}

/**
 * ChannelPostStore backed by the channel_posts table
 */
export const sqliteChannelPostStore: ChannelPostStore = {
  savePosts: (posts) => saveChannelPosts(posts),
  recentPosts: getRecentChannelPosts,
};
