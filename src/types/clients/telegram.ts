/**
 * Telegram Bot API type definitions (subset used by the adapter)
 */

import type { SourceMessage } from "../messages";

export type TelegramChat = {
  id: number;
  type: string;
  title?: string;
  username?: string;
};

export type TelegramPhotoSize = {
  file_id: string;
  file_unique_id?: string;
  width: number;
  height: number;
  file_size?: number;
};

export type TelegramMessage = {
  message_id: number;
  chat: TelegramChat;
  date: number;
  text?: string;
  caption?: string;
  photo?: TelegramPhotoSize[];
};

export type TelegramUpdate = {
  update_id: number;
  channel_post?: TelegramMessage;
  edited_channel_post?: TelegramMessage;
};

/**
 * Bot API response envelope
 */
export type TelegramResponse<T> =
  | { ok: true; result: T }
  | { ok: false; error_code?: number; description?: string };

/**
 * Persistence for the getUpdates offset
 */
export interface CursorStore {
  getCursor(source: string): string | null;
  setCursor(source: string, cursor: string): void;
}

/**
 * A channel post kept for re-scanning, with the keys it is ordered by
 */
export type StoredChannelPost = {
  channel: string;
  messageId: number;
  /** Unix seconds, as sent by the Bot API */
  date: number;
  message: SourceMessage;
};

/**
 * Recent posts per source channel
 *
 * getUpdates confirms updates once the offset moves past them, so posts
 * are kept here until they fall out of the retention window.
 */
export interface ChannelPostStore {
  /** Insert or replace (edits overwrite the original post) */
  savePosts(posts: StoredChannelPost[]): void;
  /** Newest first */
  recentPosts(channel: string, limit: number): SourceMessage[];
}
