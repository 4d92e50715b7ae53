/**
 * Telegram mappers
 *
 * Bot API shapes to SourceMessage
 */

import type {
  SourceMedia,
  SourceMessage,
  TelegramChat,
  TelegramMessage,
  TelegramPhotoSize,
  TelegramUpdate,
} from "@/types";

/**
 * Channel post carried by an update (edits count as posts)
 */
export function postOf(update: TelegramUpdate): TelegramMessage | null {
  return update.channel_post ?? update.edited_channel_post ?? null;
}

/**
 * Configured channel reference matches a chat by @username (case-insensitive)
 * or by numeric id
 */
export function chatMatches(chat: TelegramChat, channel: string): boolean {
  const ref = channel.trim();
  if (String(chat.id) === ref) {
    return true;
  }
  const username = ref.replace(/^@/, "").toLowerCase();
  return chat.username !== undefined && chat.username.toLowerCase() === username;
}

function largestPhoto(photos: TelegramPhotoSize[]): TelegramPhotoSize | null {
  let best: TelegramPhotoSize | null = null;
  for (const photo of photos) {
    if (!best || photo.width * photo.height > best.width * best.height) {
      best = photo;
    }
  }
  return best;
}

export function mapMedia(message: TelegramMessage): SourceMedia | null {
  const photo = message.photo ? largestPhoto(message.photo) : null;
  return photo ? { kind: "photo", ref: photo.file_id } : null;
}

export function mapTelegramMessage(message: TelegramMessage): SourceMessage {
  return {
    id: `${message.chat.id}:${message.message_id}`,
    text: message.text ?? message.caption ?? "",
    media: mapMedia(message),
    // The Bot API does not expose view counts
    viewCount: null,
    timestamp: new Date(message.date * 1000).toISOString(),
  };
}
