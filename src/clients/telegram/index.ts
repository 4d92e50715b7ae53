/**
 * Telegram Bot API adapter public API
 */

export { TelegramBotClient } from "./telegramBotClient";
export type { TelegramBotClientConfig } from "./telegramBotClient";
export { TelegramApiError } from "./telegramApiError";
export { mapTelegramMessage, chatMatches } from "./mappers";
