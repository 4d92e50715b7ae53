/**
 * OpenAI caption writer constants
 */

export const OPENAI_DEFAULT_BASE_URL = "https://api.openai.com/v1";

export const OPENAI_CHAT_COMPLETIONS_PATH = "/chat/completions";

export const OPENAI_DEFAULT_MODEL = "gpt-4o-mini";

export const OPENAI_MAX_TOKENS = 200;

/**
 * Source text is truncated to this length before it goes into the prompt
 */
export const OPENAI_SOURCE_TEXT_MAX_LENGTH = 300;
