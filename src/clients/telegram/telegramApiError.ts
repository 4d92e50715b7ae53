/**
 * TelegramApiError — Bot API call rejected ({ ok: false } or non-2xx)
 */

export class TelegramApiError extends Error {
  public readonly method: string;
  /** HTTP status or Bot API error_code; null for transport failures */
  public readonly status: number | null;
  public readonly description: string;

  constructor(method: string, status: number | null, description: string) {
    super(`Telegram ${method} failed${status !== null ? ` (${status})` : ""}: ${description}`);
    this.name = "TelegramApiError";
    this.method = method;
    this.status = status;
    this.description = description;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TelegramApiError);
    }
  }
}
