/**
 * Source message and caption type definitions
 */

/**
 * Media attached to a source message, forwarded to delivery unchanged
 */
export type SourceMedia = {
  kind: "photo";
  /** Provider-side reference (e.g. Telegram file_id) */
  ref: string;
};

/**
 * One record yielded by a message source
 *
 * The pipeline only reads `text`; media is passed through to delivery.
 */
export type SourceMessage = {
  id: string;
  text: string;
  media: SourceMedia | null;
  viewCount: number | null;
  /** ISO 8601 */
  timestamp: string;
};

/**
 * Facts handed to the caption writer alongside the raw text
 */
export type FactHints = {
  title: string | null;
  price: string | null;
};

export type AssembleOptions = {
  /** Label of the block appended when the caption lacks the link */
  buyHereLabel?: string;
};
