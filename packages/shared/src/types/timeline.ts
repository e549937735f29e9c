/**
 * Inclusive, day-granular window held as UTC instants.
 * `start` is the first millisecond of the start day, `end` the last millisecond
 * of the end day, both in the reporting timezone.
 */
export interface DateRange {
  readonly start: Date;
  readonly end: Date;
}

/** Id of the oldest status seen so far; null = newest first (input) or exhausted (output). */
export type FetchCursor = string | null;

export type MediaType = "image" | "gifv" | "video" | "audio" | "unknown";

export interface MediaAttachment {
  url: string;
  type: MediaType;
}

/**
 * Normalized, presentation-agnostic record for one original status in range.
 */
export interface ResultItem {
  id: string;
  timestamp: string; // ISO, UTC
  url: string | null;
  /** Deduplicated, lower-cased, sorted. */
  hashtags: string[];
  /** Arrival order. */
  media: MediaAttachment[];
  /** Plain text; the excerpt unless full content was requested. */
  content: string;
  truncated: boolean;
}
