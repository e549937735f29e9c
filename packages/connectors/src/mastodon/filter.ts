/**
 * Range filter over a newest-first status feed.
 *
 * The feed is strictly reverse-chronological, so the first original status
 * older than `range.start` ends the run: nothing after it can match and no
 * further page is requested. Statuses are validated one at a time as they are
 * reached, so nothing past that point is ever parsed.
 */
import { createLogger, type DateRange, type ResultItem } from "@timeline-range/shared";

import { type NormalizeOptions, normalizeStatus } from "./normalize";
import { parseStatus } from "./parse";
import type { ClassifiedStatus, StatusPage } from "./types";

const log = createLogger({ component: "range-filter" });

export type StatusDecision = "include" | "skip_reblog" | "skip_newer" | "stop";

export function evaluateStatus(entry: ClassifiedStatus, range: DateRange): StatusDecision {
  if (entry.kind === "reblog") return "skip_reblog";
  const createdAt = entry.status.createdAt.getTime();
  if (createdAt > range.end.getTime()) return "skip_newer";
  if (createdAt < range.start.getTime()) return "stop";
  return "include";
}

export interface FilterStats {
  pages: number;
  scanned: number;
  included: number;
  skippedReblogs: number;
  skippedNewer: number;
  /** True when the run ended on a status older than the range, not on an exhausted feed. */
  stoppedEarly: boolean;
}

export interface FilterOptions extends NormalizeOptions {
  /** Checked between pages; a page is never abandoned halfway. */
  signal?: AbortSignal;
}

export interface FilterRunResult {
  items: ResultItem[];
  stats: FilterStats;
}

function emptyStats(): FilterStats {
  return {
    pages: 0,
    scanned: 0,
    included: 0,
    skippedReblogs: 0,
    skippedNewer: 0,
    stoppedEarly: false,
  };
}

async function* scanPages(
  pages: AsyncIterable<StatusPage>,
  range: DateRange,
  options: FilterOptions,
  stats: FilterStats,
): AsyncGenerator<ResultItem, void, undefined> {
  options.signal?.throwIfAborted();

  for await (const page of pages) {
    stats.pages += 1;
    for (const raw of page.statuses) {
      const entry = parseStatus(raw);
      stats.scanned += 1;
      switch (evaluateStatus(entry, range)) {
        case "skip_reblog":
          stats.skippedReblogs += 1;
          break;
        case "skip_newer":
          stats.skippedNewer += 1;
          break;
        case "include":
          stats.included += 1;
          yield normalizeStatus(entry.status, options);
          break;
        case "stop":
          stats.stoppedEarly = true;
          log.debug({ statusId: entry.status.id, page: stats.pages }, "Reached status older than range");
          return;
      }
    }
    log.debug(
      { page: stats.pages, scanned: stats.scanned, included: stats.included },
      "Scanned page",
    );
    options.signal?.throwIfAborted();
  }
}

/**
 * Yield in-range original statuses as they are found, newest first.
 */
export async function* streamStatusesInRange(
  pages: AsyncIterable<StatusPage>,
  range: DateRange,
  options: FilterOptions = {},
): AsyncGenerator<ResultItem, void, undefined> {
  yield* scanPages(pages, range, options, emptyStats());
}

/**
 * Run the filter to completion. Resolves with every match or rejects; there is
 * no partial result.
 */
export async function collectStatusesInRange(
  pages: AsyncIterable<StatusPage>,
  range: DateRange,
  options: FilterOptions = {},
): Promise<FilterRunResult> {
  const stats = emptyStats();
  const items: ResultItem[] = [];
  for await (const item of scanPages(pages, range, options, stats)) {
    items.push(item);
  }
  return { items, stats };
}
