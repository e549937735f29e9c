import { randomUUID } from "node:crypto";

import { createRunLogger, type DateRange } from "@timeline-range/shared";

import { type FilterRunResult, collectStatusesInRange } from "./filter";
import { iterateStatusPages } from "./fetch";
import type { MastodonAccount, MastodonApi } from "./types";

export interface TimelineFilterRunOptions {
  client: MastodonApi;
  range: DateRange;
  fullContent?: boolean;
  excerptChars?: number;
  pageSize?: number;
  signal?: AbortSignal;
}

export interface TimelineFilterRun extends FilterRunResult {
  account: MastodonAccount;
}

/**
 * Resolve the token's account, then walk its statuses until the range is passed.
 * Identity failures abort before any page is requested.
 */
export async function runTimelineFilter(options: TimelineFilterRunOptions): Promise<TimelineFilterRun> {
  const log = createRunLogger(randomUUID());
  const account = await options.client.verifyCredentials();

  log.info(
    {
      instance: options.client.instanceUrl,
      accountId: account.id,
      acct: account.acct,
      start: options.range.start.toISOString(),
      end: options.range.end.toISOString(),
    },
    "Scanning statuses",
  );

  const pages = iterateStatusPages(options.client, {
    accountId: account.id,
    pageSize: options.pageSize,
  });
  const result = await collectStatusesInRange(pages, options.range, {
    fullContent: options.fullContent,
    excerptChars: options.excerptChars,
    signal: options.signal,
  });

  log.info({ ...result.stats }, "Scan finished");
  return { account, ...result };
}
