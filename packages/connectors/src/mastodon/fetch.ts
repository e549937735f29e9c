import { type FetchCursor, TransportError } from "@timeline-range/shared";

import { clampPageSize } from "./config";
import { statusIdOf } from "./parse";
import type { MastodonApi, StatusPage } from "./types";

export function accountStatusesPath(accountId: string): string {
  return `/api/v1/accounts/${encodeURIComponent(accountId)}/statuses`;
}

export interface StatusPageRequest {
  accountId: string;
  cursor: FetchCursor;
  pageSize?: number;
}

/**
 * Fetch one page of the account's own statuses, newest first, strictly older
 * than `cursor` when one is given. The returned cursor is the id of the last
 * status on the page, or null once the feed is exhausted.
 */
export async function fetchStatusPage(
  client: MastodonApi,
  request: StatusPageRequest,
): Promise<StatusPage> {
  const path = accountStatusesPath(request.accountId);
  const body = await client.getJson(path, {
    exclude_reblogs: true,
    limit: clampPageSize(request.pageSize),
    max_id: request.cursor,
  });

  if (body === null || body === undefined) {
    return { statuses: [], nextCursor: null };
  }
  if (!Array.isArray(body)) {
    throw new TransportError({
      url: `${client.instanceUrl}${path}`,
      status: null,
      message: `Expected a JSON array of statuses from ${path}, got ${typeof body}`,
    });
  }

  // A last status without an id fails the filter before the cursor is needed.
  const statuses: unknown[] = body;
  return {
    statuses,
    nextCursor: statuses.length > 0 ? statusIdOf(statuses[statuses.length - 1]) : null,
  };
}

export interface StatusPagesParams {
  accountId: string;
  pageSize?: number;
}

/**
 * Lazy page sequence for one run, starting from the newest status. A new
 * request is only issued when the consumer asks for the next page, and the
 * sequence ends after the first empty page.
 */
export async function* iterateStatusPages(
  client: MastodonApi,
  params: StatusPagesParams,
): AsyncGenerator<StatusPage, void, undefined> {
  let cursor: FetchCursor = null;
  for (;;) {
    const page = await fetchStatusPage(client, {
      accountId: params.accountId,
      cursor,
      pageSize: params.pageSize,
    });
    yield page;
    if (page.nextCursor === null) return;
    cursor = page.nextCursor;
  }
}
