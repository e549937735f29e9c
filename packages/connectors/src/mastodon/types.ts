import type { FetchCursor, MediaAttachment } from "@timeline-range/shared";

export type QueryValue = string | number | boolean | null | undefined;
export type QueryParams = Record<string, QueryValue>;

/** Subset of GET /api/v1/accounts/verify_credentials that a run needs. */
export interface MastodonAccount {
  id: string;
  username: string;
  acct: string;
  displayName: string | null;
  url: string | null;
}

/**
 * The HTTP collaborator a run talks to. MastodonClient is the real one.
 */
export interface MastodonApi {
  readonly instanceUrl: string;
  verifyCredentials(): Promise<MastodonAccount>;
  getJson(path: string, query?: QueryParams): Promise<unknown>;
}

/** A status after validation; `createdAt` is guaranteed to be a real instant. */
export interface TimelineStatus {
  id: string;
  createdAt: Date;
  url: string | null;
  /** HTML as delivered by the instance. */
  content: string;
  tags: string[];
  mediaAttachments: MediaAttachment[];
}

export type ClassifiedStatus =
  | { kind: "original"; status: TimelineStatus }
  | { kind: "reblog"; status: TimelineStatus; rebloggedId: string | null };

export interface StatusPage {
  /** Status objects as delivered; each is validated when the filter reaches it. */
  statuses: unknown[];
  nextCursor: FetchCursor;
}
