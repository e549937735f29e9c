import {
  canonicalizeInstanceUrl,
  ConfigError,
  DEFAULT_EXCERPT_CHARS,
  DEFAULT_PAGE_SIZE,
  DEFAULT_REQUEST_TIMEOUT_MS,
} from "@timeline-range/shared";

/** Mastodon rejects `limit` above 40 on account statuses. */
export const MAX_PAGE_SIZE = 40;

export interface MastodonSourceConfig {
  instanceUrl: string;
  accessToken: string;
  pageSize: number;
  excerptChars: number;
  timeoutMs: number;
}

function asString(value: unknown): string | null {
  return typeof value === "string" && value.trim().length > 0 ? value.trim() : null;
}

function asNumber(value: unknown, defaultValue: number): number {
  return typeof value === "number" && Number.isFinite(value) ? value : defaultValue;
}

export function clampPageSize(value: number | undefined): number {
  return Math.max(1, Math.min(MAX_PAGE_SIZE, Math.floor(value ?? DEFAULT_PAGE_SIZE)));
}

export function parseMastodonSourceConfig(config: Record<string, unknown>): MastodonSourceConfig {
  // Accept both snake_case and camelCase
  const instanceRaw = asString(config.instance_url) ?? asString(config.instanceUrl);
  if (!instanceRaw) {
    throw new ConfigError('Mastodon source config must include non-empty "instanceUrl"');
  }
  const accessToken = asString(config.access_token) ?? asString(config.accessToken);
  if (!accessToken) {
    throw new ConfigError('Mastodon source config must include non-empty "accessToken"');
  }

  return {
    instanceUrl: canonicalizeInstanceUrl(instanceRaw),
    accessToken,
    pageSize: clampPageSize(asNumber(config.page_size ?? config.pageSize, DEFAULT_PAGE_SIZE)),
    excerptChars: Math.max(
      1,
      Math.floor(asNumber(config.excerpt_chars ?? config.excerptChars, DEFAULT_EXCERPT_CHARS)),
    ),
    timeoutMs: Math.max(
      1,
      Math.floor(asNumber(config.timeout_ms ?? config.timeoutMs, DEFAULT_REQUEST_TIMEOUT_MS)),
    ),
  };
}
