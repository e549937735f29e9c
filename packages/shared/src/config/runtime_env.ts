import { ConfigError } from "../errors";

export interface RuntimeEnv {
  appEnv: "local" | "dev" | "prod";
  /** IANA zone the date range is interpreted in. */
  timezone: string;

  mastodonInstance?: string;
  mastodonToken?: string;

  pageSize: number;
  excerptChars: number;
  requestTimeoutMs: number;
}

export const DEFAULT_PAGE_SIZE = 40;
export const DEFAULT_EXCERPT_CHARS = 150;
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

function optionalEnv(value: string | undefined): string | undefined {
  if (!value) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function parseIntEnv(name: string, value: string | undefined, fallback: number): number {
  const raw = optionalEnv(value);
  if (raw === undefined) return fallback;
  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(`Invalid integer env var: ${name}=${raw}`);
  }
  return Number.parseInt(raw, 10);
}

export function loadRuntimeEnv(env: NodeJS.ProcessEnv = process.env): RuntimeEnv {
  const appEnvRaw = env.APP_ENV ?? "local";
  const appEnv =
    appEnvRaw === "prod" || appEnvRaw === "dev" || appEnvRaw === "local" ? appEnvRaw : "local";

  return {
    appEnv,
    timezone: optionalEnv(env.APP_TIMEZONE) ?? "UTC",
    mastodonInstance: optionalEnv(env.MASTODON_INSTANCE),
    mastodonToken: optionalEnv(env.MASTODON_TOKEN),
    pageSize: parseIntEnv("MASTODON_PAGE_SIZE", env.MASTODON_PAGE_SIZE, DEFAULT_PAGE_SIZE),
    excerptChars: parseIntEnv("EXCERPT_CHARS", env.EXCERPT_CHARS, DEFAULT_EXCERPT_CHARS),
    requestTimeoutMs: parseIntEnv(
      "HTTP_TIMEOUT_MS",
      env.HTTP_TIMEOUT_MS,
      DEFAULT_REQUEST_TIMEOUT_MS,
    ),
  };
}
