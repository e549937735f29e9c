/**
 * Minimal Mastodon REST client: the identity lookup and authenticated JSON GETs.
 *
 * Never retries. Every failure surfaces as a TransportError (or AuthenticationError
 * for the identity lookup) carrying the URL and HTTP status.
 */
import {
  AuthenticationError,
  canonicalizeInstanceUrl,
  createLogger,
  DEFAULT_REQUEST_TIMEOUT_MS,
  TransportError,
} from "@timeline-range/shared";

import type { MastodonAccount, MastodonApi, QueryParams } from "./types";

const log = createLogger({ component: "mastodon-client" });

export const VERIFY_CREDENTIALS_PATH = "/api/v1/accounts/verify_credentials";

function asRecord(value: unknown): Record<string, unknown> {
  if (value && typeof value === "object" && !Array.isArray(value))
    return value as Record<string, unknown>;
  return {};
}

function asString(value: unknown): string | null {
  return typeof value === "string" && value.length > 0 ? value : null;
}

async function readBodySnippet(response: Response): Promise<string> {
  const text = await response
    .text()
    .catch((err: unknown) => `<unreadable body: ${err instanceof Error ? err.message : String(err)}>`);
  return text.slice(0, 500);
}

export interface MastodonClientOptions {
  instanceUrl: string;
  accessToken: string;
  fetchImpl?: typeof fetch;
  timeoutMs?: number;
}

export class MastodonClient implements MastodonApi {
  readonly instanceUrl: string;
  private readonly accessToken: string;
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;

  constructor(params: MastodonClientOptions) {
    this.instanceUrl = canonicalizeInstanceUrl(params.instanceUrl);
    this.accessToken = params.accessToken;
    this.fetchImpl = params.fetchImpl ?? fetch;
    this.timeoutMs = params.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  }

  buildUrl(path: string, query: QueryParams = {}): string {
    const url = new URL(`${this.instanceUrl}${path}`);
    for (const [key, value] of Object.entries(query)) {
      if (value === null || value === undefined) continue;
      url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  async verifyCredentials(): Promise<MastodonAccount> {
    let body: unknown;
    try {
      body = await this.getJson(VERIFY_CREDENTIALS_PATH);
    } catch (err) {
      if (err instanceof TransportError) {
        throw new AuthenticationError(
          err.status,
          `Could not verify access token against ${this.instanceUrl}: ${err.message}`,
          { cause: err },
        );
      }
      throw err;
    }

    const rec = asRecord(body);
    const id = asString(rec.id);
    if (!id) {
      throw new AuthenticationError(null, "Identity response did not include an account id");
    }
    const username = asString(rec.username) ?? id;
    return {
      id,
      username,
      acct: asString(rec.acct) ?? username,
      displayName: asString(rec.display_name),
      url: asString(rec.url),
    };
  }

  async getJson(path: string, query: QueryParams = {}): Promise<unknown> {
    const url = this.buildUrl(path, query);
    log.debug({ url }, "GET");

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: "GET",
        headers: this.buildHeaders(),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new TransportError({ url, status: null, message: `GET ${url} failed: ${message}`, cause: err });
    }

    if (!response.ok) {
      const detail = await readBodySnippet(response);
      throw new TransportError({
        url,
        status: response.status,
        message: `GET ${url} failed (${response.status} ${response.statusText}): ${detail}`,
      });
    }

    try {
      return await response.json();
    } catch (err) {
      throw new TransportError({
        url,
        status: response.status,
        message: `GET ${url} returned a body that is not JSON`,
        cause: err,
      });
    }
  }

  private buildHeaders(): Record<string, string> {
    return {
      Accept: "application/json",
      Authorization: `Bearer ${this.accessToken}`,
    };
  }
}
