/**
 * In-process stand-in for a Mastodon instance, served through an injected fetch.
 * Implements verify_credentials and account statuses with max_id/limit paging.
 */
export const FAKE_INSTANCE_URL = "https://mastodon.example";
export const FAKE_TOKEN = "test-token";

export interface FakeStatus {
  id: string;
  created_at: string;
  url?: string | null;
  uri?: string;
  content?: string;
  tags?: Array<{ name: string }>;
  media_attachments?: Array<{ url: string | null; type: string }>;
  reblog?: { id: string } | null;
}

export function fakeStatus(id: string, createdAt: string, extra: Partial<FakeStatus> = {}): FakeStatus {
  return {
    id,
    created_at: createdAt,
    url: `${FAKE_INSTANCE_URL}/@alice/${id}`,
    content: `<p>status ${id}</p>`,
    tags: [],
    media_attachments: [],
    reblog: null,
    ...extra,
  };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

export interface FakeInstanceOptions {
  accountId?: string;
  /** Return a response here to override the default handling of a request. */
  override?: (url: URL, requestIndex: number) => Response | undefined;
}

export interface FakeInstance {
  fetchImpl: typeof fetch;
  requests: URL[];
  statusRequests(): URL[];
}

export function createFakeInstance(statuses: FakeStatus[], options: FakeInstanceOptions = {}): FakeInstance {
  const accountId = options.accountId ?? "109";
  const requests: URL[] = [];

  const fetchImpl: typeof fetch = async (input, init) => {
    const url = new URL(String(input));
    requests.push(url);

    const overridden = options.override?.(url, requests.length - 1);
    if (overridden) return overridden;

    const auth = new Headers(init?.headers).get("authorization");
    if (auth !== `Bearer ${FAKE_TOKEN}`) {
      return jsonResponse({ error: "The access token is invalid" }, 401);
    }

    if (url.pathname === "/api/v1/accounts/verify_credentials") {
      return jsonResponse({
        id: accountId,
        username: "alice",
        acct: "alice",
        display_name: "Alice",
        url: `${FAKE_INSTANCE_URL}/@alice`,
      });
    }

    if (url.pathname === `/api/v1/accounts/${accountId}/statuses`) {
      const limit = Number(url.searchParams.get("limit") ?? "20");
      const maxId = url.searchParams.get("max_id");
      const from = maxId === null ? 0 : statuses.findIndex((s) => s.id === maxId) + 1;
      return jsonResponse(statuses.slice(from, from + limit));
    }

    return jsonResponse({ error: "Record not found" }, 404);
  };

  return {
    fetchImpl,
    requests,
    statusRequests: () => requests.filter((u) => u.pathname.endsWith("/statuses")),
  };
}
