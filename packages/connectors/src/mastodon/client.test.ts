import { AuthenticationError, TransportError } from "@timeline-range/shared";
import { describe, expect, it, vi } from "vitest";

import {
  createFakeInstance,
  FAKE_INSTANCE_URL,
  FAKE_TOKEN,
  jsonResponse,
} from "./__fixtures__/fake_instance";
import { MastodonClient } from "./client";

function clientFor(fetchImpl: typeof fetch, accessToken = FAKE_TOKEN): MastodonClient {
  return new MastodonClient({ instanceUrl: `${FAKE_INSTANCE_URL}/`, accessToken, fetchImpl });
}

describe("MastodonClient", () => {
  it("canonicalizes the instance url and skips empty query values", () => {
    const client = clientFor(createFakeInstance([]).fetchImpl);
    expect(client.instanceUrl).toBe("https://mastodon.example");
    expect(client.buildUrl("/api/v1/x", { a: 1, b: true, c: null, d: undefined })).toBe(
      "https://mastodon.example/api/v1/x?a=1&b=true",
    );
  });

  it("sends the bearer token and accepts JSON", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => jsonResponse([]));
    await clientFor(fetchImpl).getJson("/api/v1/x");

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const headers = new Headers(fetchImpl.mock.calls[0]?.[1]?.headers);
    expect(headers.get("authorization")).toBe("Bearer test-token");
    expect(headers.get("accept")).toBe("application/json");
    expect(fetchImpl.mock.calls[0]?.[1]?.method).toBe("GET");
  });

  it("resolves the authenticated account", async () => {
    const account = await clientFor(createFakeInstance([]).fetchImpl).verifyCredentials();
    expect(account).toEqual({
      id: "109",
      username: "alice",
      acct: "alice",
      displayName: "Alice",
      url: "https://mastodon.example/@alice",
    });
  });

  it("reports a rejected token as AuthenticationError with the status", async () => {
    const client = clientFor(createFakeInstance([]).fetchImpl, "wrong-token");
    await expect(client.verifyCredentials()).rejects.toMatchObject({
      name: "AuthenticationError",
      status: 401,
    });
  });

  it("reports an identity payload without id as AuthenticationError", async () => {
    const client = clientFor(async () => jsonResponse({ username: "alice" }));
    await expect(client.verifyCredentials()).rejects.toThrow(AuthenticationError);
  });

  it("wraps non-2xx responses in TransportError", async () => {
    const client = clientFor(async () => jsonResponse({ error: "boom" }, 503));
    const err = await client.getJson("/api/v1/x").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TransportError);
    expect(err).toMatchObject({ status: 503, url: "https://mastodon.example/api/v1/x" });
  });

  it("wraps network failures in TransportError without a status", async () => {
    const cause = new TypeError("fetch failed");
    const client = clientFor(async () => {
      throw cause;
    });
    const err = await client.getJson("/api/v1/x").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TransportError);
    expect(err).toMatchObject({ status: null, cause });
  });

  it("wraps bodies that are not JSON in TransportError", async () => {
    const client = clientFor(async () => new Response("<html>maintenance</html>", { status: 200 }));
    await expect(client.getJson("/api/v1/x")).rejects.toThrow(TransportError);
  });
});
