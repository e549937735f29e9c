import { MalformedPostError } from "@timeline-range/shared";
import { describe, expect, it } from "vitest";

import { parseStatus, statusIdOf } from "./parse";

const ORIGINAL = {
  id: "110748215369152001",
  created_at: "2023-07-15T10:00:00.000Z",
  url: "https://mastodon.example/@alice/110748215369152001",
  uri: "https://mastodon.example/users/alice/statuses/110748215369152001",
  content: "<p>Screenshot of the day <a href=\"https://mastodon.example/tags/screenshot\">#screenshot</a></p>",
  tags: [{ name: "screenshot", url: "https://mastodon.example/tags/screenshot" }],
  media_attachments: [
    { id: "1", type: "image", url: "https://files.example/1.png" },
    { id: "2", type: "video", url: "https://files.example/2.mp4" },
  ],
  reblog: null,
};

describe("parseStatus", () => {
  it("validates an original status", () => {
    const parsed = parseStatus(ORIGINAL);
    expect(parsed.kind).toBe("original");
    expect(parsed.status.id).toBe("110748215369152001");
    expect(parsed.status.createdAt.toISOString()).toBe("2023-07-15T10:00:00.000Z");
    expect(parsed.status.url).toBe(ORIGINAL.url);
    expect(parsed.status.tags).toEqual(["screenshot"]);
    expect(parsed.status.mediaAttachments).toEqual([
      { url: "https://files.example/1.png", type: "image" },
      { url: "https://files.example/2.mp4", type: "video" },
    ]);
  });

  it("tags reblogs with the id of the reshared status", () => {
    const parsed = parseStatus({ ...ORIGINAL, reblog: { id: "99" } });
    expect(parsed).toMatchObject({ kind: "reblog", rebloggedId: "99" });
  });

  it("falls back to uri when url is null", () => {
    expect(parseStatus({ ...ORIGINAL, url: null }).status.url).toBe(ORIGINAL.uri);
  });

  it("accepts numeric ids", () => {
    expect(parseStatus({ ...ORIGINAL, id: 42 }).status.id).toBe("42");
  });

  it("reads timestamps with an explicit offset", () => {
    const parsed = parseStatus({ ...ORIGINAL, created_at: "2023-07-15T12:00:00+02:00" });
    expect(parsed.status.createdAt.toISOString()).toBe("2023-07-15T10:00:00.000Z");
  });

  it("keeps media order, drops entries without a url and maps unknown types", () => {
    const parsed = parseStatus({
      ...ORIGINAL,
      media_attachments: [
        { type: "gifv", url: "https://files.example/a.mp4" },
        { type: "image", url: null },
        { type: "sticker", url: null, remote_url: "https://remote.example/b.webp" },
      ],
    });
    expect(parsed.status.mediaAttachments).toEqual([
      { url: "https://files.example/a.mp4", type: "gifv" },
      { url: "https://remote.example/b.webp", type: "unknown" },
    ]);
  });

  it("fails when id is missing", () => {
    const { id: _id, ...withoutId } = ORIGINAL;
    expect(() => parseStatus(withoutId)).toThrow(MalformedPostError);
  });

  it("fails with the post id when created_at is missing", () => {
    try {
      parseStatus({ ...ORIGINAL, created_at: undefined });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(MalformedPostError);
      expect(err).toMatchObject({ postId: "110748215369152001", field: "created_at" });
    }
  });

  it.each(["yesterday", "2023-07-15", "2023-07-15T10:00:00", ""])(
    "fails on created_at %j",
    (createdAt) => {
      expect(() => parseStatus({ ...ORIGINAL, created_at: createdAt })).toThrow(MalformedPostError);
    },
  );
});

describe("statusIdOf", () => {
  it("reads string and numeric ids", () => {
    expect(statusIdOf({ id: "42" })).toBe("42");
    expect(statusIdOf({ id: 42 })).toBe("42");
  });

  it("returns null without an id", () => {
    expect(statusIdOf({ created_at: "2023-07-15T10:00:00.000Z" })).toBeNull();
    expect(statusIdOf(null)).toBeNull();
  });
});
