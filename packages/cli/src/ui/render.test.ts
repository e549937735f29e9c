import type { ResultItem } from "@timeline-range/shared";
import { describe, expect, it } from "vitest";

import {
  formatDay,
  formatTimestamp,
  renderRunFooter,
  renderRunHeader,
  renderStatusItem,
  SEPARATOR,
} from "./render";

function item(overrides: Partial<ResultItem> = {}): ResultItem {
  return {
    id: "3",
    timestamp: "2023-07-15T10:30:05.000Z",
    url: "https://mastodon.example/@alice/3",
    hashtags: [],
    media: [],
    content: "Hello world",
    truncated: false,
    ...overrides,
  };
}

describe("formatTimestamp", () => {
  it("formats in UTC by default", () => {
    expect(formatTimestamp("2023-07-05T08:04:03.000Z")).toBe("05.07.2023 08:04:03");
  });

  it("formats in the given zone", () => {
    expect(formatTimestamp("2023-07-15T22:00:00.000Z", "Europe/Berlin")).toBe("16.07.2023 00:00:00");
  });

  it("formats the day of a range bound", () => {
    expect(formatDay(new Date("2023-07-31T21:59:59.999Z"), "Europe/Berlin")).toBe("31.07.2023");
  });
});

describe("renderStatusItem", () => {
  it("renders a minimal status", () => {
    expect(renderStatusItem(item({ url: null }))).toBe(
      ["", SEPARATOR, "Date: 15.07.2023 10:30:05", "URL: -", "", "Content:", "Hello world"].join("\n"),
    );
  });

  it("renders hashtags, media and a truncation marker", () => {
    const rendered = renderStatusItem(
      item({
        hashtags: ["fediverse", "mastodon"],
        media: [
          { url: "https://files.example/a.png", type: "image" },
          { url: "https://files.example/b.mp4", type: "video" },
        ],
        truncated: true,
      }),
      "Europe/Berlin",
    );
    expect(rendered).toBe(
      [
        "",
        SEPARATOR,
        "Date: 15.07.2023 12:30:05",
        "URL: https://mastodon.example/@alice/3",
        "Hashtags: #fediverse, #mastodon",
        "Media: 2 attachment(s)",
        "  - image: https://files.example/a.png",
        "  - video: https://files.example/b.mp4",
        "",
        "Content:",
        "Hello world...",
      ].join("\n"),
    );
  });
});

describe("run header and footer", () => {
  it("reports the count", () => {
    expect(SEPARATOR).toHaveLength(80);
    expect(renderRunHeader(2)).toBe(`\n${SEPARATOR}\nStatuses found: 2\n${SEPARATOR}`);
    expect(renderRunFooter(0)).toBe(`\n${SEPARATOR}\nTotal: 0 statuses in range.`);
  });
});
