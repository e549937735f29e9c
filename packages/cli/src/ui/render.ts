import type { ResultItem } from "@timeline-range/shared";
import { DateTime } from "luxon";

export const SEPARATOR = "=".repeat(80);

/**
 * `DD.MM.YYYY HH:MM:SS` in the given zone.
 */
export function formatTimestamp(value: string | Date, timeZone = "UTC"): string {
  const instant =
    typeof value === "string"
      ? DateTime.fromISO(value, { zone: timeZone })
      : DateTime.fromJSDate(value, { zone: timeZone });
  return instant.toFormat("dd.MM.yyyy HH:mm:ss");
}

export function formatDay(value: Date, timeZone = "UTC"): string {
  return DateTime.fromJSDate(value, { zone: timeZone }).toFormat("dd.MM.yyyy");
}

export function renderStatusItem(item: ResultItem, timeZone = "UTC"): string {
  const lines = ["", SEPARATOR, `Date: ${formatTimestamp(item.timestamp, timeZone)}`];
  lines.push(`URL: ${item.url ?? "-"}`);

  if (item.hashtags.length > 0) {
    lines.push(`Hashtags: ${item.hashtags.map((tag) => `#${tag}`).join(", ")}`);
  }
  if (item.media.length > 0) {
    lines.push(`Media: ${item.media.length} attachment(s)`);
    for (const media of item.media) {
      lines.push(`  - ${media.type}: ${media.url}`);
    }
  }

  lines.push("", "Content:", item.truncated ? `${item.content}...` : item.content);
  return lines.join("\n");
}

export function renderRunHeader(count: number): string {
  return ["", SEPARATOR, `Statuses found: ${count}`, SEPARATOR].join("\n");
}

export function renderRunFooter(count: number): string {
  return ["", SEPARATOR, `Total: ${count} statuses in range.`].join("\n");
}
