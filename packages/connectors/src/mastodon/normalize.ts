import { DEFAULT_EXCERPT_CHARS, type ResultItem } from "@timeline-range/shared";

import type { TimelineStatus } from "./types";

const NAMED_ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  nbsp: " ",
};

function decodeEntity(entity: string): string | null {
  if (entity.startsWith("#")) {
    const hex = entity[1] === "x" || entity[1] === "X";
    const code = Number.parseInt(entity.slice(hex ? 2 : 1), hex ? 16 : 10);
    return Number.isInteger(code) && code >= 0 && code <= 0x10ffff ? String.fromCodePoint(code) : null;
  }
  return NAMED_ENTITIES[entity.toLowerCase()] ?? null;
}

/**
 * Status HTML to plain text. Tags go first, entities are decoded afterwards in
 * a single pass, so `&lt;b&gt;` stays visible text.
 */
export function htmlToText(html: string): string {
  let text = html.replace(/<br\s*\/?>/gi, "\n");
  text = text.replace(/<\/(p|div|li|blockquote|h[1-6])>/gi, "\n\n");
  text = text.replace(/<[^>]+>/g, "");
  text = text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, entity: string) => decodeEntity(entity) ?? match);

  text = text.replace(/[ \t]+/g, " ");
  text = text.replace(/ *\n */g, "\n");
  text = text.replace(/\n{3,}/g, "\n\n");
  return text.trim();
}

export interface Excerpt {
  text: string;
  truncated: boolean;
}

/**
 * Longest whitespace-bounded prefix of at most `budget` code points.
 * Tokens are never split, so a first word longer than the budget leaves an
 * empty excerpt.
 */
export function excerpt(text: string, budget: number): Excerpt {
  const chars = Array.from(text);
  if (chars.length <= budget) return { text, truncated: false };

  const limit = Math.max(0, Math.floor(budget));
  let cut = -1;
  for (let i = limit; i > 0; i -= 1) {
    if (/\s/u.test(chars[i] ?? "")) {
      cut = i;
      break;
    }
  }

  const prefix = chars.slice(0, Math.max(cut, 0));
  return { text: prefix.join("").trimEnd(), truncated: true };
}

export function normalizeHashtags(tags: string[]): string[] {
  const seen = new Set<string>();
  for (const tag of tags) {
    const name = tag.trim().replace(/^#+/, "").toLowerCase();
    if (name) seen.add(name);
  }
  return [...seen].sort();
}

export interface NormalizeOptions {
  fullContent?: boolean;
  excerptChars?: number;
}

export function normalizeStatus(status: TimelineStatus, options: NormalizeOptions = {}): ResultItem {
  const fullText = htmlToText(status.content);
  const body = options.fullContent
    ? { text: fullText, truncated: false }
    : excerpt(fullText, options.excerptChars ?? DEFAULT_EXCERPT_CHARS);

  return {
    id: status.id,
    timestamp: status.createdAt.toISOString(),
    url: status.url,
    hashtags: normalizeHashtags(status.tags),
    media: status.mediaAttachments.map((m) => ({ url: m.url, type: m.type })),
    content: body.text,
    truncated: body.truncated,
  };
}
