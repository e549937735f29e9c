import { MalformedPostError, type MediaAttachment, type MediaType } from "@timeline-range/shared";

import type { ClassifiedStatus, TimelineStatus } from "./types";

const ISO_INSTANT = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:\d{2})$/;

function asRecord(value: unknown): Record<string, unknown> {
  if (value && typeof value === "object" && !Array.isArray(value))
    return value as Record<string, unknown>;
  return {};
}

function asString(value: unknown): string | null {
  return typeof value === "string" && value.length > 0 ? value : null;
}

function asId(value: unknown): string | null {
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return asString(value);
}

function asMediaType(value: unknown): MediaType {
  return value === "image" || value === "gifv" || value === "video" || value === "audio"
    ? value
    : "unknown";
}

function parseTags(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  const out: string[] = [];
  for (const tag of value) {
    const name = asString(asRecord(tag).name);
    if (name) out.push(name);
  }
  return out;
}

function parseMedia(value: unknown): MediaAttachment[] {
  if (!Array.isArray(value)) return [];
  const out: MediaAttachment[] = [];
  for (const item of value) {
    const rec = asRecord(item);
    const url = asString(rec.url) ?? asString(rec.remote_url);
    if (!url) continue;
    out.push({ url, type: asMediaType(rec.type) });
  }
  return out;
}

export function parseCreatedAt(postId: string, value: unknown): Date {
  const raw = asString(value);
  if (!raw) throw new MalformedPostError(postId, "created_at");
  if (!ISO_INSTANT.test(raw)) {
    throw new MalformedPostError(postId, "created_at", `not an ISO-8601 instant: "${raw}"`);
  }
  const parsed = new Date(raw);
  if (Number.isNaN(parsed.getTime())) {
    throw new MalformedPostError(postId, "created_at", `unparseable timestamp "${raw}"`);
  }
  return parsed;
}

/** Id of a raw status, or null when it has none. */
export function statusIdOf(raw: unknown): string | null {
  return asId(asRecord(raw).id);
}

/**
 * Validate one element of the statuses array and tag it as original or reblog.
 * A missing id or created_at is fatal for the run.
 */
export function parseStatus(raw: unknown): ClassifiedStatus {
  const rec = asRecord(raw);
  const id = asId(rec.id);
  if (!id) throw new MalformedPostError(null, "id");

  const status: TimelineStatus = {
    id,
    createdAt: parseCreatedAt(id, rec.created_at),
    url: asString(rec.url) ?? asString(rec.uri),
    content: typeof rec.content === "string" ? rec.content : "",
    tags: parseTags(rec.tags),
    mediaAttachments: parseMedia(rec.media_attachments),
  };

  if (rec.reblog !== null && rec.reblog !== undefined) {
    return { kind: "reblog", status, rebloggedId: asId(asRecord(rec.reblog).id) };
  }
  return { kind: "original", status };
}
