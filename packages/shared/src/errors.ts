export type TimelineFilterErrorCode =
  | "INVALID_DATE_FORMAT"
  | "INVALID_RANGE"
  | "TRANSPORT_ERROR"
  | "MALFORMED_POST"
  | "AUTHENTICATION_ERROR"
  | "CONFIG_ERROR";

/**
 * Base class for every error a filtering run can surface. Each subclass carries
 * the value needed to diagnose it (offending input, HTTP status, post id).
 */
export class TimelineFilterError extends Error {
  constructor(
    readonly code: TimelineFilterErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "TimelineFilterError";
  }
}

export class InvalidDateFormatError extends TimelineFilterError {
  constructor(readonly value: string) {
    super("INVALID_DATE_FORMAT", `Invalid date format: "${value}". Use DD.MM.YYYY or YYYY-MM-DD`);
    this.name = "InvalidDateFormatError";
  }
}

export class InvalidRangeError extends TimelineFilterError {
  constructor(
    readonly start: Date,
    readonly end: Date,
  ) {
    super(
      "INVALID_RANGE",
      `Start date must not be after end date (${start.toISOString()} > ${end.toISOString()})`,
    );
    this.name = "InvalidRangeError";
  }
}

export class TransportError extends TimelineFilterError {
  readonly url: string;
  readonly status: number | null;

  constructor(params: { url: string; status: number | null; message: string; cause?: unknown }) {
    super("TRANSPORT_ERROR", params.message, { cause: params.cause });
    this.name = "TransportError";
    this.url = params.url;
    this.status = params.status;
  }
}

export class MalformedPostError extends TimelineFilterError {
  constructor(
    readonly postId: string | null,
    readonly field: string,
    detail?: string,
  ) {
    const subject = postId ? `Status ${postId}` : "Status without id";
    super("MALFORMED_POST", `${subject} has a missing or invalid "${field}"${detail ? `: ${detail}` : ""}`);
    this.name = "MalformedPostError";
  }
}

export class AuthenticationError extends TimelineFilterError {
  constructor(
    readonly status: number | null,
    message: string,
    options?: { cause?: unknown },
  ) {
    super("AUTHENTICATION_ERROR", message, options);
    this.name = "AuthenticationError";
  }
}

export class ConfigError extends TimelineFilterError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIG_ERROR", message, options);
    this.name = "ConfigError";
  }
}

export function isTimelineFilterError(error: unknown): error is TimelineFilterError {
  return error instanceof TimelineFilterError;
}
