import {
  ConfigError,
  type DateRange,
  InvalidDateFormatError,
  InvalidRangeError,
} from "@timeline-range/shared";
import { DateTime, IANAZone } from "luxon";

export interface CalendarDate {
  year: number;
  month: number; // 1-12
  day: number;
}

// Tried in order; first match wins. `yyyy` takes exactly four digits.
const DATE_FORMATS = ["d.M.yyyy", "yyyy-M-d"] as const;

function parseDay(value: string, zone: string): DateTime | null {
  const trimmed = value.trim();
  for (const format of DATE_FORMATS) {
    const parsed = DateTime.fromFormat(trimmed, format, { zone });
    if (parsed.isValid) return parsed;
  }
  return null;
}

export function parseCalendarDate(value: string): CalendarDate {
  const parsed = parseDay(value, "UTC");
  if (!parsed) throw new InvalidDateFormatError(value);
  return { year: parsed.year, month: parsed.month, day: parsed.day };
}

export interface DateRangeOptions {
  /** IANA zone the days are interpreted in. Defaults to UTC. */
  timeZone?: string;
}

/**
 * Parse two user-supplied dates into an inclusive whole-day range.
 */
export function parseDateRange(
  startValue: string,
  endValue: string,
  options: DateRangeOptions = {},
): DateRange {
  const timeZone = options.timeZone ?? "UTC";
  if (!IANAZone.isValidZone(timeZone)) {
    throw new ConfigError(`Unknown timezone: ${timeZone}`);
  }

  const startDay = parseDay(startValue, timeZone);
  if (!startDay) throw new InvalidDateFormatError(startValue);
  const endDay = parseDay(endValue, timeZone);
  if (!endDay) throw new InvalidDateFormatError(endValue);

  const start = startDay.startOf("day").toJSDate();
  const end = endDay.endOf("day").toJSDate();
  if (start.getTime() > end.getTime()) {
    throw new InvalidRangeError(start, end);
  }

  return Object.freeze({ start, end });
}
