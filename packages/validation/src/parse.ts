import {
  DateOutOfBounds,
  formatMinute,
  isUtcMidnight,
  MinuteOutOfBounds,
  NotDateError,
  NotSessionError,
  NotTradingMinuteError,
  type SessionBounds,
  TimestampParseError,
  type TradingMinuteBounds,
} from "@tradecal/errors";
import { z } from "zod";
import type { SessionCalendar, TimestampInput, TradingMinuteCalendar } from "./types.js";

// ISO date-time without a `Z` or `±HH:MM` offset
const NAIVE_DATE_TIME = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)$/;

function readNaiveAsUtc(value: string): string {
  const match = NAIVE_DATE_TIME.exec(value);
  return match === null ? value : `${match[1]}T${match[2]}Z`;
}

const TimestampSchema = z
  .union([z.date(), z.string().trim().min(1).transform(readNaiveAsUtc), z.number().finite()])
  .pipe(z.coerce.date());

/** True when `value` lies within `[lower, upper]` inclusive */
export function isWithinBounds(value: Date, lower: Date, upper: Date): boolean {
  return value.getTime() >= lower.getTime() && value.getTime() <= upper.getTime();
}

/**
 * Parse input to a timestamp.
 *
 * ISO strings without an offset are read as UTC, whether date-only or
 * date-time (`T` or space separated). Other strings follow `Date` parsing.
 * Numbers are epoch milliseconds.
 *
 * @param calendar - When given, the timestamp must lie within its trading
 *   minutes.
 * @throws TimestampParseError if the input cannot be parsed
 * @throws MinuteOutOfBounds if outside `calendar`'s trading minutes
 */
export function parseTimestamp(
  value: TimestampInput,
  paramName: string,
  calendar?: TradingMinuteBounds,
): Date {
  const result = TimestampSchema.safeParse(value);
  if (!result.success) {
    throw new TimestampParseError(
      { param_name: paramName, value: String(value) },
      result.error,
    );
  }
  const ts = result.data;

  if (
    calendar !== undefined &&
    !isWithinBounds(ts, calendar.firstTradingMinute, calendar.lastTradingMinute)
  ) {
    throw new MinuteOutOfBounds(calendar, ts, paramName);
  }
  return ts;
}

/**
 * Parse input to a date, a timestamp at UTC midnight.
 *
 * @param calendar - When given, the date must lie within its sessions.
 * @throws TimestampParseError if the input cannot be parsed
 * @throws NotDateError if the parsed timestamp has a time component
 * @throws DateOutOfBounds if outside `calendar`'s sessions
 */
export function parseDate(value: TimestampInput, paramName: string, calendar?: SessionBounds): Date {
  const ts = parseTimestamp(value, paramName);

  if (!isUtcMidnight(ts)) {
    throw new NotDateError({ param_name: paramName, value: formatMinute(ts) });
  }

  if (calendar !== undefined && !isWithinBounds(ts, calendar.firstSession, calendar.lastSession)) {
    throw new DateOutOfBounds(calendar, ts, paramName);
  }
  return ts;
}

/**
 * Parse input to a session label of `calendar`.
 *
 * @throws NotSessionError if the parsed date is not a session
 */
export function parseSession(
  calendar: SessionCalendar,
  value: TimestampInput,
  paramName: string,
): Date {
  const date = parseDate(value, paramName);
  if (!calendar.isSession(date)) {
    throw new NotSessionError(calendar, date, paramName);
  }
  return date;
}

/**
 * Parse input to a trading minute of `calendar`.
 *
 * @throws NotTradingMinuteError if the parsed timestamp is not a trading minute
 */
export function parseTradingMinute(
  calendar: TradingMinuteCalendar,
  value: TimestampInput,
  paramName: string,
): Date {
  const minute = parseTimestamp(value, paramName);
  if (!calendar.isTradingMinute(minute)) {
    throw new NotTradingMinuteError(calendar, minute, paramName);
  }
  return minute;
}
