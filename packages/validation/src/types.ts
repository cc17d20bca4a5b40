import type { SessionBounds, TradingMinuteBounds } from "@tradecal/errors";

/** Input accepted wherever a timestamp is expected */
export type TimestampInput = Date | string | number;

/** A calendar that can tell whether a date is a session */
export interface SessionCalendar extends SessionBounds {
  isSession(date: Date): boolean;
}

/** A calendar that can tell whether a timestamp is a trading minute */
export interface TradingMinuteCalendar extends TradingMinuteBounds {
  isTradingMinute(minute: Date): boolean;
}
