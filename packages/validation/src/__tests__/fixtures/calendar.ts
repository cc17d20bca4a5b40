import type { SessionCalendar, TradingMinuteCalendar } from "../../types.js";

export function utc(iso: string): Date {
  return new Date(`${iso}Z`);
}

const FIRST_SESSION = utc("2020-01-01T00:00:00");
const LAST_SESSION = utc("2020-12-31T00:00:00");
const OPEN_MINUTE = 14 * 60 + 31;
const CLOSE_MINUTE = 21 * 60;

function isWeekday(value: Date): boolean {
  const day = value.getUTCDay();
  return day !== 0 && day !== 6;
}

/**
 * Weekday sessions across 2020, trading 14:31-21:00 UTC. No holidays.
 */
export const testCalendar: SessionCalendar & TradingMinuteCalendar = {
  name: "TEST",
  firstSession: FIRST_SESSION,
  lastSession: LAST_SESSION,
  firstTradingMinute: utc("2020-01-01T14:31:00"),
  lastTradingMinute: utc("2020-12-31T21:00:00"),

  isSession(date: Date): boolean {
    return (
      date.getTime() >= FIRST_SESSION.getTime() &&
      date.getTime() <= LAST_SESSION.getTime() &&
      isWeekday(date)
    );
  },

  isTradingMinute(minute: Date): boolean {
    const session = utc(minute.toISOString().slice(0, 10) + "T00:00:00");
    const minuteOfDay = minute.getUTCHours() * 60 + minute.getUTCMinutes();
    return this.isSession(session) && minuteOfDay >= OPEN_MINUTE && minuteOfDay <= CLOSE_MINUTE;
  },
};
