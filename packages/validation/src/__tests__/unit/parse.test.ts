import {
  DateOutOfBounds,
  MinuteOutOfBounds,
  NotDateError,
  NotSessionError,
  NotTradingMinuteError,
  TimestampParseError,
} from "@tradecal/errors";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import {
  isWithinBounds,
  parseDate,
  parseSession,
  parseTimestamp,
  parseTradingMinute,
} from "../../index.js";
import { testCalendar, utc } from "../fixtures/calendar.js";

describe("parseTimestamp", () => {
  it("parses ISO strings, epoch milliseconds and dates", () => {
    const expected = utc("2020-06-15T15:00:00");

    expect(parseTimestamp("2020-06-15T15:00:00Z", "minute")).toEqual(expected);
    expect(parseTimestamp(1592233200000, "minute")).toEqual(expected);
    expect(parseTimestamp(expected, "minute")).toEqual(expected);
  });

  it("throws TimestampParseError for unparseable input", () => {
    expect(() => parseTimestamp("not a date", "minute")).toThrow(TimestampParseError);
    expect(() => parseTimestamp("not a date", "minute")).toThrow(
      "Parameter `minute` takes a timestamp although received input 'not a date' which could not be parsed as one.",
    );
  });

  it("throws TimestampParseError for invalid dates and empty strings", () => {
    expect(() => parseTimestamp(new Date(Number.NaN), "minute")).toThrow(
      "Parameter `minute` takes a timestamp although received input 'Invalid Date' which could not be parsed as one.",
    );
    expect(() => parseTimestamp("  ", "minute")).toThrow(TimestampParseError);
    expect(() => parseTimestamp(Number.POSITIVE_INFINITY, "minute")).toThrow(TimestampParseError);
  });

  it("throws MinuteOutOfBounds outside the calendar's trading minutes", () => {
    expect(() => parseTimestamp("2021-01-04T14:31:00Z", "end", testCalendar)).toThrow(
      "Parameter `end` received as '2021-01-04 14:31:00+00:00' although cannot be later than the last trading minute of calendar 'TEST' ('2020-12-31 21:00:00+00:00').",
    );
    expect(() => parseTimestamp("2020-01-01T14:30:00Z", "start", testCalendar)).toThrow(
      MinuteOutOfBounds,
    );
  });

  it("accepts the calendar's first and last trading minutes", () => {
    expect(parseTimestamp("2020-01-01T14:31:00Z", "start", testCalendar)).toEqual(
      testCalendar.firstTradingMinute,
    );
    expect(parseTimestamp("2020-12-31T21:00:00Z", "end", testCalendar)).toEqual(
      testCalendar.lastTradingMinute,
    );
  });
});

describe("timestamps without an offset", () => {
  const hostZone = process.env.TZ;

  beforeAll(() => {
    process.env.TZ = "Europe/Berlin";
  });

  afterAll(() => {
    if (hostZone === undefined) {
      delete process.env.TZ;
    } else {
      process.env.TZ = hostZone;
    }
  });

  it("reads date-times as UTC whatever the host zone", () => {
    expect(parseTimestamp("2020-06-15 10:00", "minute")).toEqual(utc("2020-06-15T10:00:00"));
    expect(parseTimestamp("2020-06-15T10:00:30.250", "minute")).toEqual(
      new Date("2020-06-15T10:00:30.250Z"),
    );
  });

  it("reads a midnight date-time as a date", () => {
    expect(parseDate("2020-06-15T00:00:00", "date")).toEqual(utc("2020-06-15T00:00:00"));
  });

  it("keeps an explicit offset", () => {
    expect(parseTimestamp("2020-06-15T12:00:00+02:00", "minute")).toEqual(
      utc("2020-06-15T10:00:00"),
    );
  });
});

describe("parseDate", () => {
  it("parses a date-only string to UTC midnight", () => {
    expect(parseDate("2020-06-15", "date")).toEqual(utc("2020-06-15T00:00:00"));
  });

  it("throws NotDateError for a timestamp with a time component", () => {
    expect(() => parseDate("2020-06-15T10:00:00Z", "date")).toThrow(
      "Parameter `date` takes a date although received input that parsed to '2020-06-15 10:00:00+00:00' which has a time component.",
    );
    expect(() => parseDate("2020-06-15T10:00:00Z", "date")).toThrow(NotDateError);
  });

  it("throws DateOutOfBounds outside the calendar's sessions", () => {
    expect(() => parseDate("2019-06-01", "start", testCalendar)).toThrow(
      "Parameter `start` received as '2019-06-01' although cannot be earlier than the first session of calendar 'TEST' ('2020-01-01').",
    );
    expect(() => parseDate("2021-01-01", "end", testCalendar)).toThrow(DateOutOfBounds);
  });

  it("raises DateOutOfBounds only for dates outside the bounds", () => {
    const dates = [
      "2019-12-30",
      "2019-12-31",
      "2020-01-01",
      "2020-06-13",
      "2020-06-15",
      "2020-12-31",
      "2021-01-01",
      "2021-06-01",
    ];

    for (const date of dates) {
      const parsed = utc(`${date}T00:00:00`);
      const outside = !isWithinBounds(parsed, testCalendar.firstSession, testCalendar.lastSession);
      let thrown: unknown;
      try {
        expect(parseDate(date, "date", testCalendar)).toEqual(parsed);
      } catch (error) {
        thrown = error;
      }

      if (outside) {
        expect(thrown).toBeInstanceOf(DateOutOfBounds);
        const earlier = parsed.getTime() < testCalendar.firstSession.getTime();
        expect(thrown).toMatchObject({ outcome: earlier ? "earlier" : "later" });
      } else {
        expect(thrown).toBeUndefined();
      }
    }
  });
});

describe("parseSession", () => {
  it("returns a session", () => {
    expect(parseSession(testCalendar, "2020-06-15", "session")).toEqual(utc("2020-06-15T00:00:00"));
  });

  it("throws NotSessionError for a weekend within bounds", () => {
    expect(() => parseSession(testCalendar, "2020-06-13", "session")).toThrow(
      "Parameter `session` takes a session label although received input that parsed to '2020-06-13' which is not a session of calendar 'TEST'.",
    );
  });

  it("throws NotSessionError for a date before the first session", () => {
    expect(() => parseSession(testCalendar, "2019-12-31", "session")).toThrow(
      "Parameter `session` takes a session label although received input that parsed to '2019-12-31' which is earlier than the first session of calendar 'TEST' ('2020-01-01').",
    );
  });

  it("throws NotSessionError for a date after the last session", () => {
    expect(() => parseSession(testCalendar, "2021-01-01", "session")).toThrow(NotSessionError);
  });

  it("checks for a time component before session membership", () => {
    expect(() => parseSession(testCalendar, "2020-06-15T15:00:00Z", "session")).toThrow(
      NotDateError,
    );
  });
});

describe("parseTradingMinute", () => {
  it("returns a trading minute", () => {
    expect(parseTradingMinute(testCalendar, "2020-06-15T15:00:00Z", "minute")).toEqual(
      utc("2020-06-15T15:00:00"),
    );
  });

  it("throws NotTradingMinuteError outside trading hours", () => {
    expect(() => parseTradingMinute(testCalendar, "2020-06-15T03:00:00Z", "minute")).toThrow(
      "Parameter `minute` takes a trading minute although received input that parsed to '2020-06-15 03:00:00+00:00' which is not a trading minute of calendar 'TEST'.",
    );
  });

  it("throws NotTradingMinuteError after the last trading minute", () => {
    expect(() => parseTradingMinute(testCalendar, "2021-01-04T15:00:00Z", "minute")).toThrow(
      NotTradingMinuteError,
    );
  });

  it("throws TimestampParseError before consulting the calendar", () => {
    expect(() => parseTradingMinute(testCalendar, "later", "minute")).toThrow(TimestampParseError);
  });
});

describe("isWithinBounds", () => {
  it("includes both bounds", () => {
    const lower = utc("2020-01-01T00:00:00");
    const upper = utc("2020-01-02T00:00:00");

    expect(isWithinBounds(lower, lower, upper)).toBe(true);
    expect(isWithinBounds(upper, lower, upper)).toBe(true);
    expect(isWithinBounds(utc("2020-01-03T00:00:00"), lower, upper)).toBe(false);
  });
});
