/**
 * Bounds errors: a timestamp checked against a calendar's first/last
 * session or trading minute.
 *
 * Abstract base: CalendarBoundsError
 * Concrete:
 *   - NotSessionError (SESSION_NOT_A_SESSION)
 *   - DateOutOfBounds (SESSION_DATE_OUT_OF_BOUNDS)
 *   - NotTradingMinuteError (MINUTE_NOT_A_TRADING_MINUTE)
 *   - MinuteOutOfBounds (MINUTE_OUT_OF_BOUNDS)
 *
 * Each error snapshots the calendar's name and bounds at construction and
 * renders its message there. No reference to the calendar is kept, so the
 * message reflects the calendar as it was when the error was raised.
 */

import { CalendarError } from "./base.js";
import { CALENDAR_ERROR_CATALOG } from "./catalog.js";
import { formatMinute, formatSession } from "./format.js";
import { BoundsContractViolationError } from "./internal.js";

// ---------------------------------------------------------------------------
// Calendar collaborator contract
// ---------------------------------------------------------------------------

/** The session bounds of a calendar */
export interface SessionBounds {
  readonly name: string;
  readonly firstSession: Date;
  readonly lastSession: Date;
}

/** The trading-minute bounds of a calendar */
export interface TradingMinuteBounds {
  readonly name: string;
  readonly firstTradingMinute: Date;
  readonly lastTradingMinute: Date;
}

/** A calendar exposing both pairs of bounds */
export type ExchangeCalendarBounds = SessionBounds & TradingMinuteBounds;

// ---------------------------------------------------------------------------
// Shared three-way bound check
// ---------------------------------------------------------------------------

/** Where a value falls relative to a pair of bounds */
export type BoundsOutcome = "earlier" | "later" | "within";

/** Which kind of calendar point a value was expected to be */
export type BoundLabel = "session" | "trading minute";

/**
 * How the message subject is phrased:
 * - `membership`: the value was expected to be a valid point
 * - `range`: the value was only required to lie within bounds
 */
export type SubjectStyle = "membership" | "range";

export function compareToBounds(value: Date, lower: Date, upper: Date): BoundsOutcome {
  if (value.getTime() < lower.getTime()) return "earlier";
  if (value.getTime() > upper.getTime()) return "later";
  return "within";
}

export interface BoundsMessageParams {
  readonly calendarName: string;
  readonly lower: Date;
  readonly upper: Date;
  readonly value: Date;
  readonly paramName: string;
  readonly label: BoundLabel;
  readonly style: SubjectStyle;
}

const LABEL_NOUN: Record<BoundLabel, string> = {
  session: "session label",
  "trading minute": "trading minute",
};

function formatPoint(label: BoundLabel, value: Date): string {
  return label === "session" ? formatSession(value) : formatMinute(value);
}

/**
 * Compose the message for a value checked against a calendar's bounds.
 *
 * Returns the outcome alongside the message. A `range` subject whose value
 * lies within bounds is a contract violation at the raise site and throws
 * `BoundsContractViolationError` with `errorName` in its message.
 */
export function composeBoundsMessage(
  params: BoundsMessageParams,
  errorName: string,
): { outcome: BoundsOutcome; message: string } {
  const { calendarName, lower, upper, value, paramName, label, style } = params;
  const shown = formatPoint(label, value);
  const outcome = compareToBounds(value, lower, upper);

  const subject =
    style === "membership"
      ? `Parameter \`${paramName}\` takes a ${LABEL_NOUN[label]} although received input that parsed to '${shown}' which`
      : `Parameter \`${paramName}\` received as '${shown}' although`;
  const verb = style === "membership" ? "is" : "cannot be";

  switch (outcome) {
    case "earlier":
      return {
        outcome,
        message: `${subject} ${verb} earlier than the first ${label} of calendar '${calendarName}' ('${formatPoint(label, lower)}').`,
      };
    case "later":
      return {
        outcome,
        message: `${subject} ${verb} later than the last ${label} of calendar '${calendarName}' ('${formatPoint(label, upper)}').`,
      };
    case "within":
      if (style === "range") {
        throw new BoundsContractViolationError(
          errorName,
          paramName,
          `'${shown}' lies within ('${formatPoint(label, lower)}', '${formatPoint(label, upper)}')`,
        );
      }
      return {
        outcome,
        message: `${subject} is not a ${label} of calendar '${calendarName}'.`,
      };
  }
}

// ---------------------------------------------------------------------------
// Abstract base
// ---------------------------------------------------------------------------

type BoundsCode =
  | "SESSION_NOT_A_SESSION"
  | "SESSION_DATE_OUT_OF_BOUNDS"
  | "MINUTE_NOT_A_TRADING_MINUTE"
  | "MINUTE_OUT_OF_BOUNDS";

/**
 * Base class for errors raised when a value fails a check against a
 * calendar's bounds.
 *
 * An invalid timestamp as the value or either bound throws
 * `BoundsContractViolationError`.
 */
export abstract class CalendarBoundsError extends CalendarError {
  readonly _tag = "InputValidationError" as const;
  abstract override readonly code: BoundsCode;

  /** Name of the calendar the value was checked against */
  readonly calendarName: string;
  /** First valid point of the calendar when the error was raised */
  readonly lowerBound: Date;
  /** Last valid point of the calendar when the error was raised */
  readonly upperBound: Date;
  /** The offending value */
  readonly value: Date;
  /** Name of the parameter that received `value` */
  readonly paramName: string;
  readonly outcome: BoundsOutcome;

  protected constructor(
    code: BoundsCode,
    bounds: { name: string; lower: Date; upper: Date },
    value: Date,
    paramName: string,
    label: BoundLabel,
    style: SubjectStyle,
  ) {
    const errorName = CALENDAR_ERROR_CATALOG[code].name;
    const timestamps = { value, "lower bound": bounds.lower, "upper bound": bounds.upper };
    for (const [role, timestamp] of Object.entries(timestamps)) {
      if (!Number.isFinite(timestamp.getTime())) {
        throw new BoundsContractViolationError(
          errorName,
          paramName,
          `its ${role} is an invalid timestamp`,
        );
      }
    }

    const snapshot = {
      calendarName: bounds.name,
      lower: new Date(bounds.lower.getTime()),
      upper: new Date(bounds.upper.getTime()),
      value: new Date(value.getTime()),
    };
    const { outcome, message } = composeBoundsMessage(
      { ...snapshot, paramName, label, style },
      errorName,
    );
    super(message);
    this.calendarName = snapshot.calendarName;
    this.lowerBound = snapshot.lower;
    this.upperBound = snapshot.upper;
    this.value = snapshot.value;
    this.paramName = paramName;
    this.outcome = outcome;
  }
}

// ---------------------------------------------------------------------------
// Session errors
// ---------------------------------------------------------------------------

/**
 * Input does not represent a valid session.
 *
 * Raised if a parameter expecting a session label receives input that parses
 * correctly (UTC midnight) although is not a session.
 */
export class NotSessionError extends CalendarBoundsError {
  readonly code = "SESSION_NOT_A_SESSION" as const;

  constructor(calendar: SessionBounds, session: Date, paramName: string) {
    super(
      "SESSION_NOT_A_SESSION",
      { name: calendar.name, lower: calendar.firstSession, upper: calendar.lastSession },
      session,
      paramName,
      "session",
      "membership",
    );
  }
}

/**
 * A date required to be within the calendar's session bounds is not.
 *
 * Constructing one for a date within bounds throws
 * `BoundsContractViolationError`.
 */
export class DateOutOfBounds extends CalendarBoundsError {
  readonly code = "SESSION_DATE_OUT_OF_BOUNDS" as const;

  constructor(calendar: SessionBounds, date: Date, paramName: string) {
    super(
      "SESSION_DATE_OUT_OF_BOUNDS",
      { name: calendar.name, lower: calendar.firstSession, upper: calendar.lastSession },
      date,
      paramName,
      "session",
      "range",
    );
  }
}

// ---------------------------------------------------------------------------
// Trading minute errors
// ---------------------------------------------------------------------------

/** A timestamp assumed as a trading minute is not a trading minute. */
export class NotTradingMinuteError extends CalendarBoundsError {
  readonly code = "MINUTE_NOT_A_TRADING_MINUTE" as const;

  constructor(calendar: TradingMinuteBounds, minute: Date, paramName: string) {
    super(
      "MINUTE_NOT_A_TRADING_MINUTE",
      { name: calendar.name, lower: calendar.firstTradingMinute, upper: calendar.lastTradingMinute },
      minute,
      paramName,
      "trading minute",
      "membership",
    );
  }
}

/**
 * A minute required to be within the calendar's trading-minute bounds is not.
 *
 * Constructing one for a minute within bounds throws
 * `BoundsContractViolationError`.
 */
export class MinuteOutOfBounds extends CalendarBoundsError {
  readonly code = "MINUTE_OUT_OF_BOUNDS" as const;

  constructor(calendar: TradingMinuteBounds, minute: Date, paramName: string) {
    super(
      "MINUTE_OUT_OF_BOUNDS",
      { name: calendar.name, lower: calendar.firstTradingMinute, upper: calendar.lastTradingMinute },
      minute,
      paramName,
      "trading minute",
      "range",
    );
  }
}
