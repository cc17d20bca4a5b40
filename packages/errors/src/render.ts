/**
 * The boundary where a calendar error becomes user-facing text.
 */

import type {
  DateOutOfBounds,
  MinuteOutOfBounds,
  NotSessionError,
  NotTradingMinuteError,
} from "./bounds.js";
import { CALENDAR_ERROR_CATALOG, type CalendarErrorCode, type ErrorCategory } from "./catalog.js";
import type { BoundsContractViolationError, TemplateFormatError } from "./internal.js";
import type { ReporterConfigurationError } from "./reporter.js";
import type {
  CalendarNameCollision,
  CyclicCalendarAlias,
  InvalidCalendarName,
  NoSessionsError,
  NotDateError,
  ScheduleFunctionInvalidCalendar,
  ScheduleFunctionWithoutCalendar,
  TimestampParseError,
} from "./templated.js";

/**
 * Closed union of every concrete calendar error.
 * Switch on `.code` for exhaustive handling.
 */
export type AnyCalendarError =
  | InvalidCalendarName
  | CalendarNameCollision
  | CyclicCalendarAlias
  | ScheduleFunctionWithoutCalendar
  | NoSessionsError
  | ScheduleFunctionInvalidCalendar
  | TimestampParseError
  | NotDateError
  | NotSessionError
  | DateOutOfBounds
  | NotTradingMinuteError
  | MinuteOutOfBounds
  | ReporterConfigurationError
  | TemplateFormatError
  | BoundsContractViolationError;

/**
 * Render the user-facing message of a calendar error.
 *
 * Templated errors render (once) from their context. All other errors return
 * the message composed when they were raised.
 */
export function renderCalendarError(error: AnyCalendarError): string {
  switch (error.code) {
    case "CALENDAR_INVALID_NAME":
    case "CALENDAR_NAME_COLLISION":
    case "CALENDAR_CYCLIC_ALIAS":
    case "SCHEDULE_FUNCTION_WITHOUT_CALENDAR":
    case "CALENDAR_NO_SESSIONS":
    case "SCHEDULE_FUNCTION_INVALID_CALENDAR":
    case "TIMESTAMP_UNPARSEABLE":
    case "DATE_HAS_TIME_COMPONENT":
      return error.render();
    case "SESSION_NOT_A_SESSION":
    case "SESSION_DATE_OUT_OF_BOUNDS":
    case "MINUTE_NOT_A_TRADING_MINUTE":
    case "MINUTE_OUT_OF_BOUNDS":
    case "REPORTER_CONFIGURATION_INVALID":
    case "INTERNAL_TEMPLATE_FORMAT":
    case "INTERNAL_BOUNDS_CONTRACT_VIOLATION":
      return error.message;
    default: {
      const unhandled: never = error;
      throw new Error(`Unhandled calendar error: ${String(unhandled)}`);
    }
  }
}

/** A calendar error described for display */
export interface CalendarErrorDescription {
  code: CalendarErrorCode;
  title: string;
  category: ErrorCategory;
  message: string;
}

export function describeCalendarError(error: AnyCalendarError): CalendarErrorDescription {
  const entry = CALENDAR_ERROR_CATALOG[error.code];
  return {
    code: error.code,
    title: entry.title,
    category: entry.category,
    message: renderCalendarError(error),
  };
}
