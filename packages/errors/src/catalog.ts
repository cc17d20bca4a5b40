/**
 * Error Catalog - Single Source of Truth
 *
 * Defines every error code raised by the trading-calendar packages. Each code
 * maps to its class name, a base error type and a category. Templated kinds
 * also carry the message template rendered from their context.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 * Domains: CALENDAR, SCHEDULE_FUNCTION, SESSION, MINUTE, TIMESTAMP, DATE,
 * REPORTER, INTERNAL
 *
 * Template text is matched on by downstream consumers. Do not reword it, and
 * keep each template a single string literal so its placeholders stay typed.
 */

/**
 * The behavioral base error types that all error codes map to.
 */
export type BaseErrorType = "ConfigurationError" | "InputValidationError" | "InternalError";

export const CALENDAR_ERROR_CATALOG = {
  // ============================================================================
  // CONFIGURATION ERRORS - Registry lookup and setup
  // ============================================================================
  CALENDAR_INVALID_NAME: {
    name: "InvalidCalendarName",
    category: "configuration",
    baseType: "ConfigurationError",
    isExpected: true,
    title: "Invalid calendar name",
    description: "A calendar was requested under a name that is not registered",
    template: "The requested ExchangeCalendar, {calendar_name}, does not exist.",
  },
  CALENDAR_NAME_COLLISION: {
    name: "CalendarNameCollision",
    category: "configuration",
    baseType: "ConfigurationError",
    isExpected: true,
    title: "Calendar name collision",
    description: "The registry already holds a calendar under the given name",
    template: "A calendar with the name {calendar_name} is already registered.",
  },
  CALENDAR_CYCLIC_ALIAS: {
    name: "CyclicCalendarAlias",
    category: "configuration",
    baseType: "ConfigurationError",
    isExpected: true,
    title: "Cyclic calendar alias",
    description: "Calendar aliases resolve back onto themselves",
    template: "Cycle in calendar aliases: [{cycle}]",
  },
  SCHEDULE_FUNCTION_WITHOUT_CALENDAR: {
    name: "ScheduleFunctionWithoutCalendar",
    category: "configuration",
    baseType: "ConfigurationError",
    isExpected: true,
    title: "Schedule function without calendar",
    description: "schedule_function was called with no calendar to build an event rule from",
    template:
      "To use schedule_function, the TradingAlgorithm must be running on an ExchangeTradingSchedule, rather than {schedule}.",
  },
  CALENDAR_NO_SESSIONS: {
    name: "NoSessionsError",
    category: "configuration",
    baseType: "ConfigurationError",
    isExpected: true,
    title: "No sessions in range",
    description: "A calendar was requested for a range containing no sessions",
    template:
      "The requested ExchangeCalendar, {calendar_name}, cannot be created as there would be no sessions between the requested `start` ('{start}') and `end` ('{end}') dates.",
  },
  SCHEDULE_FUNCTION_INVALID_CALENDAR: {
    name: "ScheduleFunctionInvalidCalendar",
    category: "configuration",
    baseType: "ConfigurationError",
    isExpected: true,
    title: "Invalid schedule calendar",
    description: "schedule_function was called with a calendar argument it does not accept",
    template:
      "Invalid calendar '{given_calendar}' passed to schedule_function. Allowed options are {allowed_calendars}.",
  },

  // ============================================================================
  // INPUT VALIDATION ERRORS - Caller-supplied timestamps
  // ============================================================================
  TIMESTAMP_UNPARSEABLE: {
    name: "TimestampParseError",
    category: "input",
    baseType: "InputValidationError",
    isExpected: true,
    title: "Unparseable timestamp",
    description: "Input passed as a timestamp could not be parsed",
    template:
      "Parameter `{param_name}` takes a timestamp although received input '{value}' which could not be parsed as one.",
  },
  DATE_HAS_TIME_COMPONENT: {
    name: "NotDateError",
    category: "input",
    baseType: "InputValidationError",
    isExpected: true,
    title: "Date has a time component",
    description: "Input passed as a date parsed to a timestamp that is not UTC midnight",
    template:
      "Parameter `{param_name}` takes a date although received input that parsed to '{value}' which has a time component.",
  },
  SESSION_NOT_A_SESSION: {
    name: "NotSessionError",
    category: "input",
    baseType: "InputValidationError",
    isExpected: true,
    title: "Not a session",
    description: "Input passed as a session label does not represent a session",
  },
  SESSION_DATE_OUT_OF_BOUNDS: {
    name: "DateOutOfBounds",
    category: "input",
    baseType: "InputValidationError",
    isExpected: true,
    title: "Date out of bounds",
    description: "A date required to lie within the calendar's sessions does not",
  },
  MINUTE_NOT_A_TRADING_MINUTE: {
    name: "NotTradingMinuteError",
    category: "input",
    baseType: "InputValidationError",
    isExpected: true,
    title: "Not a trading minute",
    description: "Input passed as a trading minute is not a trading minute",
  },
  MINUTE_OUT_OF_BOUNDS: {
    name: "MinuteOutOfBounds",
    category: "input",
    baseType: "InputValidationError",
    isExpected: true,
    title: "Minute out of bounds",
    description: "A minute required to lie within the calendar's trading minutes does not",
  },

  // ============================================================================
  // REPORTER ERRORS
  // ============================================================================
  REPORTER_CONFIGURATION_INVALID: {
    name: "ReporterConfigurationError",
    category: "configuration",
    baseType: "ConfigurationError",
    isExpected: true,
    title: "Invalid reporter configuration",
    description: "The error reporter configuration failed validation",
  },

  // ============================================================================
  // INTERNAL ERRORS - Defects at the raise site
  // ============================================================================
  INTERNAL_TEMPLATE_FORMAT: {
    name: "TemplateFormatError",
    category: "internal",
    baseType: "InternalError",
    isExpected: false,
    title: "Template format failure",
    description: "A message template referenced a field missing from the error context",
  },
  INTERNAL_BOUNDS_CONTRACT_VIOLATION: {
    name: "BoundsContractViolationError",
    category: "internal",
    baseType: "InternalError",
    isExpected: false,
    title: "Bounds contract violation",
    description: "An out-of-bounds error was raised for a value within bounds",
  },
} as const;

// ============================================================================
// TYPE EXPORTS
// ============================================================================

/**
 * Union type of all error codes
 */
export type CalendarErrorCode = keyof typeof CALENDAR_ERROR_CATALOG;

/**
 * Type representing a single error catalog entry
 */
export type CalendarErrorCatalogEntry = (typeof CALENDAR_ERROR_CATALOG)[CalendarErrorCode];

/**
 * Union type of all categories
 */
export type ErrorCategory = CalendarErrorCatalogEntry["category"];

/**
 * Extract all codes that belong to a specific BaseErrorType
 */
export type CodesForBase<B extends BaseErrorType> = {
  [K in CalendarErrorCode]: (typeof CALENDAR_ERROR_CATALOG)[K]["baseType"] extends B ? K : never;
}[CalendarErrorCode];

/**
 * Codes whose message is rendered from a catalog template
 */
export type TemplatedErrorCode = {
  [K in CalendarErrorCode]: (typeof CALENDAR_ERROR_CATALOG)[K] extends { readonly template: string }
    ? K
    : never;
}[CalendarErrorCode];

/**
 * The literal template of a templated code
 */
export type TemplateOf<C extends TemplatedErrorCode> = (typeof CALENDAR_ERROR_CATALOG)[C]["template"];
