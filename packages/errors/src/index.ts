/**
 * @tradecal/errors
 *
 * Error taxonomy for trading-calendar components.
 *
 * The error system is built on 3 behavioral base types:
 * ConfigurationError, InputValidationError, InternalError
 *
 * Each error carries a `.code` from the catalog that discriminates the
 * specific condition. Use `error.code === "XXX"` for fine-grained matching,
 * `instanceof` for class matching, or the guards for category matching.
 */

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { CalendarError } from "./base.js";

export {
  type BaseErrorType,
  CALENDAR_ERROR_CATALOG,
  type CalendarErrorCatalogEntry,
  type CalendarErrorCode,
  type CodesForBase,
  type ErrorCategory,
  type TemplatedErrorCode,
  type TemplateOf,
} from "./catalog.js";

export {
  getAllErrorCodes,
  getCatalogEntry,
  getErrorCodesByCategory,
  getErrorMessage,
  isValidErrorCode,
  validateCatalog,
} from "./utils.js";

export { formatMinute, formatSession, formatTimestamp, isUtcMidnight } from "./format.js";

// ============================================================================
// TEMPLATED ERRORS
// ============================================================================

export {
  type ContextFor,
  displayTemplateValue,
  formatTemplate,
  type Placeholders,
  templateFields,
  type TemplateValue,
} from "./template.js";

export {
  CalendarNameCollision,
  CyclicCalendarAlias,
  InvalidCalendarName,
  NoSessionsError,
  NotDateError,
  ScheduleFunctionInvalidCalendar,
  ScheduleFunctionWithoutCalendar,
  TemplatedCalendarError,
  type TemplateContext,
  TimestampParseError,
} from "./templated.js";

// ============================================================================
// BOUNDS ERRORS
// ============================================================================

export {
  type BoundLabel,
  type BoundsMessageParams,
  type BoundsOutcome,
  CalendarBoundsError,
  compareToBounds,
  composeBoundsMessage,
  DateOutOfBounds,
  type ExchangeCalendarBounds,
  MinuteOutOfBounds,
  NotSessionError,
  NotTradingMinuteError,
  type SessionBounds,
  type SubjectStyle,
  type TradingMinuteBounds,
} from "./bounds.js";

// ============================================================================
// INTERNAL ERRORS
// ============================================================================

export { BoundsContractViolationError, TemplateFormatError } from "./internal.js";

// ============================================================================
// TYPE GUARDS
// ============================================================================

export {
  hasCode,
  isCalendarBoundsError,
  isCalendarError,
  isConfigurationError,
  isExpectedError,
  isInputValidationError,
  isInternalCalendarError,
  isTemplatedCalendarError,
} from "./guards.js";

// ============================================================================
// RENDERING & REPORTING
// ============================================================================

export {
  type AnyCalendarError,
  type CalendarErrorDescription,
  describeCalendarError,
  renderCalendarError,
} from "./render.js";

export {
  createErrorReporter,
  type ErrorLogger,
  type ErrorReporter,
  type ErrorReporterConfig,
  type ErrorReporterConfigInput,
  ErrorReporterConfigSchema,
  formatReportLine,
  type LogLevel,
  ReporterConfigurationError,
  resolveErrorReporterConfig,
} from "./reporter.js";
