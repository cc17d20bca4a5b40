import {
  type BaseErrorType,
  CALENDAR_ERROR_CATALOG,
  type CalendarErrorCode,
  type ErrorCategory,
} from "./catalog.js";

/**
 * Base class for every error raised by the trading-calendar packages.
 *
 * Identity is structured: `_tag` discriminates the behavioral base type and
 * `code` the specific condition. Category and expectedness are looked up from
 * the catalog, so subclasses only declare `_tag` and `code`.
 */
export abstract class CalendarError extends Error {
  abstract readonly _tag: BaseErrorType;
  abstract readonly code: CalendarErrorCode;

  /** When the error was constructed */
  readonly timestamp: Date;

  constructor(message?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.timestamp = new Date();
  }

  get category(): ErrorCategory {
    return CALENDAR_ERROR_CATALOG[this.code].category;
  }

  get isExpected(): boolean {
    return CALENDAR_ERROR_CATALOG[this.code].isExpected;
  }

  override toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}
