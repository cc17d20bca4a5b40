/**
 * Templated calendar errors
 *
 * Generic: TemplatedCalendarError<C>
 * Configuration:
 *   - InvalidCalendarName (CALENDAR_INVALID_NAME)
 *   - CalendarNameCollision (CALENDAR_NAME_COLLISION)
 *   - CyclicCalendarAlias (CALENDAR_CYCLIC_ALIAS)
 *   - ScheduleFunctionWithoutCalendar (SCHEDULE_FUNCTION_WITHOUT_CALENDAR)
 *   - NoSessionsError (CALENDAR_NO_SESSIONS)
 *   - ScheduleFunctionInvalidCalendar (SCHEDULE_FUNCTION_INVALID_CALENDAR)
 * Input validation:
 *   - TimestampParseError (TIMESTAMP_UNPARSEABLE)
 *   - NotDateError (DATE_HAS_TIME_COMPONENT)
 */

import { CalendarError } from "./base.js";
import {
  CALENDAR_ERROR_CATALOG,
  type TemplatedErrorCode,
  type TemplateOf,
} from "./catalog.js";
import { type ContextFor, formatTemplate } from "./template.js";

/** Context fields required by the template of code `C` */
export type TemplateContext<C extends TemplatedErrorCode> = ContextFor<TemplateOf<C>>;

type TemplatedTag<C extends TemplatedErrorCode> = (typeof CALENDAR_ERROR_CATALOG)[C]["baseType"];

// ---------------------------------------------------------------------------
// Generic templated error
// ---------------------------------------------------------------------------

/**
 * An error whose message is rendered from its catalog template and context.
 *
 * Rendering happens on first access of `message` (or `render()`) and the
 * result is kept for the error's lifetime. Mutating `context` afterwards does
 * not change the message. A context missing a template field makes rendering
 * throw `TemplateFormatError`.
 */
export class TemplatedCalendarError<
  C extends TemplatedErrorCode = TemplatedErrorCode,
> extends CalendarError {
  readonly _tag: TemplatedTag<C>;
  readonly code: C;
  readonly context: TemplateContext<C>;
  private rendered: string | undefined;

  constructor(code: C, context: TemplateContext<C>, options?: { cause?: unknown }) {
    super(undefined, options);
    const entry = CALENDAR_ERROR_CATALOG[code];
    this.name = entry.name;
    this._tag = entry.baseType;
    this.code = code;
    this.context = context;
    this.rendered = undefined;
    Object.defineProperty(this, "message", {
      get: () => this.render(),
      enumerable: false,
      configurable: true,
    });
  }

  /** The template this error renders */
  get template(): TemplateOf<C> {
    return CALENDAR_ERROR_CATALOG[this.code].template;
  }

  render(): string {
    if (this.rendered === undefined) {
      this.rendered = formatTemplate(this.template, this.context);
    }
    return this.rendered;
  }
}

// ---------------------------------------------------------------------------
// Configuration errors
// ---------------------------------------------------------------------------

/** Raised when a calendar with an invalid name is requested. */
export class InvalidCalendarName extends TemplatedCalendarError<"CALENDAR_INVALID_NAME"> {
  constructor(context: TemplateContext<"CALENDAR_INVALID_NAME">) {
    super("CALENDAR_INVALID_NAME", context);
  }
}

/** Raised when the calendar registry already has a calendar with a given name. */
export class CalendarNameCollision extends TemplatedCalendarError<"CALENDAR_NAME_COLLISION"> {
  constructor(context: TemplateContext<"CALENDAR_NAME_COLLISION">) {
    super("CALENDAR_NAME_COLLISION", context);
  }
}

/** Raised when calendar aliases form a cycle. */
export class CyclicCalendarAlias extends TemplatedCalendarError<"CALENDAR_CYCLIC_ALIAS"> {
  constructor(context: TemplateContext<"CALENDAR_CYCLIC_ALIAS">) {
    super("CALENDAR_CYCLIC_ALIAS", context);
  }
}

/**
 * Raised when schedule_function is called but there is no calendar to build
 * an event rule from.
 */
export class ScheduleFunctionWithoutCalendar extends TemplatedCalendarError<"SCHEDULE_FUNCTION_WITHOUT_CALENDAR"> {
  constructor(context: TemplateContext<"SCHEDULE_FUNCTION_WITHOUT_CALENDAR">) {
    super("SCHEDULE_FUNCTION_WITHOUT_CALENDAR", context);
  }
}

/**
 * Raised if a requested calendar would have no sessions, i.e. `start` and
 * `end` bound a range (inclusive) that contains no session.
 */
export class NoSessionsError extends TemplatedCalendarError<"CALENDAR_NO_SESSIONS"> {
  constructor(context: TemplateContext<"CALENDAR_NO_SESSIONS">) {
    super("CALENDAR_NO_SESSIONS", context);
  }
}

/** Raised when schedule_function is called with an invalid calendar argument. */
export class ScheduleFunctionInvalidCalendar extends TemplatedCalendarError<"SCHEDULE_FUNCTION_INVALID_CALENDAR"> {
  constructor(context: TemplateContext<"SCHEDULE_FUNCTION_INVALID_CALENDAR">) {
    super("SCHEDULE_FUNCTION_INVALID_CALENDAR", context);
  }
}

// ---------------------------------------------------------------------------
// Input validation errors
// ---------------------------------------------------------------------------

/** Raised when input passed as a timestamp cannot be parsed. */
export class TimestampParseError extends TemplatedCalendarError<"TIMESTAMP_UNPARSEABLE"> {
  constructor(context: TemplateContext<"TIMESTAMP_UNPARSEABLE">, cause?: unknown) {
    super("TIMESTAMP_UNPARSEABLE", context, cause === undefined ? undefined : { cause });
  }
}

/** Raised when input passed as a date parses to a timestamp with a time component. */
export class NotDateError extends TemplatedCalendarError<"DATE_HAS_TIME_COMPONENT"> {
  constructor(context: TemplateContext<"DATE_HAS_TIME_COMPONENT">) {
    super("DATE_HAS_TIME_COMPONENT", context);
  }
}
