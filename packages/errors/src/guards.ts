/**
 * Type guards for the base error types + code-level discrimination.
 */

import { CalendarError } from "./base.js";
import { CalendarBoundsError } from "./bounds.js";
import type { CalendarErrorCode } from "./catalog.js";
import { TemplatedCalendarError } from "./templated.js";

/** Check if an error was raised by the calendar packages */
export function isCalendarError(error: unknown): error is CalendarError {
  return error instanceof CalendarError;
}

/** Check if an error reports a configuration or registry problem */
export function isConfigurationError(
  error: unknown,
): error is CalendarError & { readonly _tag: "ConfigurationError" } {
  return error instanceof CalendarError && error._tag === "ConfigurationError";
}

/** Check if an error reports caller input that failed validation */
export function isInputValidationError(
  error: unknown,
): error is CalendarError & { readonly _tag: "InputValidationError" } {
  return error instanceof CalendarError && error._tag === "InputValidationError";
}

/** Check if an error is a defect at its raise site */
export function isInternalCalendarError(
  error: unknown,
): error is CalendarError & { readonly _tag: "InternalError" } {
  return error instanceof CalendarError && error._tag === "InternalError";
}

/** Check if an error renders its message from a catalog template */
export function isTemplatedCalendarError(error: unknown): error is TemplatedCalendarError {
  return error instanceof TemplatedCalendarError;
}

/** Check if an error reports a value checked against calendar bounds */
export function isCalendarBoundsError(error: unknown): error is CalendarBoundsError {
  return error instanceof CalendarBoundsError;
}

/**
 * Check if a CalendarError has a specific error code.
 * Narrows the type to include the specific code literal.
 */
export function hasCode<C extends CalendarErrorCode>(
  error: CalendarError,
  code: C,
): error is CalendarError & { readonly code: C } {
  return error.code === code;
}

/**
 * Check if an error represents an expected condition.
 * Returns false for values that are not CalendarErrors.
 */
export function isExpectedError(error: unknown): boolean {
  return error instanceof CalendarError && error.isExpected;
}
