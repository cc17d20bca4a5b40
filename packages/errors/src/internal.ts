/**
 * Internal errors, raised for defects at the raise site
 *
 * Concrete:
 *   - TemplateFormatError (INTERNAL_TEMPLATE_FORMAT)
 *   - BoundsContractViolationError (INTERNAL_BOUNDS_CONTRACT_VIOLATION)
 */

import { CalendarError } from "./base.js";

/**
 * Thrown when a message template references a field the error context lacks.
 */
export class TemplateFormatError extends CalendarError {
  readonly _tag = "InternalError" as const;
  readonly code = "INTERNAL_TEMPLATE_FORMAT" as const;
  readonly template: string;
  readonly missingField: string;

  constructor(template: string, missingField: string) {
    super(`Template is missing context field '${missingField}': ${template}`);
    this.template = template;
    this.missingField = missingField;
  }
}

/**
 * Thrown when a bounds error is constructed with input it cannot describe:
 * an out-of-bounds error for a value within bounds, or an invalid timestamp
 * as the value or a bound.
 */
export class BoundsContractViolationError extends CalendarError {
  readonly _tag = "InternalError" as const;
  readonly code = "INTERNAL_BOUNDS_CONTRACT_VIOLATION" as const;
  readonly errorName: string;
  readonly paramName: string;

  constructor(errorName: string, paramName: string, detail: string) {
    super(`${errorName} raised for parameter \`${paramName}\` although ${detail}`);
    this.errorName = errorName;
    this.paramName = paramName;
  }
}
