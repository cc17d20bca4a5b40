import {
  CALENDAR_ERROR_CATALOG,
  type CalendarErrorCatalogEntry,
  type CalendarErrorCode,
  type ErrorCategory,
} from "./catalog.js";
import { templateFields } from "./template.js";

/**
 * Look up error catalog entry by code
 */
export function getCatalogEntry(code: CalendarErrorCode): CalendarErrorCatalogEntry {
  return CALENDAR_ERROR_CATALOG[code];
}

/**
 * Check if a string is a valid error code
 */
export function isValidErrorCode(code: string): code is CalendarErrorCode {
  return Object.hasOwn(CALENDAR_ERROR_CATALOG, code);
}

/**
 * Get all error codes in the catalog
 */
export function getAllErrorCodes(): CalendarErrorCode[] {
  return Object.keys(CALENDAR_ERROR_CATALOG).filter(isValidErrorCode);
}

/**
 * Get all error codes for a specific category
 */
export function getErrorCodesByCategory(category: ErrorCategory): CalendarErrorCode[] {
  return getAllErrorCodes().filter((code) => CALENDAR_ERROR_CATALOG[code].category === category);
}

/**
 * Extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === "string") {
    return error;
  }

  return "An unknown error occurred";
}

/**
 * Validate catalog consistency (for tests)
 * Checks:
 * - All codes are UPPER_SNAKE_CASE
 * - Class names are unique
 * - Templates have at least one placeholder and balanced braces
 * - Expectedness matches category (only internal errors are unexpected)
 */
export function validateCatalog(): { valid: boolean; errors: string[] } {
  const errors: string[] = [];
  const names = new Set<string>();

  for (const code of getAllErrorCodes()) {
    const entry: CalendarErrorCatalogEntry = CALENDAR_ERROR_CATALOG[code];

    if (!/^[A-Z][A-Z0-9_]*$/.test(code)) {
      errors.push(`Code '${code}' is not in UPPER_SNAKE_CASE format`);
    }

    if (names.has(entry.name)) {
      errors.push(`Code '${code}' reuses class name '${entry.name}'`);
    }
    names.add(entry.name);

    if (entry.isExpected === (entry.category === "internal")) {
      errors.push(`Code '${code}' has isExpected=${entry.isExpected} for category '${entry.category}'`);
    }

    if ("template" in entry) {
      if (templateFields(entry.template).length === 0) {
        errors.push(`Code '${code}' has a template without placeholders`);
      }
      const stripped = entry.template.replace(/\{[A-Za-z_][A-Za-z0-9_]*\}/g, "");
      if (stripped.includes("{") || stripped.includes("}")) {
        errors.push(`Code '${code}' has unbalanced braces in its template`);
      }
    }
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}
