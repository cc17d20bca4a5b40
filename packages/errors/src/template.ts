/**
 * Named-placeholder templates for error messages.
 *
 * A template is a string with `{field}` placeholders. `{{` and `}}` render as
 * literal braces. The placeholder set of a literal template is recovered at
 * the type level, so contexts are checked against it at compile time.
 */

import { formatTimestamp } from "./format.js";
import { TemplateFormatError } from "./internal.js";

/** A value that may be substituted into a template */
export type TemplateValue = string | number | bigint | boolean | Date | readonly (string | number)[];

/**
 * Placeholder names of a literal template type.
 *
 * @example
 * type P = Placeholders<"between '{start}' and '{end}'">; // "start" | "end"
 */
export type Placeholders<T extends string> = T extends `${string}{${infer Field}}${infer Rest}`
  ? Field | Placeholders<Rest>
  : never;

/** Context required to render template `T` */
export type ContextFor<T extends string> = {
  readonly [F in Placeholders<T>]: TemplateValue;
};

const TOKEN_PATTERN = /\{\{|\}\}|\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/**
 * Display a context value the way it appears in a rendered message.
 */
export function displayTemplateValue(value: TemplateValue): string {
  if (value instanceof Date) {
    return formatTimestamp(value);
  }
  if (Array.isArray(value)) {
    return value.map(String).join(", ");
  }
  return String(value);
}

/**
 * Substitute every placeholder in `template` from `context`.
 *
 * @throws TemplateFormatError if a placeholder has no key in `context`
 */
export function formatTemplate(
  template: string,
  context: Readonly<Record<string, TemplateValue>>,
): string {
  return template.replace(TOKEN_PATTERN, (token: string, field: string | undefined) => {
    if (field === undefined) {
      return token === "{{" ? "{" : "}";
    }
    if (!Object.hasOwn(context, field)) {
      throw new TemplateFormatError(template, field);
    }
    const value = context[field];
    if (value === undefined) {
      throw new TemplateFormatError(template, field);
    }
    return displayTemplateValue(value);
  });
}

/**
 * List the placeholder fields of a template, in order of first appearance.
 */
export function templateFields(template: string): string[] {
  const fields: string[] = [];
  for (const match of template.matchAll(TOKEN_PATTERN)) {
    const field = match[1];
    if (field !== undefined && !fields.includes(field)) {
      fields.push(field);
    }
  }
  return fields;
}
