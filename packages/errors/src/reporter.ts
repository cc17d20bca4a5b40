/**
 * Opt-in reporting of calendar errors to a logger.
 *
 * The packages never log on their own. Callers that want a consistent log
 * line per error create a reporter and hand it what they catch.
 */

import { z } from "zod";
import { CalendarError } from "./base.js";
import type { ErrorCategory } from "./catalog.js";

// ============================================================================
// CONFIGURATION
// ============================================================================

const LogLevelSchema = z.enum(["warn", "error"]);

export const ErrorReporterConfigSchema = z
  .object({
    /** Log line prefix, rendered as `[tag]` (default: "tradecal") */
    tag: z.string().min(1, "tag must not be empty").default("tradecal"),
    /** Log level per error category */
    levels: z
      .object({
        configuration: LogLevelSchema.default("error"),
        input: LogLevelSchema.default("warn"),
        internal: LogLevelSchema.default("error"),
      })
      .strict()
      .default({}),
    /** Include `[CODE]` after the tag (default: true) */
    includeCode: z.boolean().default(true),
  })
  .strict();

export type ErrorReporterConfigInput = z.input<typeof ErrorReporterConfigSchema>;
export type ErrorReporterConfig = z.infer<typeof ErrorReporterConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Thrown when the error reporter configuration is invalid.
 */
export class ReporterConfigurationError extends CalendarError {
  readonly _tag = "ConfigurationError" as const;
  readonly code = "REPORTER_CONFIGURATION_INVALID" as const;
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid error reporter configuration: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

/**
 * Validate reporter configuration and fill in defaults.
 *
 * @throws ReporterConfigurationError listing each issue as `path: message`
 */
export function resolveErrorReporterConfig(input?: unknown): ErrorReporterConfig {
  const result = ErrorReporterConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    throw new ReporterConfigurationError(
      result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
    );
  }
  return result.data;
}

// ============================================================================
// REPORTER
// ============================================================================

/** The subset of `console` the reporter writes to */
export interface ErrorLogger {
  warn(message: string): void;
  error(message: string): void;
}

export interface ErrorReporter {
  readonly config: ErrorReporterConfig;
  /** Log one line for `error` at the level configured for its category */
  report(error: unknown): void;
}

/**
 * Format the log line for an error without writing it.
 */
export function formatReportLine(error: unknown, config: ErrorReporterConfig): string {
  if (error instanceof CalendarError) {
    const code = config.includeCode ? ` [${error.code}]` : "";
    return `[${config.tag}]${code} ${error.message}`;
  }
  const message = error instanceof Error ? error.message : String(error);
  return `[${config.tag}] ${message}`;
}

function levelFor(error: unknown, config: ErrorReporterConfig): LogLevel {
  if (error instanceof CalendarError) {
    const category: ErrorCategory = error.category;
    return config.levels[category];
  }
  return "error";
}

export function createErrorReporter(
  config?: ErrorReporterConfigInput,
  logger: ErrorLogger = console,
): ErrorReporter {
  const resolved = resolveErrorReporterConfig(config);
  return {
    config: resolved,
    report(error: unknown): void {
      const line = formatReportLine(error, resolved);
      if (levelFor(error, resolved) === "warn") {
        logger.warn(line);
      } else {
        logger.error(line);
      }
    },
  };
}
