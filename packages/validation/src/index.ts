/**
 * @tradecal/validation
 *
 * Parsing helpers for trading-calendar APIs. Each helper returns the parsed
 * value or raises the matching `@tradecal/errors` input-validation error.
 */

export {
  isWithinBounds,
  parseDate,
  parseSession,
  parseTimestamp,
  parseTradingMinute,
} from "./parse.js";

export type { SessionCalendar, TimestampInput, TradingMinuteCalendar } from "./types.js";
