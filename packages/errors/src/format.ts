/**
 * Display formatting for timestamps embedded in error messages.
 *
 * All values are shown in UTC.
 */

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

function formatYear(year: number): string {
  const digits = String(Math.abs(year)).padStart(4, "0");
  return year < 0 ? `-${digits}` : digits;
}

/** Format as a session label: `YYYY-MM-DD` */
export function formatSession(value: Date): string {
  return `${formatYear(value.getUTCFullYear())}-${pad(value.getUTCMonth() + 1)}-${pad(value.getUTCDate())}`;
}

/** Format as a minute: `YYYY-MM-DD HH:MM:SS+00:00` */
export function formatMinute(value: Date): string {
  const time = `${pad(value.getUTCHours())}:${pad(value.getUTCMinutes())}:${pad(value.getUTCSeconds())}`;
  return `${formatSession(value)} ${time}+00:00`;
}

/** True when the timestamp falls exactly on UTC midnight */
export function isUtcMidnight(value: Date): boolean {
  return value.getTime() % 86_400_000 === 0;
}

/**
 * Format a timestamp of unknown resolution: midnight values as dates,
 * anything else as a minute.
 */
export function formatTimestamp(value: Date): string {
  if (Number.isNaN(value.getTime())) {
    return "Invalid Date";
  }
  return isUtcMidnight(value) ? formatSession(value) : formatMinute(value);
}
