/**
 * Timestamp utilities
 *
 * Local-time stamps for log lines, run summaries and dated log directories.
 */

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/**
 * ISO 8601 timestamp carrying the local timezone offset
 * (e.g. 2025-10-30T12:34:56.789+09:00).
 *
 * The offset follows the process timezone (TZ environment variable).
 */
export function getTimestampWithTimezone(date: Date = new Date()): string {
  const offset = -date.getTimezoneOffset();
  const offsetSign = offset >= 0 ? "+" : "-";
  const offsetHours = pad(Math.floor(Math.abs(offset) / 60));
  const offsetMinutes = pad(Math.abs(offset) % 60);

  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}` +
    `.${pad(date.getMilliseconds(), 3)}${offsetSign}${offsetHours}:${offsetMinutes}`
  );
}

/**
 * YYYY-MM-DD in local time
 */
export function getDateStringWithDash(date: Date = new Date()): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}
