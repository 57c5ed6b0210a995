/**
 * Timestamp helpers. All formatting is done in UTC so report names and
 * persisted state do not depend on the host timezone.
 */

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0');
}

/** `20261018_093005`: used in run directory and report file names. */
export function formatRunStamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

/** `2026-10-18 09:30:05`: the form Silent Push accepts in SPQL date filters. */
export function formatSqlTimestamp(date: Date): string {
  return date.toISOString().substring(0, 19).replace('T', ' ');
}

/** `2026-10-18 09:30:05 UTC`: shown in report headers. */
export function formatDisplayTimestamp(date: Date): string {
  return `${formatSqlTimestamp(date)} UTC`;
}

/** Parse an ISO-8601 timestamp; returns null for anything unparseable. */
export function parseTimestamp(value: string | null | undefined): Date | null {
  if (!value) return null;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? null : new Date(ms);
}

export const DAY_MS = 24 * 60 * 60 * 1000;
