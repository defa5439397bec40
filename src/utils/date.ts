/**
 * Timestamps written by the auth core are ISO-8601 UTC strings, so "still valid"
 * is a plain string comparison in SQL (`expires_at > now`).
 */

const HOUR_MS = 60 * 60 * 1000;

export const nowIso = (): string => new Date().toISOString();

export const msFromNow = (ms: number): string =>
  new Date(Date.now() + ms).toISOString();

export const hoursFromNow = (hours: number): string => msFromNow(hours * HOUR_MS);

const pad = (value: number) => String(value).padStart(2, "0");

/**
 * Local-time stamp used in backup file names, e.g. "20261019_140512".
 */
export function formatFileTimestamp(date: Date = new Date()): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}
