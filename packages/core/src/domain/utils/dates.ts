/**
 * Date helpers. Stored timestamps are ISO-8601 strings in UTC.
 */

export const MS_PER_HOUR = 60 * 60 * 1000;
export const MS_PER_DAY = 24 * MS_PER_HOUR;

export function nowIso(): string {
  return new Date().toISOString();
}

/**
 * YYYY-MM-DD in UTC
 */
export function todayIso(now: Date = new Date()): string {
  return now.toISOString().slice(0, 10);
}

export function daysAgo(days: number, now: Date = new Date()): Date {
  return new Date(now.getTime() - days * MS_PER_DAY);
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * MS_PER_DAY);
}

/**
 * True when the ISO timestamp is at or after `since`
 */
export function isOnOrAfter(timestamp: string | undefined, since: Date): boolean {
  return timestamp !== undefined && Date.parse(timestamp) >= since.getTime();
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * dd.mm.yyyy
 */
export function formatDate(date: Date): string {
  return `${pad(date.getDate())}.${pad(date.getMonth() + 1)}.${String(date.getFullYear())}`;
}

/**
 * HH:MM
 */
export function formatTime(date: Date): string {
  return `${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Newest first by createdAt, then id for a stable order
 */
export function byNewest<T extends { createdAt: string; id: string }>(a: T, b: T): number {
  if (a.createdAt !== b.createdAt) {
    return a.createdAt < b.createdAt ? 1 : -1;
  }
  return a.id < b.id ? 1 : a.id > b.id ? -1 : 0;
}
