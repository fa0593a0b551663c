/**
 * Date helpers for watermark bookkeeping.
 * Date keys are `YYYY-MM-DD` strings in UTC; they compare correctly as strings.
 */

export const HOUR_MS = 60 * 60 * 1000;
export const DAY_MS = 24 * HOUR_MS;

const DATE_KEY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

function parseDateKeyToUtcMs(dateKey: string): number {
  const match = String(dateKey || '').trim().match(DATE_KEY_PATTERN);
  if (!match) return NaN;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const ms = Date.UTC(year, month - 1, day, 0, 0, 0, 0);
  // Reject rollovers such as 2024-02-31.
  return new Date(ms).getUTCDate() === day ? ms : NaN;
}

function isDateKey(value: unknown): value is string {
  return typeof value === 'string' && Number.isFinite(parseDateKeyToUtcMs(value));
}

function toDateKey(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function minDateKey(a: string | null, b: string | null): string | null {
  if (!a) return b || null;
  if (!b) return a;
  return a <= b ? a : b;
}

function maxDateKey(a: string | null, b: string | null): string | null {
  if (!a) return b || null;
  if (!b) return a;
  return a >= b ? a : b;
}

function elapsedMs(since: Date, now: Date): number {
  return now.getTime() - since.getTime();
}

export { parseDateKeyToUtcMs, isDateKey, toDateKey, minDateKey, maxDateKey, elapsedMs };
