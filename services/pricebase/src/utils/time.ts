export const MAX_INTERVAL_MINUTES = 43_200; // 30 days

export function nowSec(): number {
  return Math.floor(Date.now() / 1000);
}

export function intervalSec(intervalMinutes: number): number {
  return intervalMinutes * 60;
}

export function isValidInterval(intervalMinutes: number): boolean {
  return Number.isInteger(intervalMinutes) && intervalMinutes > 0 && intervalMinutes <= MAX_INTERVAL_MINUTES;
}

/** Inclusive start of the bucket containing `ts`. */
export function bucketStart(ts: number, intervalMinutes: number): number {
  const step = intervalSec(intervalMinutes);
  return Math.floor(ts / step) * step;
}

export function isAligned(ts: number, intervalMinutes: number): boolean {
  return Number.isInteger(ts) && ts % intervalSec(intervalMinutes) === 0;
}

const NAIVE_DATE_TIME = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;

/**
 * Accepts epoch seconds or an ISO-8601 string; returns integer epoch seconds or NaN.
 * A date-time without an offset is read as UTC, not host-local time.
 */
export function toEpochSec(value: number | string): number {
  if (typeof value === 'number') return value;
  const trimmed = value.trim();
  if (/^-?\d+(\.\d+)?$/.test(trimmed)) return Number(trimmed);
  const iso = NAIVE_DATE_TIME.test(trimmed) ? `${trimmed.replace(' ', 'T')}Z` : trimmed;
  const ms = Date.parse(iso);
  return Number.isNaN(ms) ? Number.NaN : Math.floor(ms / 1000);
}
