import { DateTime } from 'luxon';
import { STAMP_FORMAT } from './constants.js';

/**
 * Date helpers shared by the extractor, scheduler and views.
 *
 * Every instant is a luxon `DateTime` in the zone the parse was asked to use,
 * so calendar arithmetic (`plus({ months: 1 })`) keeps wall-clock times.
 */

/**
 * Parse `YYYY-MM-DD` plus an optional `HH:MM` in `zone`.
 *
 * Returns `undefined` for impossible dates such as `2013-02-30` or `25:00`.
 */
export function parseStamp(
  date: string,
  time: string | undefined,
  zone: string
): DateTime | undefined {
  const clock = (time ?? '00:00').padStart(5, '0');
  const parsed = DateTime.fromFormat(`${date} ${clock}`, STAMP_FORMAT, { zone });
  return parsed.isValid ? parsed : undefined;
}

export function formatStamp(value: DateTime): string {
  return value.toFormat(STAMP_FORMAT);
}

/**
 * Parse a user-supplied "current time" (`YYYY-MM-DD HH:MM`, or any ISO 8601).
 */
export function parseNow(value: string, zone: string): DateTime {
  const stamp = DateTime.fromFormat(value, STAMP_FORMAT, { zone });
  if (stamp.isValid) return stamp;
  const iso = DateTime.fromISO(value, { zone });
  if (iso.isValid) return iso;
  throw new Error(`Invalid timestamp: ${JSON.stringify(value)} (expected YYYY-MM-DD HH:MM)`);
}

export function earliestOf(a: DateTime | undefined, b: DateTime | undefined): DateTime | undefined {
  if (!a) return b;
  if (!b) return a;
  return a <= b ? a : b;
}

export function latestOf(a: DateTime | undefined, b: DateTime | undefined): DateTime | undefined {
  if (!a) return b;
  if (!b) return a;
  return a >= b ? a : b;
}

function pluralize(count: number, unit: string): string {
  return `${count} ${count === 1 ? unit : `${unit}s`}`;
}

/**
 * Human-readable length of a span, e.g. `3 days` or `just now`.
 *
 * Counts are truncated, and months are 30 days.
 */
export function describeSpan(seconds: number): string {
  const secs = Math.floor(Math.abs(seconds));
  const dayCount = Math.floor(secs / 86400);
  const rest = secs - dayCount * 86400;

  if (dayCount === 0) {
    if (rest < 10) return 'just now';
    if (rest < 60) return pluralize(rest, 'second');
    if (rest < 3600) return pluralize(Math.floor(rest / 60), 'minute');
    return pluralize(Math.floor(rest / 3600), 'hour');
  }
  if (dayCount < 7) return pluralize(dayCount, 'day');
  if (dayCount < 31) return pluralize(Math.floor(dayCount / 7), 'week');
  if (dayCount < 365) return pluralize(Math.floor(dayCount / 30), 'month');
  return pluralize(Math.floor(dayCount / 365), 'year');
}
