import type { DateTime } from 'luxon';
import type {
  OutlineNode,
  RecurrenceSchedule,
  RecurrenceSpec,
  RecurrenceUnit,
  RecurrenceWindow,
} from './model.js';

/**
 * Recurrence scheduling.
 *
 * For an action completed at `lastDone` with `EVERY min-max unit`:
 * - earliest = lastDone + min units, latest = lastDone + max units;
 * - next     = first instant >= earliest inside the window (if any);
 * - overdue  = after latest for ranges, after one more interval for fixed specs.
 *
 * An action that was never completed has elapsed its interval already; the
 * window still decides whether it is actionable right now.
 */
const MINUTES_PER_DAY = 1440;

export function addUnits(at: DateTime, unit: RecurrenceUnit, count: number): DateTime {
  switch (unit) {
    case 'day':
      return at.plus({ days: count });
    case 'week':
      return at.plus({ weeks: count });
    case 'month':
      return at.plus({ months: count });
    case 'year':
      return at.plus({ years: count });
  }
}

function windowPosition(window: RecurrenceWindow, at: DateTime): number {
  const minutes = at.hour * 60 + at.minute;
  return window.kind === 'daily' ? minutes : (at.weekday - 1) * MINUTES_PER_DAY + minutes;
}

export function isInWindow(window: RecurrenceWindow, at: DateTime): boolean {
  const position = windowPosition(window, at);
  if (window.start < window.end) return position >= window.start && position < window.end;
  return position >= window.start || position < window.end;
}

/**
 * `from` itself when it is inside the window, otherwise the next opening.
 */
export function nextWindowOpening(window: RecurrenceWindow, from: DateTime): DateTime {
  if (isInWindow(window, from)) return from;

  const minuteOfDay = window.start % MINUTES_PER_DAY;
  const clock = { hour: Math.floor(minuteOfDay / 60), minute: minuteOfDay % 60, second: 0, millisecond: 0 };

  if (window.kind === 'daily') {
    const candidate = from.set(clock);
    return candidate < from ? candidate.plus({ days: 1 }) : candidate;
  }
  const candidate = from.set({ weekday: Math.floor(window.start / MINUTES_PER_DAY) + 1, ...clock });
  return candidate < from ? candidate.plus({ weeks: 1 }) : candidate;
}

export function scheduleRecurrence(
  spec: RecurrenceSpec,
  lastDone: DateTime | undefined,
  now: DateTime
): RecurrenceSchedule {
  const inWindow = spec.window ? isInWindow(spec.window, now) : true;

  if (!lastDone) {
    return { isDueNow: inWindow, status: 'due' };
  }

  const earliest = addUnits(lastDone, spec.unit, spec.min);
  const latest = addUnits(lastDone, spec.unit, spec.max);
  const next = spec.window ? nextWindowOpening(spec.window, earliest) : earliest;
  const overdueAt = spec.max > spec.min ? latest : addUnits(earliest, spec.unit, spec.min);

  const elapsed = now >= earliest;
  const status = !elapsed ? 'upcoming' : now > overdueAt ? 'overdue' : 'due';
  return { earliest, latest, next, overdueAt, isDueNow: elapsed && inWindow, status };
}

/**
 * Attach a schedule to every recurring node.
 */
export function scheduleOutline(nodes: OutlineNode[], now: DateTime): void {
  for (const node of nodes) {
    const spec = node.annotations.recurrence;
    if (!spec) continue;
    node.resolved.schedule = scheduleRecurrence(spec, node.annotations.lastDone?.at, now);
  }
}
