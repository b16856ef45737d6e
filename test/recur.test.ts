import test from 'node:test';
import assert from 'node:assert/strict';
import { DateTime } from 'luxon';

import { formatStamp } from '../src/outline/dates.js';
import type { RecurrenceSpec } from '../src/outline/model.js';
import { parseOutline } from '../src/outline/parse.js';
import { addUnits, isInWindow, nextWindowOpening, scheduleRecurrence } from '../src/outline/recur.js';

const zone = 'UTC';

function at(day: number, hour: number, minute = 0): DateTime {
  return DateTime.fromObject({ year: 2013, month: 8, day, hour, minute }, { zone });
}

function stamp(value: DateTime | undefined): string | undefined {
  return value ? formatStamp(value) : undefined;
}

test('a ranged spec is due between lastDone + min and lastDone + max', () => {
  const { model } = parseOutline('= Home =\n@ Clean gutters EVERY 4-6 weeks (LASTDONE 2013-08-16 21:00)\n', {
    zone,
    now: at(24, 12),
  });
  const schedule = model.nodes[1]?.resolved.schedule;
  assert.ok(schedule);
  assert.equal(stamp(schedule.earliest), '2013-09-13 21:00');
  assert.equal(stamp(schedule.latest), '2013-09-27 21:00');
  assert.equal(stamp(schedule.overdueAt), '2013-09-27 21:00');
  assert.equal(schedule.status, 'upcoming');
  assert.equal(schedule.isDueNow, false);
});

test('a fixed spec turns overdue one interval after it came due', () => {
  const spec: RecurrenceSpec = { unit: 'day', min: 1, max: 1, source: 'EVERY day' };
  const due = scheduleRecurrence(spec, at(23, 8), at(24, 12));
  assert.equal(stamp(due.earliest), '2013-08-24 08:00');
  assert.equal(stamp(due.overdueAt), '2013-08-25 08:00');
  assert.equal(due.status, 'due');
  assert.equal(due.isDueNow, true);

  assert.equal(scheduleRecurrence(spec, at(20, 8), at(24, 12)).status, 'overdue');
});

test('an action never done is due as soon as its window is open', () => {
  const spec: RecurrenceSpec = {
    unit: 'day',
    min: 1,
    max: 1,
    window: { kind: 'daily', start: 540, end: 1440 },
    source: 'EVERY day [09:00]',
  };
  assert.deepEqual(scheduleRecurrence(spec, undefined, at(24, 12)), { isDueNow: true, status: 'due' });
  assert.deepEqual(scheduleRecurrence(spec, undefined, at(24, 7)), { isDueNow: false, status: 'due' });
});

test('the next occurrence waits for the window to open', () => {
  const spec: RecurrenceSpec = {
    unit: 'day',
    min: 1,
    max: 1,
    window: { kind: 'daily', start: 540, end: 1440 },
    source: 'EVERY day [09:00]',
  };
  const schedule = scheduleRecurrence(spec, at(23, 6), at(24, 7));
  assert.equal(stamp(schedule.next), '2013-08-24 09:00');
  assert.equal(schedule.status, 'due');
  assert.equal(schedule.isDueNow, false);
});

test('weekly windows may span midnight and wrap around the week', () => {
  const thuToFri = { kind: 'weekly', start: 5340, end: 6180 } as const;
  assert.equal(stamp(nextWindowOpening(thuToFri, at(19, 10))), '2013-08-22 17:00');
  assert.equal(stamp(nextWindowOpening(thuToFri, at(24, 10))), '2013-08-29 17:00');
  assert.equal(isInWindow(thuToFri, at(23, 6)), true);
  assert.equal(isInWindow(thuToFri, at(23, 8)), false);

  const sundayNight = { kind: 'weekly', start: 9960, end: 120 } as const;
  assert.equal(isInWindow(sundayNight, at(19, 1)), true);
  assert.equal(isInWindow(sundayNight, at(25, 23)), true);
  assert.equal(isInWindow(sundayNight, at(25, 21)), false);
});

test('calendar units keep the day of month where they can', () => {
  const jan31 = DateTime.fromObject({ year: 2013, month: 1, day: 31, hour: 9 }, { zone });
  assert.equal(formatStamp(addUnits(jan31, 'month', 1)), '2013-02-28 09:00');
  assert.equal(formatStamp(addUnits(jan31, 'year', 1)), '2014-01-31 09:00');
  assert.equal(formatStamp(addUnits(jan31, 'week', 2)), '2013-02-14 09:00');
});
