import test from 'node:test';
import assert from 'node:assert/strict';

import {
  extractAnnotations,
  parseRecurrenceSpec,
  parseRecurrenceWindow,
  scanAnnotations,
  stripAnnotations,
} from '../src/outline/annotate.js';
import { formatStamp } from '../src/outline/dates.js';

function extract(text: string) {
  return extractAnnotations([{ text, line: 0 }], 'UTC');
}

test('scanAnnotations returns tokens in text order', () => {
  const text = 'Call Bob @@phone @p:3 <2013-08-25 #call-bob';
  const tokens = scanAnnotations(text);
  assert.deepEqual(
    tokens.map((token) => token.type),
    ['context', 'priority', 'due', 'tag']
  );
  assert.equal(stripAnnotations(text, tokens), 'Call Bob');
});

test('repeated dates keep the earliest due and the latest visible date', () => {
  const { annotations, display } = extract('Pay rent <2013-08-25 <2013-08-23 >2013-08-20 >2013-08-22');
  assert.equal(display[0], 'Pay rent');
  assert.ok(annotations.due && annotations.visible);
  assert.equal(formatStamp(annotations.due.at), '2013-08-23 23:59');
  assert.equal(formatStamp(annotations.visible), '2013-08-22 00:01');
});

test('due dates carry an optional time and lead days', () => {
  const { annotations } = extract('Post letter <2013-08-26 14:30(3)');
  assert.ok(annotations.due);
  assert.equal(formatStamp(annotations.due.at), '2013-08-26 14:30');
  assert.equal(annotations.due.leadDays, 3);
});

test('impossible dates stay in the text and produce a warning', () => {
  const { annotations, display, diagnostics } = extract('Fix <2013-02-30');
  assert.equal(annotations.due, undefined);
  assert.equal(display[0], 'Fix <2013-02-30');
  assert.deepEqual(diagnostics, [
    { severity: 'warning', code: 'MALFORMED_DATE', message: 'Invalid date "<2013-02-30"', line: 0 },
  ]);
});

test('unrecognized recurrence specs are reported', () => {
  const { annotations, display, diagnostics } = extract('Water plants EVERY fortnight');
  assert.equal(annotations.recurrence, undefined);
  assert.equal(display[0], 'Water plants EVERY fortnight');
  assert.equal(diagnostics[0]?.code, 'MALFORMED_RECURRENCE_SPEC');
});

test('the waiting marker takes the rest of the line as its description', () => {
  const { annotations, display } = extract('Contract @@waiting signed copy from Ann');
  assert.deepEqual(annotations.waiting, { description: 'signed copy from Ann' });
  assert.deepEqual(annotations.contexts, []);
  assert.equal(display[0], 'Contract signed copy from Ann');
});

test('completion stamps accept single-digit hours', () => {
  const { annotations } = extract('Send form (DONE 2013-08-20 9:30)');
  assert.equal(annotations.completed?.kind, 'DONE');
  assert.ok(annotations.completed);
  assert.equal(formatStamp(annotations.completed.at), '2013-08-20 09:30');
});

test('LASTDONE keeps the latest stamp and the line it sits on', () => {
  const result = extractAnnotations(
    [
      { text: 'Clean gutters EVERY 4-6 weeks (LASTDONE 2013-08-16 21:00)', line: 4 },
      { text: '(LASTDONE 2013-07-01 08:00)', line: 5 },
    ],
    'UTC'
  );
  assert.ok(result.annotations.lastDone);
  assert.equal(formatStamp(result.annotations.lastDone.at), '2013-08-16 21:00');
  assert.equal(result.annotations.lastDone.line, 4);
  assert.equal(result.annotations.recurrence?.source, 'EVERY 4-6 weeks');
});

test('contexts, tags and references are de-duplicated', () => {
  const { annotations } = extract('Ship @@desk @@desk #ship #ship @after:build @after:build');
  assert.deepEqual(annotations.contexts, ['desk']);
  assert.deepEqual(annotations.tags, ['ship']);
  assert.deepEqual(annotations.after, ['build']);
});

test('parseRecurrenceSpec reads ranges, fixed counts and bare units', () => {
  assert.deepEqual(parseRecurrenceSpec(' 4-6 weeks'), { spec: { unit: 'week', min: 4, max: 6 }, length: 10 });
  assert.deepEqual(parseRecurrenceSpec(' 3 days'), { spec: { unit: 'day', min: 3, max: 3 }, length: 7 });
  assert.deepEqual(parseRecurrenceSpec(' year'), { spec: { unit: 'year', min: 1, max: 1 }, length: 5 });
  assert.equal(parseRecurrenceSpec(' 6-4 weeks'), undefined);
  assert.equal(parseRecurrenceSpec(' 0 days'), undefined);
});

test('parseRecurrenceWindow builds daily and weekly windows', () => {
  assert.deepEqual(parseRecurrenceWindow('09:00'), { kind: 'daily', start: 540, end: 1440 });
  assert.deepEqual(parseRecurrenceWindow('22:00 - 06:00'), { kind: 'daily', start: 1320, end: 360 });
  assert.deepEqual(parseRecurrenceWindow('Thu 17:00 - Fri 07:00'), { kind: 'weekly', start: 5340, end: 6180 });
  assert.deepEqual(parseRecurrenceWindow('Sat'), { kind: 'weekly', start: 7200, end: 8640 });
  assert.equal(parseRecurrenceWindow('Thu 09:00 - 17:00'), undefined);
  assert.equal(parseRecurrenceWindow('25:00'), undefined);
});

test('a window attaches to the recurrence spec', () => {
  const { annotations } = extract('Review week EVERY week [Fri 15:00 - Fri 18:00]');
  assert.deepEqual(annotations.recurrence, {
    unit: 'week',
    min: 1,
    max: 1,
    window: { kind: 'weekly', start: 6660, end: 6840 },
    source: 'EVERY week [Fri 15:00 - Fri 18:00]',
  });
});
