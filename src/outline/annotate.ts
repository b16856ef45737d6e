import type { DateTime } from 'luxon';
import {
  DEFAULT_DUE_TIME,
  DEFAULT_VISIBLE_TIME,
  RECURRENCE_KEYWORD,
  WAITING_CONTEXT,
} from './constants.js';
import { earliestOf, latestOf, parseStamp } from './dates.js';
import type { Diagnostic } from './diagnostics.js';
import { warningDiagnostic } from './diagnostics.js';
import type {
  Annotations,
  CompletionKind,
  OutlineNode,
  RecurrenceSpec,
  RecurrenceUnit,
  RecurrenceWindow,
} from './model.js';

/**
 * Inline annotation scanner.
 *
 * `scanAnnotations` finds every recognized sigil in one piece of text and
 * returns located tokens; `extractAnnotations` folds the tokens of a node's
 * lines into `Annotations` and display text. Spans are `[start, end)` offsets
 * into the scanned text.
 */
interface Span {
  start: number;
  end: number;
}

export type StampKind = CompletionKind | 'LASTDONE';

export type AnnotationToken =
  | (Span & { type: 'priority'; value: number })
  | (Span & { type: 'due'; date: string; time?: string; leadDays?: number })
  | (Span & { type: 'visible'; date: string; time?: string })
  | (Span & { type: 'remind'; date: string; time?: string })
  | (Span & { type: 'context'; name: string })
  | (Span & { type: 'waiting' })
  | (Span & { type: 'tag'; name: string })
  | (Span & { type: 'after'; name: string })
  | (Span & { type: 'recurrence'; spec: RecurrenceSpec })
  | (Span & {
      type: 'stamp';
      kind: StampKind;
      date: string;
      time: string;
      /** Span of `YYYY-MM-DD HH:MM` inside the stamp. */
      value: Span;
    })
  | (Span & { type: 'malformed'; code: 'MALFORMED_DATE' | 'MALFORMED_RECURRENCE_SPEC'; message: string });

const DATE = String.raw`(\d{4}-\d{2}-\d{2})`;
const TIME = String.raw`(\d{1,2}:\d{2})`;
const BOUNDARY = String.raw`(?<=^|\s)`;
const END = String.raw`(?![\w:-])`;

const STAMP_RE = new RegExp(String.raw`${BOUNDARY}\((DONE|WONTDO|LASTDONE)\s+${DATE}\s+${TIME}\)`, 'g');
const DUE_RE = new RegExp(String.raw`${BOUNDARY}<${DATE}(?:\s+${TIME})?(?:\((\d+)\))?${END}`, 'g');
const VISIBLE_RE = new RegExp(String.raw`${BOUNDARY}>${DATE}(?:\s+${TIME})?${END}`, 'g');
const REMIND_RE = new RegExp(String.raw`${BOUNDARY}REMIND\s+${DATE}(?:\s+${TIME})?${END}`, 'g');
const PRIORITY_RE = /(?<=^|\s)@p:(-?\d+)(?![\w])/g;
const AFTER_RE = /(?<=^|\s)@after:([\w-]+)/g;
const WAITING_RE = /(?<=^|\s)@{1,2}waiting(?![\w-])/gi;
const CONTEXT_RE = /(?<=^|\s)@@([\w-]+)/g;
const TAG_RE = /(?<=^|\s)#([A-Za-z_][\w-]*)/g;
const EVERY_RE = new RegExp(String.raw`${BOUNDARY}${RECURRENCE_KEYWORD}(?![\w])`, 'g');
const SPEC_RE = /^\s+(?:(\d+)\s*-\s*(\d+)\s+|(\d+)\s+)?(day|week|month|year)s?(?![\w])(?:\s*\[([^\]]*)\])?/i;
const WINDOW_END_RE = /^(?:(mon|tue|wed|thu|fri|sat|sun)[a-z]*\.?)?\s*(?:(\d{1,2}):(\d{2}))?$/i;

const WEEKDAYS = ['mon', 'tue', 'wed', 'thu', 'fri', 'sat', 'sun'];
const MINUTES_PER_DAY = 1440;

function toStampKind(word: string): StampKind {
  if (word === 'WONTDO' || word === 'LASTDONE') return word;
  return 'DONE';
}

function toUnit(word: string): RecurrenceUnit {
  const unit = word.toLowerCase();
  if (unit === 'week' || unit === 'month' || unit === 'year') return unit;
  return 'day';
}

function isValidDate(date: string, time: string | undefined): boolean {
  return parseStamp(date, time, 'UTC') !== undefined;
}

function malformedDate(span: Span, text: string): AnnotationToken {
  return {
    type: 'malformed',
    code: 'MALFORMED_DATE',
    message: `Invalid date ${JSON.stringify(text.slice(span.start, span.end))}`,
    ...span,
  };
}

interface WindowEnd {
  weekday?: number;
  minutes?: number;
}

function parseWindowEnd(text: string): WindowEnd | undefined {
  const match = text.trim().match(WINDOW_END_RE);
  if (!match) return undefined;
  const day = match[1];
  const hours = match[2];
  if (!day && hours === undefined) return undefined;

  const end: WindowEnd = {};
  if (day) end.weekday = WEEKDAYS.indexOf(day.toLowerCase()) + 1;
  if (hours !== undefined) {
    const h = Number(hours);
    const m = Number(match[3] ?? '0');
    if (h > 23 || m > 59) return undefined;
    end.minutes = h * 60 + m;
  }
  return end;
}

/**
 * Parse the inside of a `[...]` window.
 *
 * Accepted: `HH:MM`, `Ddd`, `Ddd HH:MM`, and `A - B` where either both ends
 * name a weekday (weekly window) or neither does (daily window).
 */
export function parseRecurrenceWindow(inner: string): RecurrenceWindow | undefined {
  const range = inner.match(/^(.+?)\s*-\s*(.+)$/);
  if (!range) {
    const single = parseWindowEnd(inner);
    if (!single) return undefined;
    if (single.weekday === undefined) {
      return { kind: 'daily', start: single.minutes ?? 0, end: MINUTES_PER_DAY };
    }
    const dayStart = (single.weekday - 1) * MINUTES_PER_DAY;
    return { kind: 'weekly', start: dayStart + (single.minutes ?? 0), end: dayStart + MINUTES_PER_DAY };
  }

  const from = parseWindowEnd(range[1] ?? '');
  const to = parseWindowEnd(range[2] ?? '');
  if (!from || !to) return undefined;

  if (from.weekday === undefined && to.weekday === undefined) {
    if (from.minutes === undefined || to.minutes === undefined) return undefined;
    if (from.minutes === to.minutes) return undefined;
    return { kind: 'daily', start: from.minutes, end: to.minutes };
  }
  if (from.weekday === undefined || to.weekday === undefined) return undefined;

  const start = (from.weekday - 1) * MINUTES_PER_DAY + (from.minutes ?? 0);
  const end = (to.weekday - 1) * MINUTES_PER_DAY + (to.minutes ?? MINUTES_PER_DAY);
  if (start === end) return undefined;
  return { kind: 'weekly', start, end };
}

/**
 * Parse the text following the `EVERY` keyword.
 *
 * Returns the spec and the number of characters it consumed, or `undefined`
 * when the text is not a valid spec.
 */
export function parseRecurrenceSpec(rest: string): { spec: Omit<RecurrenceSpec, 'source'>; length: number } | undefined {
  const match = rest.match(SPEC_RE);
  if (!match) return undefined;

  const unit = toUnit(match[4] ?? '');
  let min = 1;
  let max = 1;
  if (match[1] !== undefined) {
    min = Number(match[1]);
    max = Number(match[2]);
  } else if (match[3] !== undefined) {
    min = Number(match[3]);
    max = min;
  }
  if (min < 1 || max < min) return undefined;

  const spec: Omit<RecurrenceSpec, 'source'> = { unit, min, max };
  if (match[5] !== undefined) {
    const window = parseRecurrenceWindow(match[5]);
    if (!window) return undefined;
    spec.window = window;
  }
  return { spec, length: match[0].length };
}

function collectMatches(text: string): AnnotationToken[] {
  const found: AnnotationToken[] = [];

  for (const match of text.matchAll(STAMP_RE)) {
    const start = match.index ?? 0;
    const end = start + match[0].length;
    const date = match[2] ?? '';
    const time = match[3] ?? '';
    if (!isValidDate(date, time)) {
      found.push(malformedDate({ start, end }, text));
      continue;
    }
    const dateOffset = match[0].indexOf(date);
    const timeOffset = match[0].indexOf(time, dateOffset + date.length);
    found.push({
      type: 'stamp',
      kind: toStampKind(match[1] ?? ''),
      date,
      time,
      value: { start: start + dateOffset, end: start + timeOffset + time.length },
      start,
      end,
    });
  }

  for (const match of text.matchAll(DUE_RE)) {
    const start = match.index ?? 0;
    const span = { start, end: start + match[0].length };
    const date = match[1] ?? '';
    const time = match[2];
    if (!isValidDate(date, time)) {
      found.push(malformedDate(span, text));
      continue;
    }
    const lead = match[3];
    found.push({
      type: 'due',
      date,
      ...(time !== undefined ? { time } : {}),
      ...(lead !== undefined ? { leadDays: Number(lead) } : {}),
      ...span,
    });
  }

  for (const [re, type] of [
    [VISIBLE_RE, 'visible'],
    [REMIND_RE, 'remind'],
  ] as const) {
    for (const match of text.matchAll(re)) {
      const start = match.index ?? 0;
      const span = { start, end: start + match[0].length };
      const date = match[1] ?? '';
      const time = match[2];
      if (!isValidDate(date, time)) {
        found.push(malformedDate(span, text));
        continue;
      }
      found.push({ type, date, ...(time !== undefined ? { time } : {}), ...span });
    }
  }

  for (const match of text.matchAll(PRIORITY_RE)) {
    const start = match.index ?? 0;
    found.push({ type: 'priority', value: Number(match[1]), start, end: start + match[0].length });
  }

  for (const match of text.matchAll(AFTER_RE)) {
    const start = match.index ?? 0;
    found.push({ type: 'after', name: match[1] ?? '', start, end: start + match[0].length });
  }

  for (const match of text.matchAll(WAITING_RE)) {
    const start = match.index ?? 0;
    found.push({ type: 'waiting', start, end: start + match[0].length });
  }

  for (const match of text.matchAll(CONTEXT_RE)) {
    const name = match[1] ?? '';
    if (name.toLowerCase() === WAITING_CONTEXT) continue;
    const start = match.index ?? 0;
    found.push({ type: 'context', name, start, end: start + match[0].length });
  }

  for (const match of text.matchAll(TAG_RE)) {
    const start = match.index ?? 0;
    found.push({ type: 'tag', name: match[1] ?? '', start, end: start + match[0].length });
  }

  for (const match of text.matchAll(EVERY_RE)) {
    const start = match.index ?? 0;
    const keywordEnd = start + match[0].length;
    const parsed = parseRecurrenceSpec(text.slice(keywordEnd));
    if (!parsed) {
      found.push({
        type: 'malformed',
        code: 'MALFORMED_RECURRENCE_SPEC',
        message: `Unrecognized recurrence after ${RECURRENCE_KEYWORD}: ${JSON.stringify(text.slice(keywordEnd).trim())}`,
        start,
        end: keywordEnd,
      });
      continue;
    }
    const end = keywordEnd + parsed.length;
    found.push({ type: 'recurrence', spec: { ...parsed.spec, source: text.slice(start, end) }, start, end });
  }

  return found;
}

/**
 * Find every annotation in `text`, ordered by position.
 *
 * Overlapping matches are resolved in favour of the one starting first (the
 * longer one on a tie), so e.g. a `#tag` inside a `[...]` window is not also
 * read as a tag definition.
 */
export function scanAnnotations(text: string): AnnotationToken[] {
  const sorted = collectMatches(text).sort((a, b) => a.start - b.start || b.end - a.end);
  const out: AnnotationToken[] = [];
  let cursor = 0;
  for (const token of sorted) {
    if (token.start < cursor) continue;
    out.push(token);
    cursor = token.end;
  }
  return out;
}

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function literalTextFrom(text: string, tokens: AnnotationToken[], from: number): string {
  let out = '';
  let cursor = from;
  for (const token of tokens) {
    if (token.start < from || token.type === 'malformed') continue;
    out += text.slice(cursor, token.start);
    cursor = token.end;
  }
  out += text.slice(cursor);
  return collapseWhitespace(out);
}

/**
 * Remove recognized annotations from `text`, keeping malformed ones literal.
 */
export function stripAnnotations(text: string, tokens: AnnotationToken[]): string {
  return literalTextFrom(text, tokens, 0);
}

export interface TextSegment {
  text: string;
  /** 0-based line the text came from. */
  line: number;
  /** `*` support lines are kept verbatim and never scanned for annotations. */
  literal?: boolean;
}

export interface ExtractResult {
  annotations: Annotations;
  /** Display text per input segment, in input order. */
  display: string[];
  diagnostics: Diagnostic[];
}

function pushUnique(target: string[], value: string): void {
  if (!target.includes(value)) target.push(value);
}

function stampAt(token: { date: string; time?: string }, defaultTime: string, zone: string): DateTime | undefined {
  return parseStamp(token.date, token.time ?? defaultTime, zone);
}

/**
 * Fold the annotations of a node's lines (header first) into one record.
 *
 * Repeated annotations combine the same way inheritance does: the earliest
 * due date and latest visible date win; the last priority and stamps win.
 */
export function extractAnnotations(segments: TextSegment[], zone: string): ExtractResult {
  const annotations: Annotations = { contexts: [], tags: [], after: [] };
  const display: string[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const segment of segments) {
    const tokens = scanAnnotations(segment.text);
    display.push(stripAnnotations(segment.text, tokens));

    for (const token of tokens) {
      switch (token.type) {
        case 'priority':
          annotations.priority = token.value;
          break;
        case 'due': {
          const at = stampAt(token, DEFAULT_DUE_TIME, zone);
          if (!at) break;
          if (!annotations.due || at < annotations.due.at) {
            annotations.due = { at, ...(token.leadDays !== undefined ? { leadDays: token.leadDays } : {}) };
          }
          break;
        }
        case 'visible':
          annotations.visible = latestOf(annotations.visible, stampAt(token, DEFAULT_VISIBLE_TIME, zone));
          break;
        case 'remind':
          annotations.remind = earliestOf(annotations.remind, stampAt(token, DEFAULT_VISIBLE_TIME, zone));
          break;
        case 'context':
          pushUnique(annotations.contexts, token.name);
          break;
        case 'tag':
          pushUnique(annotations.tags, token.name);
          break;
        case 'after':
          pushUnique(annotations.after, token.name);
          break;
        case 'waiting': {
          const rest = literalTextFrom(segment.text, tokens, token.end);
          annotations.waiting = rest ? { description: rest } : annotations.waiting ?? {};
          break;
        }
        case 'recurrence':
          annotations.recurrence = token.spec;
          break;
        case 'stamp': {
          const at = stampAt(token, '00:00', zone);
          if (!at) break;
          if (token.kind === 'LASTDONE') {
            if (!annotations.lastDone || at >= annotations.lastDone.at) {
              annotations.lastDone = { at, line: segment.line };
            }
          } else {
            annotations.completed = { kind: token.kind, at };
          }
          break;
        }
        case 'malformed':
          diagnostics.push(warningDiagnostic(token.code, token.message, segment.line));
          break;
      }
    }
  }

  return { annotations, display, diagnostics };
}

/**
 * Attach annotations, display text and notes to every node of a built outline.
 */
export function annotateOutline(
  nodes: OutlineNode[],
  segments: Map<number, TextSegment[]>,
  zone: string
): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];
  for (const node of nodes) {
    const own = segments.get(node.id) ?? [];
    const scanned = own.filter((segment) => !segment.literal);
    const result = extractAnnotations(scanned, zone);
    node.annotations = result.annotations;
    diagnostics.push(...result.diagnostics);

    let displayIndex = 0;
    const notes: string[] = [];
    for (const segment of own) {
      if (segment.literal) {
        notes.push(segment.text);
        continue;
      }
      const display = result.display[displayIndex] ?? '';
      displayIndex += 1;
      if (segment.line === node.line && node.raw !== '') {
        node.text = display;
      } else if (display) {
        notes.push(display);
      }
    }
    node.notes = notes;
  }
  return diagnostics;
}
