import type { DateTime } from 'luxon';
import type { AnnotationToken } from './annotate.js';
import { scanAnnotations } from './annotate.js';
import { formatStamp } from './dates.js';
import { lexLine } from './lex.js';
import type { OutlineNode } from './model.js';
import { parseOutline } from './parse.js';

export interface TextEdit {
  /** Character offsets into the line, `[start, end)`. */
  start: number;
  end: number;
  replacement: string;
}

export type NotCompletableReason = 'already-done' | 'not-a-task';

export type CompleteLineResult =
  | { kind: 'edit'; edit: TextEdit; newText: string }
  | { kind: 'not-completable'; reason: NotCompletableReason };

export type ApplyCompleteResult =
  | { changed: true; newText: string; line: number; edit: TextEdit }
  | { changed: false; newText: string; reason: NotCompletableReason };

type StampToken = Extract<AnnotationToken, { type: 'stamp' }>;

function detectEol(text: string): '\n' | '\r\n' {
  return text.includes('\r\n') ? '\r\n' : '\n';
}

function splitLines(text: string): { lines: string[]; eol: '\n' | '\r\n'; endsWithNewline: boolean } {
  const eol = detectEol(text);
  const endsWithNewline = text.endsWith('\n');
  let lines = text.split(/\r?\n/);
  if (endsWithNewline && lines.length > 0 && lines[lines.length - 1] === '') {
    lines = lines.slice(0, -1);
  }
  return { lines, eol, endsWithNewline };
}

function joinLines(lines: string[], eol: '\n' | '\r\n', endsWithNewline: boolean): string {
  const text = lines.join(eol);
  return endsWithNewline ? `${text}${eol}` : text;
}

function applyEdit(lineText: string, edit: TextEdit): CompleteLineResult {
  const newText = `${lineText.slice(0, edit.start)}${edit.replacement}${lineText.slice(edit.end)}`;
  return { kind: 'edit', edit, newText };
}

function appendStamp(lineText: string, kind: 'DONE' | 'LASTDONE', now: DateTime): CompleteLineResult {
  const at = lineText.trimEnd().length;
  return applyEdit(lineText, { start: at, end: at, replacement: ` (${kind} ${formatStamp(now)})` });
}

function isLastDone(token: AnnotationToken): token is StampToken {
  return token.type === 'stamp' && token.kind === 'LASTDONE';
}

/**
 * Compute the edit that marks one line complete at `now`.
 *
 * - a LASTDONE stamp has its timestamp replaced in place;
 * - a recurring header gets ` (LASTDONE now)` appended;
 * - any other project or action header gets ` (DONE now)` appended;
 * - a line already carrying DONE or WONTDO is left alone.
 */
export function completeLine(lineText: string, now: DateTime): CompleteLineResult {
  const { token } = lexLine(lineText, 0);
  if (token.kind === 'blank' || token.kind === 'note' || token.kind === 'section') {
    return { kind: 'not-completable', reason: 'not-a-task' };
  }

  const tokens = scanAnnotations(token.body);
  if (tokens.some((t) => t.type === 'stamp' && t.kind !== 'LASTDONE')) {
    return { kind: 'not-completable', reason: 'already-done' };
  }

  const lastDone = tokens.find(isLastDone);
  if (lastDone) {
    return applyEdit(lineText, {
      start: token.bodyStart + lastDone.value.start,
      end: token.bodyStart + lastDone.value.end,
      replacement: formatStamp(now),
    });
  }

  if (token.kind === 'continuation') return { kind: 'not-completable', reason: 'not-a-task' };
  const recurring = tokens.some((t) => t.type === 'recurrence');
  return appendStamp(lineText, recurring ? 'LASTDONE' : 'DONE', now);
}

/**
 * Deepest node whose block contains `lineIndex`, skipping its children's lines.
 */
function nodeAtLine(nodes: OutlineNode[], lineIndex: number): OutlineNode | undefined {
  let found: OutlineNode | undefined;
  for (const node of nodes) {
    if (node.line > lineIndex) break;
    if (lineIndex <= node.endLine) found = node;
  }
  return found;
}

/**
 * Complete the node at a 0-based document line.
 *
 * The line may be the node's header or any of its continuation lines. When
 * the node records its LASTDONE stamp on a continuation line, that line is the
 * one updated.
 */
export function applyComplete(text: string, lineIndex: number, now: DateTime): ApplyCompleteResult {
  const { lines, eol, endsWithNewline } = splitLines(text);
  if (!Number.isInteger(lineIndex) || lineIndex < 0 || lineIndex >= lines.length) {
    throw new Error(`Line out of range: ${lineIndex + 1} (document has ${lines.length} lines)`);
  }
  // Blank lines fall inside the enclosing project's block but belong to no node.
  if ((lines[lineIndex] ?? '').trim() === '') return { changed: false, newText: text, reason: 'not-a-task' };

  const { model } = parseOutline(text, { now, zone: now.zoneName ?? 'UTC' });
  const node = nodeAtLine(model.nodes, lineIndex);
  if (!node || node.kind === 'section') return { changed: false, newText: text, reason: 'not-a-task' };
  if (node.annotations.completed) return { changed: false, newText: text, reason: 'already-done' };

  const target = node.annotations.lastDone?.line ?? node.line;
  const lineText = lines[target] ?? '';
  let result = completeLine(lineText, now);
  if (result.kind === 'edit' && target === node.line && node.annotations.lastDone === undefined) {
    // The recurrence spec may sit on a continuation line; the node decides the stamp.
    result = appendStamp(lineText, node.annotations.recurrence ? 'LASTDONE' : 'DONE', now);
  }
  if (result.kind === 'not-completable') return { changed: false, newText: text, reason: result.reason };

  lines[target] = result.newText;
  return { changed: true, newText: joinLines(lines, eol, endsWithNewline), line: target, edit: result.edit };
}
