import { TAB_WIDTH } from './constants.js';
import type { Diagnostic } from './diagnostics.js';
import { warningDiagnostic } from './diagnostics.js';

/**
 * Line classifier for outline documents.
 *
 * Each physical line becomes exactly one token. Tokens carrying text record
 * where that text starts in the raw line (`bodyStart`) so later stages can
 * report character spans against the original line.
 */
interface TokenBase {
  /** 0-based line index. */
  line: number;
  indent: number;
  raw: string;
}

interface BodyToken extends TokenBase {
  body: string;
  bodyStart: number;
}

export type LineToken =
  | (TokenBase & { kind: 'blank' })
  | (BodyToken & { kind: 'section'; level: number })
  | (BodyToken & { kind: 'project'; ordered: boolean })
  | (BodyToken & { kind: 'action' })
  | (BodyToken & { kind: 'note' })
  | (BodyToken & { kind: 'continuation' });

export interface LexResult {
  tokens: LineToken[];
  diagnostics: Diagnostic[];
}

const SECTION_RE = /^(\s*)(=+)\s+(.*?)\s+(=+)\s*$/;
const MARKER_RE = /^(\s*)([#\-@*])(\s+)(\S.*)$/;
const BARE_MARKER_RE = /^\s*[#\-@*]\s*$/;

export function measureIndent(line: string): number {
  let columns = 0;
  for (const char of line) {
    if (char === ' ') columns += 1;
    else if (char === '\t') columns += TAB_WIDTH;
    else break;
  }
  return columns;
}

/**
 * Split text into lines, ignoring the empty string after a final newline.
 */
export function splitOutlineLines(text: string): string[] {
  const lines = text.split(/\r?\n/);
  if (text.endsWith('\n') && lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

function continuation(line: number, indent: number, raw: string): LineToken {
  const bodyStart = raw.length - raw.trimStart().length;
  return { kind: 'continuation', line, indent, raw, body: raw.trim(), bodyStart };
}

/**
 * Classify one line.
 *
 * A line that opens with a marker in a shape we do not recognize degrades to
 * continuation text and comes back with a `LEX_ERROR` diagnostic.
 */
export function lexLine(raw: string, line: number): { token: LineToken; diagnostic?: Diagnostic } {
  const indent = measureIndent(raw);
  if (raw.trim().length === 0) return { token: { kind: 'blank', line, indent, raw } };

  const section = raw.match(SECTION_RE);
  if (section) {
    const open = section[2] ?? '';
    const close = section[4] ?? '';
    const title = section[3] ?? '';
    if (open.length === close.length && title.length > 0) {
      const bodyStart = raw.indexOf(title, (section[1]?.length ?? 0) + open.length);
      return {
        token: { kind: 'section', line, indent, raw, level: open.length, body: title, bodyStart },
      };
    }
    return {
      token: continuation(line, indent, raw),
      diagnostic: warningDiagnostic(
        'LEX_ERROR',
        `Unbalanced section header (${open.length} "=" before the title, ${close.length} after)`,
        line
      ),
    };
  }

  const trimmed = raw.trimStart();
  if (trimmed.startsWith('=')) {
    return {
      token: continuation(line, indent, raw),
      diagnostic: warningDiagnostic('LEX_ERROR', 'Malformed section header (expected "= Title =")', line),
    };
  }

  if (BARE_MARKER_RE.test(raw)) {
    return {
      token: continuation(line, indent, raw),
      diagnostic: warningDiagnostic('LEX_ERROR', `List marker "${trimmed.trim()}" has no text`, line),
    };
  }

  const marker = raw.match(MARKER_RE);
  if (marker) {
    const body = (marker[4] ?? '').trimEnd();
    const bodyStart = (marker[1]?.length ?? 0) + 1 + (marker[3]?.length ?? 0);
    const symbol = marker[2];
    if (symbol === '#') return { token: { kind: 'project', ordered: true, line, indent, raw, body, bodyStart } };
    if (symbol === '-') return { token: { kind: 'project', ordered: false, line, indent, raw, body, bodyStart } };
    if (symbol === '@') return { token: { kind: 'action', line, indent, raw, body, bodyStart } };
    return { token: { kind: 'note', line, indent, raw, body, bodyStart } };
  }

  return { token: continuation(line, indent, raw) };
}

export function lexOutline(text: string): LexResult {
  const tokens: LineToken[] = [];
  const diagnostics: Diagnostic[] = [];
  const lines = splitOutlineLines(text);
  for (let index = 0; index < lines.length; index += 1) {
    const { token, diagnostic } = lexLine(lines[index] ?? '', index);
    tokens.push(token);
    if (diagnostic) diagnostics.push(diagnostic);
  }
  return { tokens, diagnostics };
}
