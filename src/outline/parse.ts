import { DateTime } from 'luxon';
import { annotateOutline } from './annotate.js';
import { buildOutline } from './build.js';
import { resolveDependencies } from './deps.js';
import type { Diagnostic } from './diagnostics.js';
import { warningDiagnostic } from './diagnostics.js';
import { lexOutline } from './lex.js';
import type { OutlineModel } from './model.js';
import { scheduleOutline } from './recur.js';
import { resolveAttributes } from './resolve.js';

/**
 * Outline parser: raw text in, fully resolved model out.
 *
 * The pipeline is lex -> build -> annotate -> resolve -> dependencies ->
 * schedule. Nothing is cached between calls and nothing here throws on bad
 * input; every problem becomes a warning next to a best-effort model.
 */
export interface ParseOptions {
  /** Opaque id copied into every view location (default `outline`). */
  fileId?: string;
  /** Snapshot used for every time-dependent attribute (default: current time). */
  now?: DateTime;
  /** IANA zone dates are read in (default: the zone of `now`, else local). */
  zone?: string;
}

export interface ParseOutlineResult {
  model: OutlineModel;
  warnings: Diagnostic[];
}

export const DEFAULT_FILE_ID = 'outline';

function byLine(a: Diagnostic, b: Diagnostic): number {
  return (a.line ?? -1) - (b.line ?? -1);
}

export function parseOutline(text: string, options: ParseOptions = {}): ParseOutlineResult {
  const zone = options.zone ?? options.now?.zoneName ?? 'local';
  const now = options.now ?? DateTime.now().setZone(zone);
  const fileId = options.fileId ?? DEFAULT_FILE_ID;

  const model: OutlineModel = {
    fileId,
    now,
    sections: [],
    nodes: [],
    tags: new Map(),
    waitsOn: new Map(),
  };

  if (text.trim().length === 0) {
    return { model, warnings: [warningDiagnostic('EMPTY_DOCUMENT', 'Outline is empty')] };
  }

  const lexed = lexOutline(text);
  const built = buildOutline(lexed.tokens);
  const annotated = annotateOutline(built.nodes, built.segments, zone);
  resolveAttributes(built.sections);
  const deps = resolveDependencies(built.sections, built.nodes);
  scheduleOutline(built.nodes, now);

  model.sections = built.sections;
  model.nodes = built.nodes;
  model.tags = deps.tags;
  model.waitsOn = deps.waitsOn;

  const warnings = [...lexed.diagnostics, ...built.diagnostics, ...annotated, ...deps.diagnostics].sort(byLine);
  return { model, warnings };
}
