import { readFile } from 'node:fs/promises';
import { DateTime } from 'luxon';
import type { OutlineConfig } from '../config.js';
import type { ContextSelection } from './contexts.js';
import { parseContextsFile } from './contexts.js';
import { parseNow } from './dates.js';
import type { Diagnostic } from './diagnostics.js';
import { applyComplete } from './edit.js';
import type { NotCompletableReason } from './edit.js';
import type { OutlineModel } from './model.js';
import { isRecurring } from './model.js';
import type { ParseOutlineResult } from './parse.js';
import { parseOutline } from './parse.js';
import {
  findOutlineFiles,
  readOutlineFile,
  resolveOutlinePath,
  sha256Hex,
  writeFileAtomic,
} from './storage.js';
import type { OutlineTreeViewNode, ViewEntry, ViewKind } from './view.js';
import { buildOutlineTreeView, formatView, renderView } from './view.js';

/**
 * Public API for outline files.
 *
 * This module is the boundary between:
 * - filesystem storage (`storage.ts`)
 * - the parsing/inference engine (`parse.ts`, `view.ts`)
 * - minimal-diff completion edits (`edit.ts`)
 *
 * Concurrency model:
 * - `completeOutlineLine` accepts `ifMatch` (etag) for optimistic concurrency.
 * - The etag is a SHA-256 of the full document content.
 */
export interface OutlineStats {
  projects: number;
  actions: number;
  open: number;
  done: number;
  blocked: number;
  recurring: number;
}

export interface OutlineSummary {
  path: string;
  title: string;
  stats: OutlineStats;
  warnings: number;
}

export interface DiagnosticView {
  code: string;
  message: string;
  /** 1-based line number. */
  line?: number;
}

export interface LoadOutlineOptions {
  path: string;
  /** `YYYY-MM-DD HH:MM` or ISO 8601; defaults to the current minute. */
  now?: string;
}

export interface LoadedOutline extends ParseOutlineResult {
  path: string;
  text: string;
  etag: string;
}

const MAX_CACHED_MODELS = 16;
const modelCache = new Map<string, ParseOutlineResult>();

function zoneOf(config: OutlineConfig): string {
  return config.zone ?? 'local';
}

export function resolveNow(config: OutlineConfig, now: string | undefined): DateTime {
  const zone = zoneOf(config);
  if (now !== undefined) return parseNow(now, zone);
  return DateTime.now().setZone(zone).startOf('minute');
}

/**
 * Parse with a small memo keyed by content hash, file id, zone and `now`.
 *
 * Any text change produces a new etag, so stale models are never returned.
 */
function parseCached(text: string, etag: string, fileId: string, zone: string, now: DateTime): ParseOutlineResult {
  const key = [etag, fileId, zone, now.toMillis()].join('|');
  const cached = modelCache.get(key);
  if (cached) {
    modelCache.delete(key);
    modelCache.set(key, cached);
    return cached;
  }

  const result = parseOutline(text, { fileId, zone, now });
  modelCache.set(key, result);
  while (modelCache.size > MAX_CACHED_MODELS) {
    const oldest = modelCache.keys().next();
    if (oldest.done) break;
    modelCache.delete(oldest.value);
  }
  return result;
}

function toDiagnosticView(diagnostic: Diagnostic): DiagnosticView {
  const view: DiagnosticView = { code: diagnostic.code, message: diagnostic.message };
  if (diagnostic.line !== undefined) view.line = diagnostic.line + 1;
  return view;
}

function computeStats(model: OutlineModel): OutlineStats {
  const stats: OutlineStats = { projects: 0, actions: 0, open: 0, done: 0, blocked: 0, recurring: 0 };
  for (const node of model.nodes) {
    if (node.kind === 'section') continue;
    if (node.kind === 'project') stats.projects += 1;
    else stats.actions += 1;
    if (isRecurring(node)) stats.recurring += 1;
    if (node.resolved.done) stats.done += 1;
    else stats.open += 1;
    if (node.resolved.blocked && !node.resolved.done) stats.blocked += 1;
  }
  return stats;
}

function titleOf(model: OutlineModel, fallback: string): string {
  return model.sections.find((section) => section.text)?.text ?? fallback;
}

/**
 * Enforce optimistic concurrency when an `ifMatch` etag is provided.
 */
function requireIfMatch(currentEtag: string, ifMatch: string | undefined): void {
  if (!ifMatch) return;
  if (ifMatch !== currentEtag) {
    throw new Error(`CONFLICT: etag mismatch (current=${currentEtag}, ifMatch=${ifMatch})`);
  }
}

/**
 * Read, parse and resolve one outline file.
 */
export async function loadOutline(config: OutlineConfig, options: LoadOutlineOptions): Promise<LoadedOutline> {
  const { path, text, etag } = await readOutlineFile(config, options.path);
  const now = resolveNow(config, options.now);
  const parsed = parseCached(text, etag, path, zoneOf(config), now);
  return { ...parsed, path, text, etag };
}

export interface ListOutlinesOptions {
  query?: string;
  now?: string;
}

/**
 * List outline files under `config.rootDir` with basic counts.
 */
export async function listOutlines(
  config: OutlineConfig,
  options: ListOutlinesOptions = {}
): Promise<OutlineSummary[]> {
  const query = options.query?.trim().toLowerCase() || undefined;
  const summaries: OutlineSummary[] = [];

  for (const path of await findOutlineFiles(config)) {
    const { model, warnings } = await loadOutline(config, { path, now: options.now });
    const title = titleOf(model, path);
    if (query && !`${path}\n${title}`.toLowerCase().includes(query)) continue;
    summaries.push({ path, title, stats: computeStats(model), warnings: warnings.length });
  }

  return summaries;
}

export interface GetOutlineOptions extends LoadOutlineOptions {
  includeNotes?: boolean;
}

export interface OutlineDocumentView {
  path: string;
  title: string;
  now: string;
  stats: OutlineStats;
  sections: OutlineTreeViewNode[];
}

/**
 * Read an outline file and return its resolved tree.
 */
export async function getOutline(
  config: OutlineConfig,
  options: GetOutlineOptions
): Promise<{ outline: OutlineDocumentView; warnings: DiagnosticView[]; etag: string }> {
  const { model, warnings, path, etag } = await loadOutline(config, options);
  const outline: OutlineDocumentView = {
    path,
    title: titleOf(model, path),
    now: model.now.toISO() ?? '',
    stats: computeStats(model),
    sections: buildOutlineTreeView(model, { includeNotes: options.includeNotes ?? false }),
  };
  return { outline, warnings: warnings.map(toDiagnosticView), etag };
}

/**
 * Read and parse a contexts file (root-relative).
 */
export async function readContextsFile(config: OutlineConfig, path: string): Promise<ContextSelection> {
  const text = await readFile(resolveOutlinePath(config, path), 'utf8');
  return parseContextsFile(text);
}

export interface RenderOutlineViewOptions extends LoadOutlineOptions {
  kind: ViewKind;
  include?: string[];
  exclude?: string[];
  includeUncontexted?: boolean;
  /** Contexts file (root-relative); defaults to `config.contextsFile`. Ignored when lists are given. */
  contextsFile?: string;
}

async function selectContexts(
  config: OutlineConfig,
  options: RenderOutlineViewOptions
): Promise<ContextSelection> {
  if (options.include !== undefined || options.exclude !== undefined) {
    return { include: options.include ?? [], exclude: options.exclude ?? [] };
  }
  const file = options.contextsFile ?? config.contextsFile;
  if (file === undefined) return { include: [], exclude: [] };
  return readContextsFile(config, file);
}

/**
 * Render one view of an outline file as entries plus plain text.
 */
export async function renderOutlineView(
  config: OutlineConfig,
  options: RenderOutlineViewOptions
): Promise<{ entries: ViewEntry[]; text: string; etag: string }> {
  const selection = await selectContexts(config, options);
  const { model, etag } = await loadOutline(config, options);
  const entries = renderView(model, {
    kind: options.kind,
    include: selection.include,
    exclude: selection.exclude,
    includeUncontexted: options.includeUncontexted ?? false,
    inboxContext: config.inboxContext,
  });
  return { entries, text: formatView(entries), etag };
}

export interface CompleteOutlineLineOptions {
  path: string;
  /** 1-based line of the node (header or continuation line). */
  line: number;
  now?: string;
  ifMatch?: string;
  dryRun?: boolean;
}

export interface CompleteOutlineLineResult {
  changed: boolean;
  /** 1-based line that was (or would be) rewritten. */
  line?: number;
  lineText?: string;
  reason?: NotCompletableReason;
  etag: string;
}

/**
 * Complete the project or action at a line and write the file atomically.
 *
 * Completing an already completed node is a no-op that reports `already-done`.
 * If `dryRun` is true, no file is written, but the returned etag still
 * reflects what the content would be.
 */
export async function completeOutlineLine(
  config: OutlineConfig,
  options: CompleteOutlineLineOptions
): Promise<CompleteOutlineLineResult> {
  if (!Number.isInteger(options.line) || options.line < 1) {
    throw new Error(`line must be a positive integer (got ${options.line})`);
  }
  const { absolutePath, text, etag } = await readOutlineFile(config, options.path);
  requireIfMatch(etag, options.ifMatch);

  const now = resolveNow(config, options.now);
  const result = applyComplete(text, options.line - 1, now);
  if (!result.changed) {
    if (result.reason === 'not-a-task') {
      throw new Error(`Line ${options.line} is not a project or action`);
    }
    return { changed: false, reason: result.reason, etag };
  }

  if (!options.dryRun) await writeFileAtomic(absolutePath, result.newText);
  const newEtag = sha256Hex(result.newText);
  const lineText = result.newText.split(/\r?\n/)[result.line] ?? '';
  return { changed: true, line: result.line + 1, lineText, etag: newEtag };
}

/**
 * Validate an outline file and return diagnostics with 1-based line numbers.
 *
 * The engine uses 0-based indices; we convert to 1-based to match editor UX
 * expectations.
 */
export async function validateOutlineDoc(
  config: OutlineConfig,
  options: LoadOutlineOptions
): Promise<{ errors: DiagnosticView[]; warnings: DiagnosticView[] }> {
  const { warnings } = await loadOutline(config, options);
  return {
    errors: warnings.filter((d) => d.severity === 'error').map(toDiagnosticView),
    warnings: warnings.filter((d) => d.severity === 'warning').map(toDiagnosticView),
  };
}
