import type { DateTime } from 'luxon';
import { DEFAULT_INBOX_CONTEXT } from './constants.js';
import { describeSpan, earliestOf, formatStamp } from './dates.js';
import type { OutlineModel, OutlineNode } from './model.js';
import { childrenOf, isRecurring } from './model.js';

/**
 * View generation over a resolved outline model.
 *
 * The core model carries luxon instants and parent ids needed by the
 * resolver. Views translate the nodes that pass a filter into stable JSON
 * shapes with 1-based source locations the host can jump to.
 *
 * Ordering within a view: earliest sort date first (absent last), then higher
 * priority, then document order.
 */
export type ViewKind = 'next' | 'inboxes' | 'recurring' | 'waiting' | 'reminders' | 'all';
export type SourceViewKind = Exclude<ViewKind, 'all'>;

export const VIEW_KINDS: readonly ViewKind[] = ['next', 'inboxes', 'recurring', 'waiting', 'reminders', 'all'];

export type EntryStatus = 'open' | 'due-soon' | 'due' | 'upcoming' | 'overdue' | 'waiting';

export interface ViewRequest {
  kind: ViewKind;
  /** Contexts to show; empty means every context. */
  include?: string[];
  /** Contexts to hide; wins over `include`. */
  exclude?: string[];
  /** With a non-empty `include`, also show items that have no context at all. */
  includeUncontexted?: boolean;
  /** Context marking recurring actions as inboxes (default `inbox`). */
  inboxContext?: string;
}

export interface SourceLocation {
  fileId: string;
  /** 1-based line number. */
  lineNumber: number;
}

export interface ViewEntry {
  nodeId: number;
  view: SourceViewKind;
  displayText: string;
  location: SourceLocation;
  status: EntryStatus;
  /** Relative description such as `Overdue 3 days`. */
  label?: string;
  priority: number;
  contexts: string[];
  /** Title of the closest enclosing project. */
  project?: string;
  due?: string;
  waitingFor?: string;
  window?: { earliest?: string; latest?: string; next?: string };
}

interface Candidate {
  entry: ViewEntry;
  sortAt?: DateTime;
}

function contextsAllowed(contexts: string[], request: ViewRequest, honourInclude: boolean): boolean {
  const exclude = request.exclude ?? [];
  if (contexts.some((context) => exclude.includes(context))) return false;
  const include = request.include ?? [];
  if (!honourInclude || include.length === 0) return true;
  if (contexts.some((context) => include.includes(context))) return true;
  return (request.includeUncontexted ?? false) && contexts.length === 0;
}

function closestProject(model: OutlineModel, node: OutlineNode): string | undefined {
  let parentId = node.parentId;
  while (parentId !== undefined) {
    const parent = model.nodes[parentId];
    if (!parent) return undefined;
    if (parent.kind === 'project') return parent.text;
    parentId = parent.parentId;
  }
  return undefined;
}

function spanLabel(prefix: string, from: DateTime, to: DateTime): string {
  return `${prefix} ${describeSpan(to.diff(from, 'seconds').seconds)}`;
}

function baseEntry(model: OutlineModel, node: OutlineNode, view: SourceViewKind, status: EntryStatus): ViewEntry {
  const entry: ViewEntry = {
    nodeId: node.id,
    view,
    displayText: node.text || node.raw.trim(),
    location: { fileId: model.fileId, lineNumber: node.line + 1 },
    status,
    priority: node.resolved.priority,
    contexts: node.resolved.contexts,
  };
  const project = closestProject(model, node);
  if (project !== undefined) entry.project = project;
  if (node.resolved.due) entry.due = formatStamp(node.resolved.due);
  return entry;
}

function nextActionCandidate(model: OutlineModel, node: OutlineNode): Candidate {
  const now = model.now;
  const due = node.resolved.due;
  let status: EntryStatus = 'open';
  let label: string | undefined;
  if (due) {
    const lead = node.resolved.leadDays;
    if (due < now) status = 'overdue';
    else if (lead !== undefined && due.minus({ days: lead }) <= now) status = 'due-soon';
    label = due < now ? spanLabel('Overdue', due, now) : spanLabel('Due', now, due);
  }
  const entry = baseEntry(model, node, 'next', status);
  if (label) entry.label = label;
  return { entry, sortAt: due };
}

function recurringCandidate(model: OutlineModel, node: OutlineNode, view: 'inboxes' | 'recurring'): Candidate | undefined {
  const schedule = node.resolved.schedule;
  if (!schedule) return undefined;
  const now = model.now;

  const entry = baseEntry(model, node, view, schedule.status);
  if (schedule.status === 'overdue' && schedule.overdueAt) {
    entry.label = spanLabel('Overdue', schedule.overdueAt, now);
  } else if (schedule.status === 'due' && schedule.overdueAt) {
    entry.label = spanLabel('Due', now, schedule.overdueAt);
  } else if (schedule.status === 'upcoming' && schedule.next) {
    entry.label = spanLabel('Upcoming', now, schedule.next);
  }

  const window: ViewEntry['window'] = {};
  if (schedule.earliest) window.earliest = formatStamp(schedule.earliest);
  if (schedule.latest) window.latest = formatStamp(schedule.latest);
  if (schedule.next) window.next = formatStamp(schedule.next);
  if (Object.keys(window).length > 0) entry.window = window;

  return { entry, sortAt: earliestOf(node.resolved.due, schedule.next) };
}

function isVisible(node: OutlineNode, now: DateTime): boolean {
  const visible = node.resolved.visible;
  return !visible || visible <= now;
}

function collectNext(model: OutlineModel, request: ViewRequest): Candidate[] {
  return model.nodes
    .filter(
      (node) =>
        node.kind === 'action' &&
        !node.resolved.done &&
        !isRecurring(node) &&
        !node.resolved.blocked &&
        node.annotations.waiting === undefined &&
        isVisible(node, model.now) &&
        contextsAllowed(node.resolved.contexts, request, true)
    )
    .map((node) => nextActionCandidate(model, node));
}

function collectRecurring(model: OutlineModel, request: ViewRequest, view: 'inboxes' | 'recurring'): Candidate[] {
  const inboxContext = request.inboxContext ?? DEFAULT_INBOX_CONTEXT;
  const out: Candidate[] = [];
  for (const node of model.nodes) {
    if (node.kind !== 'action' || !isRecurring(node) || node.resolved.done) continue;
    if (!contextsAllowed(node.resolved.contexts, request, false)) continue;
    if (view === 'inboxes') {
      if (!node.resolved.contexts.includes(inboxContext)) continue;
      if (node.resolved.blocked || !node.resolved.schedule?.isDueNow) continue;
      if (!isVisible(node, model.now)) continue;
    }
    const candidate = recurringCandidate(model, node, view);
    if (candidate) out.push(candidate);
  }
  return out;
}

function collectWaiting(model: OutlineModel, request: ViewRequest): Candidate[] {
  const out: Candidate[] = [];
  for (const node of model.nodes) {
    const waiting = node.annotations.waiting;
    if (!waiting || node.kind === 'section' || node.resolved.done) continue;
    if (!contextsAllowed(node.resolved.contexts, request, false)) continue;
    const entry = baseEntry(model, node, 'waiting', 'waiting');
    if (waiting.description) entry.waitingFor = waiting.description;
    out.push({ entry, sortAt: node.resolved.due });
  }
  return out;
}

function collectReminders(model: OutlineModel, request: ViewRequest): Candidate[] {
  const out: Candidate[] = [];
  for (const node of model.nodes) {
    const remind = node.annotations.remind;
    if (!remind || remind > model.now || node.resolved.done) continue;
    if (!contextsAllowed(node.resolved.contexts, request, false)) continue;
    const entry = baseEntry(model, node, 'reminders', 'due');
    entry.label = spanLabel('Reminder', remind, model.now);
    out.push({ entry, sortAt: node.resolved.due });
  }
  return out;
}

function compareCandidates(a: Candidate, b: Candidate): number {
  if (a.sortAt && b.sortAt) {
    const diff = a.sortAt.toMillis() - b.sortAt.toMillis();
    if (diff !== 0) return diff;
  } else if (a.sortAt) {
    return -1;
  } else if (b.sortAt) {
    return 1;
  }
  if (a.entry.priority !== b.entry.priority) return b.entry.priority - a.entry.priority;
  return a.entry.nodeId - b.entry.nodeId;
}

function collect(model: OutlineModel, request: ViewRequest): Candidate[] {
  switch (request.kind) {
    case 'next':
      return collectNext(model, request);
    case 'inboxes':
      return collectRecurring(model, request, 'inboxes');
    case 'recurring':
      return collectRecurring(model, request, 'recurring');
    case 'waiting':
      return collectWaiting(model, request);
    case 'reminders':
      return collectReminders(model, request);
    case 'all': {
      const seen = new Set<number>();
      const out: Candidate[] = [];
      const parts = [
        collectNext(model, request),
        collectRecurring(model, request, 'inboxes'),
        collectRecurring(model, request, 'recurring'),
      ];
      for (const candidate of parts.flat()) {
        if (seen.has(candidate.entry.nodeId)) continue;
        seen.add(candidate.entry.nodeId);
        out.push(candidate);
      }
      return out;
    }
  }
}

/**
 * Render one view of a resolved model as ordered entries.
 */
export function renderView(model: OutlineModel, request: ViewRequest): ViewEntry[] {
  return collect(model, request)
    .sort(compareCandidates)
    .map((candidate) => candidate.entry);
}

/**
 * Plain-text rendering: one `- text (label) <<file:line>>` line per entry.
 */
export function formatView(entries: ViewEntry[]): string {
  return entries
    .map((entry) => {
      const label = entry.label ? ` (${entry.label})` : '';
      return `- ${entry.displayText}${label} <<${entry.location.fileId}:${entry.location.lineNumber}>>`;
    })
    .join('\n');
}

export function isViewKind(value: string): value is ViewKind {
  return VIEW_KINDS.some((kind) => kind === value);
}

export type OutlineTreeViewNode = {
  id: number;
  kind: OutlineNode['kind'];
  /** 1-based line number. */
  line: number;
  text: string;
  ordered?: boolean;
  priority: number;
  due?: string;
  visible?: string;
  contexts: string[];
  tags: string[];
  after: string[];
  waitingFor?: string;
  recurrence?: string;
  done: boolean;
  blocked: boolean;
  blockedReasons: string[];
  hasNextAction?: boolean;
  notes?: string[];
  children: OutlineTreeViewNode[];
};

function toTreeViewNode(node: OutlineNode, options: { includeNotes: boolean }): OutlineTreeViewNode {
  const { annotations, resolved } = node;
  const out: OutlineTreeViewNode = {
    id: node.id,
    kind: node.kind,
    line: node.line + 1,
    text: node.text,
    priority: resolved.priority,
    contexts: resolved.contexts,
    tags: annotations.tags,
    after: annotations.after,
    done: resolved.done,
    blocked: resolved.blocked,
    blockedReasons: resolved.blockedReasons,
    children: [],
  };
  if (node.kind === 'project') {
    out.ordered = node.ordered;
    out.hasNextAction = node.hasNextAction;
  }
  if (resolved.due) out.due = formatStamp(resolved.due);
  if (resolved.visible) out.visible = formatStamp(resolved.visible);
  if (annotations.waiting) out.waitingFor = annotations.waiting.description ?? '';
  if (annotations.recurrence) out.recurrence = annotations.recurrence.source;
  if (options.includeNotes && node.notes.length > 0) out.notes = node.notes;
  return out;
}

/**
 * Convert a resolved model into a stable, minimal output shape for `outline.get`.
 *
 * Uses an explicit stack to avoid recursion depth issues on deep outlines.
 */
export function buildOutlineTreeView(
  model: OutlineModel,
  options: { includeNotes: boolean }
): OutlineTreeViewNode[] {
  const out: OutlineTreeViewNode[] = [];
  const stack: { node: OutlineNode; outArray: OutlineTreeViewNode[] }[] = [];

  for (let index = model.sections.length - 1; index >= 0; index -= 1) {
    const section = model.sections[index];
    if (section) stack.push({ node: section, outArray: out });
  }

  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) continue;

    const viewNode = toTreeViewNode(frame.node, options);
    frame.outArray.push(viewNode);

    const children = childrenOf(frame.node);
    for (let index = children.length - 1; index >= 0; index -= 1) {
      const child = children[index];
      if (child) stack.push({ node: child, outArray: viewNode.children });
    }
  }

  return out;
}
