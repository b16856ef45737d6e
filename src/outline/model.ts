import type { DateTime } from 'luxon';

/**
 * Parsed representation of a sigil-annotated outline document.
 *
 * Notes:
 * - Line numbers are 0-based to match typical array indexing in JS/TS.
 * - `indent` is measured in columns of leading whitespace (a tab counts as 4).
 * - Nodes reference their parent by id so models can be serialized as-is.
 */
export type NodeKind = 'section' | 'project' | 'action';

export type RecurrenceUnit = 'day' | 'week' | 'month' | 'year';

/**
 * `start`/`end` are minutes since the start of the period: the day for daily
 * windows, Monday 00:00 for weekly ones. `end < start` means the window wraps.
 */
export type RecurrenceWindow =
  | { kind: 'daily'; start: number; end: number }
  | { kind: 'weekly'; start: number; end: number };

export interface RecurrenceSpec {
  unit: RecurrenceUnit;
  /** Lower bound of the interval, in `unit`s. */
  min: number;
  /** Upper bound of the interval; equal to `min` for fixed specs. */
  max: number;
  window?: RecurrenceWindow;
  /** Source text of the spec, e.g. `EVERY 4-6 weeks [Thu 17:00 - Fri 07:00]`. */
  source: string;
}

export type CompletionKind = 'DONE' | 'WONTDO';

export interface Annotations {
  priority?: number;
  due?: { at: DateTime; leadDays?: number };
  visible?: DateTime;
  contexts: string[];
  tags: string[];
  after: string[];
  waiting?: { description?: string };
  recurrence?: RecurrenceSpec;
  completed?: { kind: CompletionKind; at: DateTime };
  lastDone?: { at: DateTime; line: number };
  remind?: DateTime;
}

export type BlockedReason =
  | 'dependency'
  | 'unresolved-dependency'
  | 'cyclic-dependency'
  | 'ancestor'
  | 'sequence'
  | 'no-next-action';

export type ScheduleStatus = 'upcoming' | 'due' | 'overdue';

export interface RecurrenceSchedule {
  /** Absent when the action has never been completed. */
  earliest?: DateTime;
  latest?: DateTime;
  /** First instant at or after `earliest` that falls inside the window. */
  next?: DateTime;
  overdueAt?: DateTime;
  isDueNow: boolean;
  status: ScheduleStatus;
}

export interface ResolvedAttributes {
  priority: number;
  due?: DateTime;
  /** Lead time (days) attached to whichever due date won the aggregation. */
  leadDays?: number;
  visible?: DateTime;
  contexts: string[];
  done: boolean;
  blocked: boolean;
  blockedReasons: BlockedReason[];
  schedule?: RecurrenceSchedule;
}

interface BaseNode {
  /** Document-order index, unique within one model. */
  id: number;
  /** 0-based line of the header. */
  line: number;
  /** Inclusive last line of the node's block (header, continuation, children). */
  endLine: number;
  indent: number;
  /** Header text with recognized annotations removed. */
  text: string;
  /** Header line exactly as written. */
  raw: string;
  /** Continuation lines, with annotations removed (empty ones dropped). */
  notes: string[];
  annotations: Annotations;
  parentId?: number;
  resolved: ResolvedAttributes;
}

export interface SectionNode extends BaseNode {
  kind: 'section';
  /** Number of `=` on each side of the title; 0 for the implicit leading section. */
  level: number;
  children: OutlineNode[];
}

export interface ProjectNode extends BaseNode {
  kind: 'project';
  ordered: boolean;
  hasNextAction: boolean;
  children: OutlineNode[];
}

export interface ActionNode extends BaseNode {
  kind: 'action';
}

export type OutlineNode = SectionNode | ProjectNode | ActionNode;
export type ContainerNode = SectionNode | ProjectNode;

export interface OutlineModel {
  /** Opaque host identifier for the source (usually a root-relative path). */
  fileId: string;
  /** The instant every time-dependent attribute was resolved against. */
  now: DateTime;
  sections: SectionNode[];
  /** Every node in document order; `nodes[i].id === i`. */
  nodes: OutlineNode[];
  /** Tag name to the node that defines it (later definitions win). */
  tags: Map<string, OutlineNode>;
  /** Node id to the tags it waits on. */
  waitsOn: Map<number, string[]>;
}

export function isRecurring(node: OutlineNode): boolean {
  return node.annotations.recurrence !== undefined;
}

/** Child nodes in document order; actions are leaves. */
export function childrenOf(node: OutlineNode): OutlineNode[] {
  return node.kind === 'action' ? [] : node.children;
}
