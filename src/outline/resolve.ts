import type { DateTime } from 'luxon';
import { latestOf } from './dates.js';
import type { OutlineNode, ResolvedAttributes, SectionNode } from './model.js';
import { childrenOf } from './model.js';

/**
 * Top-down attribute inheritance.
 *
 * - priority: own value overrides the parent's; root default 0.
 * - due: the earlier of own and parent's (absent values ignored).
 * - visible: the later of own and parent's (absent means visible now).
 * - contexts: parent's followed by own, de-duplicated.
 * - done: own DONE/WONTDO stamp, or any done ancestor.
 *
 * Uses an explicit stack to avoid recursion depth issues on deep outlines.
 */
interface Inherited {
  priority: number;
  due?: DateTime;
  leadDays?: number;
  visible?: DateTime;
  contexts: string[];
  done: boolean;
}

const ROOT: Inherited = { priority: 0, contexts: [], done: false };

export function resolveNode(node: OutlineNode, parent: Inherited): ResolvedAttributes {
  const own = node.annotations;
  const resolved: ResolvedAttributes = {
    priority: own.priority ?? parent.priority,
    contexts: [...parent.contexts],
    done: parent.done || own.completed !== undefined,
    blocked: false,
    blockedReasons: [],
  };

  if (own.due && (!parent.due || own.due.at <= parent.due)) {
    resolved.due = own.due.at;
    if (own.due.leadDays !== undefined) resolved.leadDays = own.due.leadDays;
  } else if (parent.due) {
    resolved.due = parent.due;
    if (parent.leadDays !== undefined) resolved.leadDays = parent.leadDays;
  }

  const visible = latestOf(own.visible, parent.visible);
  if (visible) resolved.visible = visible;

  for (const context of own.contexts) {
    if (!resolved.contexts.includes(context)) resolved.contexts.push(context);
  }
  return resolved;
}

export function resolveAttributes(sections: SectionNode[]): void {
  const stack: { node: OutlineNode; parent: Inherited }[] = [];
  for (let index = sections.length - 1; index >= 0; index -= 1) {
    const section = sections[index];
    if (section) stack.push({ node: section, parent: ROOT });
  }

  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) continue;

    const node = frame.node;
    node.resolved = resolveNode(node, frame.parent);

    const children = childrenOf(node);
    for (let index = children.length - 1; index >= 0; index -= 1) {
      const child = children[index];
      if (child) stack.push({ node: child, parent: node.resolved });
    }
  }
}
