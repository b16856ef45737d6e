import type { Diagnostic } from './diagnostics.js';
import { warningDiagnostic } from './diagnostics.js';
import type { BlockedReason, OutlineNode, ProjectNode, SectionNode } from './model.js';
import { childrenOf, isRecurring } from './model.js';

/**
 * Tag-based dependency resolution and blocking.
 *
 * 1. Collect `#tag` definitions (later definitions win).
 * 2. Resolve every `@after:` reference against the full map, so references
 *    may point forward in the document.
 * 3. Detect reference cycles.
 * 4. Propagate blocking down the tree and apply ordered-project sequencing.
 * 5. Bottom-up, flag projects that have no eligible next action.
 *
 * Reads `resolved.done`, so attributes must be resolved first.
 */
export interface DependencyResult {
  tags: Map<string, OutlineNode>;
  waitsOn: Map<number, string[]>;
  diagnostics: Diagnostic[];
}

/** Reasons that also block everything underneath the node. */
const INHERITED_REASONS: ReadonlySet<BlockedReason> = new Set([
  'dependency',
  'unresolved-dependency',
  'cyclic-dependency',
  'ancestor',
  'sequence',
]);

function describe(node: OutlineNode): string {
  return node.text ? JSON.stringify(node.text) : `line ${node.line + 1}`;
}

function addReason(node: OutlineNode, reason: BlockedReason): void {
  if (!node.resolved.blockedReasons.includes(reason)) node.resolved.blockedReasons.push(reason);
  node.resolved.blocked = true;
}

function collectTags(nodes: OutlineNode[], diagnostics: Diagnostic[]): Map<string, OutlineNode> {
  const tags = new Map<string, OutlineNode>();
  for (const node of nodes) {
    for (const tag of node.annotations.tags) {
      const earlier = tags.get(tag);
      if (earlier) {
        diagnostics.push(
          warningDiagnostic(
            'DUPLICATE_TAG_DEFINITION',
            `Tag #${tag} is defined again on line ${node.line + 1}; this definition is ignored`,
            earlier.line
          )
        );
      }
      tags.set(tag, node);
    }
  }
  return tags;
}

/**
 * Find reference cycles with a depth-first walk over node -> definer edges.
 *
 * Returns each cycle once, as node ids in walk order.
 */
export function findCycles(edges: Map<number, number[]>): number[][] {
  const state = new Map<number, 'active' | 'finished'>();
  const path: number[] = [];
  const cycles: number[][] = [];
  const seen = new Set<string>();

  function visit(id: number): void {
    state.set(id, 'active');
    path.push(id);
    for (const next of edges.get(id) ?? []) {
      const nextState = state.get(next);
      if (nextState === 'active') {
        const cycle = path.slice(path.indexOf(next));
        const key = [...cycle].sort((a, b) => a - b).join(',');
        if (!seen.has(key)) {
          seen.add(key);
          cycles.push(cycle);
        }
      } else if (nextState === undefined) {
        visit(next);
      }
    }
    path.pop();
    state.set(id, 'finished');
  }

  for (const id of edges.keys()) {
    if (!state.has(id)) visit(id);
  }
  return cycles;
}

function applyInheritedBlocking(sections: SectionNode[]): void {
  const stack: OutlineNode[] = [...sections].reverse();
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) continue;

    const children = childrenOf(node);
    const inherited = node.resolved.blockedReasons.some((reason) => INHERITED_REASONS.has(reason));
    let frontIndex = -1;
    if (node.kind === 'project' && node.ordered) {
      frontIndex = children.findIndex((child) => !child.resolved.done && !isRecurring(child));
    }

    children.forEach((child, index) => {
      if (inherited) addReason(child, 'ancestor');
      if (frontIndex !== -1 && index > frontIndex && !child.resolved.done && !isRecurring(child)) {
        addReason(child, 'sequence');
      }
    });

    for (let index = children.length - 1; index >= 0; index -= 1) {
      const child = children[index];
      if (child) stack.push(child);
    }
  }
}

function isEligibleAction(node: OutlineNode): boolean {
  return (
    node.kind === 'action' &&
    !node.resolved.done &&
    node.annotations.waiting === undefined &&
    node.resolved.blockedReasons.length === 0
  );
}

function markNextActions(nodes: OutlineNode[], diagnostics: Diagnostic[]): void {
  // Children always have larger ids than their parent, so walking backwards is post-order enough.
  const projects = nodes.filter((node): node is ProjectNode => node.kind === 'project').reverse();
  const found: Diagnostic[] = [];
  for (const project of projects) {
    project.hasNextAction = project.children.some(
      (child) => isEligibleAction(child) || (child.kind === 'project' && child.hasNextAction)
    );
    if (project.hasNextAction || project.resolved.done) continue;
    if (project.annotations.waiting !== undefined) continue;
    if (project.resolved.blocked) continue;

    addReason(project, 'no-next-action');
    found.push(
      warningDiagnostic('MISSING_NEXT_ACTION', `Project ${describe(project)} has no next action`, project.line)
    );
  }
  diagnostics.push(...found.reverse());
}

export function resolveDependencies(sections: SectionNode[], nodes: OutlineNode[]): DependencyResult {
  const diagnostics: Diagnostic[] = [];
  const tags = collectTags(nodes, diagnostics);
  const waitsOn = new Map<number, string[]>();
  const edges = new Map<number, number[]>();

  for (const node of nodes) {
    const refs = node.annotations.after;
    if (refs.length === 0) continue;
    waitsOn.set(node.id, [...refs]);

    const targets: number[] = [];
    for (const ref of refs) {
      const definer = tags.get(ref);
      if (!definer) {
        addReason(node, 'unresolved-dependency');
        diagnostics.push(
          warningDiagnostic('UNRESOLVED_DEPENDENCY', `No node defines #${ref} (referenced by @after:${ref})`, node.line)
        );
        continue;
      }
      targets.push(definer.id);
      if (!definer.resolved.done) addReason(node, 'dependency');
    }
    edges.set(node.id, targets);
  }

  for (const cycle of findCycles(edges)) {
    const members = cycle.map((id) => nodes[id]).filter((node): node is OutlineNode => node !== undefined);
    for (const member of members) addReason(member, 'cyclic-dependency');
    const first = members[0];
    diagnostics.push(
      warningDiagnostic(
        'CYCLIC_DEPENDENCY',
        `Dependency cycle: ${members.map((member) => `line ${member.line + 1}`).join(' -> ')}`,
        first?.line
      )
    );
  }

  applyInheritedBlocking(sections);
  markNextActions(nodes, diagnostics);

  return { tags, waitsOn, diagnostics };
}
