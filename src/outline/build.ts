import type { TextSegment } from './annotate.js';
import type { Diagnostic } from './diagnostics.js';
import { warningDiagnostic } from './diagnostics.js';
import type { LineToken } from './lex.js';
import type {
  ActionNode,
  ContainerNode,
  OutlineNode,
  ProjectNode,
  ResolvedAttributes,
  SectionNode,
} from './model.js';

/**
 * Outline tree builder.
 *
 * Nesting rule:
 * - Sections are always top level and close everything that is open.
 * - A project or action header has level `1 + indent` and nests under the most
 *   recent open container (section or project) with a lower level.
 * - Actions are leaves; they never open a scope.
 * - Headers before the first section land in an implicit, untitled section.
 *
 * Continuation and `*` note lines belong to the most recent header.
 */
export interface BuildResult {
  sections: SectionNode[];
  /** Every node in document order; `nodes[i].id === i`. */
  nodes: OutlineNode[];
  /** Header text first, then continuation/note lines, per node id. */
  segments: Map<number, TextSegment[]>;
  diagnostics: Diagnostic[];
}

interface OpenFrame {
  node: ContainerNode;
  level: number;
}

function emptyResolved(): ResolvedAttributes {
  return { priority: 0, contexts: [], done: false, blocked: false, blockedReasons: [] };
}

type BaseFields = Omit<ActionNode, 'kind'>;
type SectionToken = Extract<LineToken, { kind: 'section' }>;
type ChildToken = Extract<LineToken, { kind: 'project' | 'action' }>;

function baseFields(id: number, line: number, indent: number, body: string, raw: string): BaseFields {
  return {
    id,
    line,
    endLine: line,
    indent,
    text: body,
    raw,
    notes: [],
    annotations: { contexts: [], tags: [], after: [] },
    resolved: emptyResolved(),
  };
}

function createSection(id: number, token: SectionToken): SectionNode {
  return {
    ...baseFields(id, token.line, token.indent, token.body, token.raw),
    kind: 'section',
    level: token.level,
    children: [],
  };
}

function createImplicitSection(id: number, line: number): SectionNode {
  return { ...baseFields(id, line, 0, '', ''), kind: 'section', level: 0, children: [] };
}

function createChild(id: number, token: ChildToken): ProjectNode | ActionNode {
  const base = baseFields(id, token.line, token.indent, token.body, token.raw);
  if (token.kind === 'project') {
    return { ...base, kind: 'project', ordered: token.ordered, hasNextAction: false, children: [] };
  }
  return { ...base, kind: 'action' };
}

export function buildOutline(tokens: LineToken[]): BuildResult {
  const sections: SectionNode[] = [];
  const nodes: OutlineNode[] = [];
  const segments = new Map<number, TextSegment[]>();
  const diagnostics: Diagnostic[] = [];

  let section: SectionNode | undefined;
  let open: OpenFrame[] = [];
  let innermost: OutlineNode | undefined;

  function register(node: OutlineNode, header: TextSegment | undefined): void {
    nodes.push(node);
    segments.set(node.id, header ? [header] : []);
  }

  for (const token of tokens) {
    if (token.kind === 'blank') continue;

    if (token.kind === 'section') {
      section = createSection(nodes.length, token);
      register(section, { text: token.body, line: token.line, literal: false });
      sections.push(section);
      open = [];
      innermost = section;
      continue;
    }

    if (token.kind === 'project' || token.kind === 'action') {
      if (!section) {
        section = createImplicitSection(nodes.length, token.line);
        register(section, undefined);
        sections.push(section);
      }

      const level = 1 + token.indent;
      while (open.length > 0) {
        const top = open[open.length - 1];
        if (!top || top.level < level) break;
        open.pop();
      }
      const parent: ContainerNode = open[open.length - 1]?.node ?? section;

      const node = createChild(nodes.length, token);
      node.parentId = parent.id;
      parent.children.push(node);
      register(node, { text: token.body, line: token.line, literal: false });
      if (node.kind === 'project') open.push({ node, level });
      innermost = node;
      continue;
    }

    if (!innermost) {
      diagnostics.push(
        warningDiagnostic('ORPHAN_TEXT', 'Text before the first section, project or action is ignored', token.line)
      );
      continue;
    }
    segments.get(innermost.id)?.push({ text: token.body, line: token.line, literal: token.kind === 'note' });
  }

  // Children always come after their parent, so one backwards pass settles every block end.
  for (let index = nodes.length - 1; index >= 0; index -= 1) {
    const node = nodes[index];
    if (!node) continue;
    for (const segment of segments.get(node.id) ?? []) {
      node.endLine = Math.max(node.endLine, segment.line);
    }
    const parent = node.parentId !== undefined ? nodes[node.parentId] : undefined;
    if (parent) parent.endLine = Math.max(parent.endLine, node.endLine);
  }

  return { sections, nodes, segments, diagnostics };
}
