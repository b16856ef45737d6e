import test from 'node:test';
import assert from 'node:assert/strict';

import { buildOutline } from '../src/outline/build.js';
import { lexOutline } from '../src/outline/lex.js';
import { parseOutline } from '../src/outline/parse.js';

const HOME = [
  'stray line',
  '@ loose action',
  '= Home =',
  '- Garden',
  '  @ Weed beds',
  '    more detail',
  '  - Shed',
  '    @ Fix door',
  '- Kitchen',
].join('\n');

test('buildOutline nests headers by indentation under the current section', () => {
  const { sections, nodes, diagnostics } = buildOutline(lexOutline(HOME).tokens);

  assert.equal(sections.length, 2);
  assert.equal(sections[0]?.level, 0);
  assert.equal(sections[0]?.children[0]?.text, 'loose action');

  assert.deepEqual(
    nodes.map((node) => [node.kind, node.parentId]),
    [
      ['section', undefined],
      ['action', 0],
      ['section', undefined],
      ['project', 2],
      ['action', 3],
      ['project', 3],
      ['action', 5],
      ['project', 2],
    ]
  );

  assert.equal(nodes[3]?.endLine, 7);
  assert.equal(nodes[2]?.endLine, 8);
  assert.deepEqual(diagnostics, [
    {
      severity: 'warning',
      code: 'ORPHAN_TEXT',
      message: 'Text before the first section, project or action is ignored',
      line: 0,
    },
  ]);
});

test('continuation lines become notes of the node above them', () => {
  const { model } = parseOutline(HOME, { zone: 'UTC' });
  assert.deepEqual(model.nodes[4]?.notes, ['more detail']);
  assert.equal(model.nodes[4]?.endLine, 5);
});

test('actions never contain other nodes', () => {
  const { model } = parseOutline('= S =\n@ parent action\n  @ indented action\n', { zone: 'UTC' });
  assert.equal(model.nodes[2]?.parentId, 0);
});

test('star lines are kept verbatim as project support notes', () => {
  const { model } = parseOutline('= S =\n- Trip\n  * bring @@camera <2013-08-25\n  @ Pack\n', { zone: 'UTC' });
  const trip = model.nodes[1];
  assert.deepEqual(trip?.notes, ['bring @@camera <2013-08-25']);
  assert.deepEqual(trip?.annotations.contexts, []);
  assert.equal(trip?.annotations.due, undefined);
});

test('an empty document yields a single warning', () => {
  const { model, warnings } = parseOutline('  \n\n', { zone: 'UTC' });
  assert.deepEqual(model.nodes, []);
  assert.deepEqual(warnings, [{ severity: 'warning', code: 'EMPTY_DOCUMENT', message: 'Outline is empty', line: undefined }]);
});
