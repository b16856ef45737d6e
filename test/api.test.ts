import test from 'node:test';
import assert from 'node:assert/strict';
import path from 'node:path';
import os from 'node:os';
import { promises as fs } from 'node:fs';

import type { OutlineConfig } from '../src/config.js';
import { loadConfigFromArgs } from '../src/config.js';
import {
  completeOutlineLine,
  getOutline,
  listOutlines,
  loadOutline,
  renderOutlineView,
  validateOutlineDoc,
} from '../src/outline/api.js';

const NOW = '2013-08-24 12:00';

const HOME = [
  '= Home =',
  '- Garden',
  '  @ Weed beds @@outside <2013-08-25',
  '  @ Buy seeds @@town',
  '- Shed @after:garden-done',
  '  @ Fix door',
  '@ Empty inbox @@inbox EVERY day (LASTDONE 2013-08-23 09:00)',
  '',
].join('\n');

async function makeRoot(): Promise<OutlineConfig> {
  const rootDir = await fs.mkdtemp(path.join(os.tmpdir(), 'sigil-gtd-api-'));
  await fs.writeFile(path.join(rootDir, 'home.gtd'), HOME, 'utf8');
  await fs.mkdir(path.join(rootDir, 'notes'));
  await fs.writeFile(path.join(rootDir, 'notes', 'other.txt'), '= Reading =\n@ Read book\n', 'utf8');
  await fs.mkdir(path.join(rootDir, '.hidden'));
  await fs.writeFile(path.join(rootDir, '.hidden', 'skip.gtd'), '= Hidden =\n', 'utf8');
  await fs.writeFile(path.join(rootDir, 'contexts.ctx'), '# not in town today\n-town\n', 'utf8');
  return { rootDir, inboxContext: 'inbox', zone: 'UTC' };
}

test('listOutlines finds outline files and counts their nodes', async () => {
  const config = await makeRoot();
  const outlines = await listOutlines(config, { now: NOW });
  assert.deepEqual(
    outlines.map((outline) => [outline.path, outline.title, outline.warnings]),
    [
      ['home.gtd', 'Home', 1],
      ['notes/other.txt', 'Reading', 0],
    ]
  );
  assert.deepEqual(outlines[0]?.stats, { projects: 2, actions: 4, open: 6, done: 0, blocked: 2, recurring: 1 });

  const filtered = await listOutlines(config, { query: 'read', now: NOW });
  assert.deepEqual(
    filtered.map((outline) => outline.path),
    ['notes/other.txt']
  );
});

test('getOutline returns the resolved tree with 1-based warnings', async () => {
  const config = await makeRoot();
  const { outline, warnings, etag } = await getOutline(config, { path: 'home.gtd', now: NOW });
  assert.equal(outline.title, 'Home');
  assert.equal(outline.sections[0]?.children.length, 3);
  assert.deepEqual(warnings, [
    { code: 'UNRESOLVED_DEPENDENCY', message: 'No node defines #garden-done (referenced by @after:garden-done)', line: 5 },
  ]);
  assert.match(etag, /^[0-9a-f]{64}$/);
});

test('loadOutline reuses the model while the file is unchanged', async () => {
  const config = await makeRoot();
  const first = await loadOutline(config, { path: 'home.gtd', now: NOW });
  const second = await loadOutline(config, { path: 'home.gtd', now: NOW });
  assert.equal(second.model, first.model);

  await fs.appendFile(path.join(config.rootDir, 'home.gtd'), '@ Sweep porch\n', 'utf8');
  const third = await loadOutline(config, { path: 'home.gtd', now: NOW });
  assert.notEqual(third.model, first.model);
  assert.equal(third.model.nodes.length, first.model.nodes.length + 1);
});

test('renderOutlineView applies explicit lists or the contexts file', async () => {
  const config = await makeRoot();
  const all = await renderOutlineView(config, { path: 'home.gtd', kind: 'next', now: NOW });
  assert.equal(all.text, '- Weed beds (Due 1 day) <<home.gtd:3>>\n- Buy seeds <<home.gtd:4>>');

  const filtered = await renderOutlineView(config, {
    path: 'home.gtd',
    kind: 'next',
    now: NOW,
    contextsFile: 'contexts.ctx',
  });
  assert.deepEqual(
    filtered.entries.map((entry) => entry.displayText),
    ['Weed beds']
  );

  const explicit = await renderOutlineView(
    { ...config, contextsFile: 'contexts.ctx' },
    { path: 'home.gtd', kind: 'next', now: NOW, include: ['town'] }
  );
  assert.deepEqual(
    explicit.entries.map((entry) => entry.displayText),
    ['Buy seeds']
  );
});

test('completeOutlineLine writes the stamp and honours ifMatch and dryRun', async () => {
  const config = await makeRoot();
  const file = path.join(config.rootDir, 'home.gtd');
  const { etag } = await getOutline(config, { path: 'home.gtd', now: NOW });

  await assert.rejects(
    completeOutlineLine(config, { path: 'home.gtd', line: 4, now: NOW, ifMatch: 'stale' }),
    /CONFLICT: etag mismatch/
  );

  const dry = await completeOutlineLine(config, { path: 'home.gtd', line: 4, now: NOW, dryRun: true });
  assert.equal(dry.changed, true);
  assert.equal(await fs.readFile(file, 'utf8'), HOME);

  const done = await completeOutlineLine(config, { path: 'home.gtd', line: 4, now: NOW, ifMatch: etag });
  assert.deepEqual(done, {
    changed: true,
    line: 4,
    lineText: '  @ Buy seeds @@town (DONE 2013-08-24 12:00)',
    etag: dry.etag,
  });
  const written = await fs.readFile(file, 'utf8');
  assert.equal(written.split('\n')[3], '  @ Buy seeds @@town (DONE 2013-08-24 12:00)');

  const again = await completeOutlineLine(config, { path: 'home.gtd', line: 4, now: NOW });
  assert.deepEqual(again, { changed: false, reason: 'already-done', etag: dry.etag });

  await assert.rejects(
    completeOutlineLine(config, { path: 'home.gtd', line: 1, now: NOW }),
    /Line 1 is not a project or action/
  );
});

test('validateOutlineDoc reports warnings with 1-based lines', async () => {
  const config = await makeRoot();
  await fs.writeFile(path.join(config.rootDir, 'bad.gtd'), '= S =\n@ Fix <2013-02-30\n', 'utf8');
  const result = await validateOutlineDoc(config, { path: 'bad.gtd', now: NOW });
  assert.deepEqual(result, {
    errors: [],
    warnings: [{ code: 'MALFORMED_DATE', message: 'Invalid date "<2013-02-30"', line: 2 }],
  });
});

test('paths may not escape the root directory', async () => {
  const config = await makeRoot();
  await assert.rejects(getOutline(config, { path: '../outside.gtd' }), /escapes rootDir/);
});

test('loadConfigFromArgs reads server flags', () => {
  assert.deepEqual(loadConfigFromArgs(['--root', 'plans', '--contexts', 'ctx.txt', '--zone', 'UTC'], '/work'), {
    rootDir: path.resolve('/work', 'plans'),
    inboxContext: 'inbox',
    contextsFile: 'ctx.txt',
    zone: 'UTC',
  });
  assert.throws(() => loadConfigFromArgs(['--plans', 'x'], '/work'), /Unknown argument: --plans/);
});
