import test from 'node:test';
import assert from 'node:assert/strict';
import path from 'node:path';
import os from 'node:os';
import { promises as fs } from 'node:fs';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import * as z from 'zod';

import type { OutlineConfig } from '../src/config.js';
import { createMcpServer } from '../src/server.js';

const NOW = '2013-08-24 12:00';

const ERRANDS = [
  '= Errands =',
  '@ Buy stamps @@town <2013-08-23',
  '@ Call plumber @@phone @p:2',
  '- Garage',
  '  @ Sort boxes',
  '',
].join('\n');

async function withClient(run: (client: Client, config: OutlineConfig) => Promise<void>): Promise<void> {
  const rootDir = await fs.mkdtemp(path.join(os.tmpdir(), 'sigil-gtd-mcp-'));
  await fs.writeFile(path.join(rootDir, 'errands.gtd'), ERRANDS, 'utf8');
  const config: OutlineConfig = { rootDir, inboxContext: 'inbox', zone: 'UTC' };

  const server = createMcpServer(config);
  const client = new Client({ name: 'sigil-gtd-test', version: '0.0.0' });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  try {
    await run(client, config);
  } finally {
    await client.close();
    await server.close();
  }
}

const callResultSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
  structuredContent: z.record(z.unknown()).optional(),
  isError: z.boolean().optional(),
});

async function callTool(client: Client, name: string, args: Record<string, unknown>) {
  return callResultSchema.parse(await client.callTool({ name, arguments: args }));
}

test('every tool is registered', async () => {
  await withClient(async (client) => {
    const { tools } = await client.listTools();
    assert.deepEqual(tools.map((tool) => tool.name).sort(), [
      'action.complete',
      'doc.validate',
      'outline.get',
      'outline.list',
      'view.render',
    ]);
  });
});

test('outline.list and outline.get return structured outlines', async () => {
  await withClient(async (client) => {
    const list = await callTool(client, 'outline.list', {});
    assert.deepEqual(list.structuredContent, {
      outlines: [
        {
          path: 'errands.gtd',
          title: 'Errands',
          stats: { projects: 1, actions: 3, open: 4, done: 0, blocked: 0, recurring: 0 },
          warnings: 0,
        },
      ],
    });

    const got = await callTool(client, 'outline.get', { path: 'errands.gtd', now: NOW });
    const { outline, warnings, etag } = z
      .object({ outline: z.object({ title: z.string() }), warnings: z.array(z.unknown()), etag: z.string() })
      .parse(got.structuredContent);
    assert.equal(outline.title, 'Errands');
    assert.deepEqual(warnings, []);
    assert.match(etag, /^[0-9a-f]{64}$/);
  });
});

test('view.render returns entries and the plain-text list', async () => {
  await withClient(async (client) => {
    const result = await callTool(client, 'view.render', { path: 'errands.gtd', now: NOW });
    const text = [
      '- Buy stamps (Overdue 12 hours) <<errands.gtd:2>>',
      '- Call plumber <<errands.gtd:3>>',
      '- Sort boxes <<errands.gtd:5>>',
    ].join('\n');
    assert.equal(result.content[0]?.text, text);
    const { entries } = z
      .object({ entries: z.array(z.object({ displayText: z.string(), view: z.string() })), text: z.string() })
      .parse(result.structuredContent);
    assert.deepEqual(
      entries.map((entry) => [entry.displayText, entry.view]),
      [
        ['Buy stamps', 'next'],
        ['Call plumber', 'next'],
        ['Sort boxes', 'next'],
      ]
    );

    const empty = await callTool(client, 'view.render', { path: 'errands.gtd', kind: 'waiting', now: NOW });
    assert.equal(empty.content[0]?.text, '(no entries)');
  });
});

test('action.complete stamps the file and doc.validate reports diagnostics', async () => {
  await withClient(async (client, config) => {
    const done = await callTool(client, 'action.complete', { path: 'errands.gtd', line: 3, now: NOW });
    assert.equal(done.structuredContent?.changed, true);
    assert.equal(done.structuredContent?.line, 3);
    assert.equal(done.structuredContent?.lineText, '@ Call plumber @@phone @p:2 (DONE 2013-08-24 12:00)');
    const text = await fs.readFile(path.join(config.rootDir, 'errands.gtd'), 'utf8');
    assert.equal(text.split('\n')[2], '@ Call plumber @@phone @p:2 (DONE 2013-08-24 12:00)');

    const again = await callTool(client, 'action.complete', { path: 'errands.gtd', line: 3, now: NOW });
    assert.equal(again.structuredContent?.changed, false);
    assert.equal(again.structuredContent?.reason, 'already-done');

    const section = await callTool(client, 'action.complete', { path: 'errands.gtd', line: 1, now: NOW });
    assert.equal(section.isError, true);

    const validated = await callTool(client, 'doc.validate', { path: 'errands.gtd', now: NOW });
    assert.deepEqual(validated.structuredContent, { errors: [], warnings: [] });
  });
});
