import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import * as z from 'zod';
import type { OutlineConfig } from './config.js';
import {
  completeOutlineLine,
  getOutline,
  listOutlines,
  renderOutlineView,
  validateOutlineDoc,
} from './outline/api.js';

const NOW_DESCRIPTION = 'Current time as "YYYY-MM-DD HH:MM" or ISO 8601 (default: now)';

const diagnosticSchema = z.object({
  code: z.string(),
  message: z.string(),
  line: z.number().optional(),
});

const statsSchema = z.object({
  projects: z.number(),
  actions: z.number(),
  open: z.number(),
  done: z.number(),
  blocked: z.number(),
  recurring: z.number(),
});

const viewEntrySchema = z.object({
  nodeId: z.number(),
  view: z.string(),
  displayText: z.string(),
  location: z.object({ fileId: z.string(), lineNumber: z.number() }),
  status: z.string(),
  label: z.string().optional(),
  priority: z.number(),
  contexts: z.array(z.string()),
  project: z.string().optional(),
  due: z.string().optional(),
  waitingFor: z.string().optional(),
  window: z
    .object({ earliest: z.string().optional(), latest: z.string().optional(), next: z.string().optional() })
    .optional(),
});

/**
 * Create an MCP server instance and register all tools.
 *
 * Tool naming convention:
 * - `outline.*` reads outline files (list/get).
 * - `view.*` renders filtered task views.
 * - `action.*` edits projects and actions.
 * - `doc.*` validates raw documents.
 */
export function createMcpServer(config: OutlineConfig): McpServer {
  const server = new McpServer({ name: 'sigil-gtd-mcp', version: '0.1.0' });

  server.registerTool(
    'outline.list',
    {
      title: 'List outline files',
      description: 'List outline files under the root directory with task counts.',
      inputSchema: {
        query: z.string().optional(),
      },
      outputSchema: {
        outlines: z.array(
          z.object({
            path: z.string(),
            title: z.string(),
            stats: statsSchema,
            warnings: z.number(),
          })
        ),
      },
    },
    async ({ query }) => {
      const outlines = await listOutlines(config, { query });
      return {
        content: [{ type: 'text', text: JSON.stringify({ outlines }, null, 2) }],
        structuredContent: { outlines },
      };
    }
  );

  server.registerTool(
    'outline.get',
    {
      title: 'Get an outline',
      description:
        'Parse an outline file and return its resolved tree (priority, dates, contexts, blocking, recurrence) plus warnings.',
      inputSchema: {
        path: z.string(),
        now: z.string().optional().describe(NOW_DESCRIPTION),
        includeNotes: z.boolean().optional(),
      },
      outputSchema: {
        outline: z.any(),
        warnings: z.array(diagnosticSchema),
        etag: z.string(),
      },
    },
    async ({ path, now, includeNotes }) => {
      const { outline, warnings, etag } = await getOutline(config, { path, now, includeNotes });
      return {
        content: [{ type: 'text', text: JSON.stringify({ outline, warnings, etag }, null, 2) }],
        structuredContent: { outline, warnings, etag },
      };
    }
  );

  server.registerTool(
    'view.render',
    {
      title: 'Render a view',
      description:
        'Render a filtered view of an outline: next actions, inboxes, recurring, waiting, reminders, or all. Context lists override the configured contexts file.',
      inputSchema: {
        path: z.string(),
        kind: z.enum(['next', 'inboxes', 'recurring', 'waiting', 'reminders', 'all']).optional(),
        include: z.array(z.string()).optional(),
        exclude: z.array(z.string()).optional(),
        includeUncontexted: z.boolean().optional(),
        contextsFile: z.string().optional(),
        now: z.string().optional().describe(NOW_DESCRIPTION),
      },
      outputSchema: {
        entries: z.array(viewEntrySchema),
        text: z.string(),
        etag: z.string(),
      },
    },
    async ({ path, kind, include, exclude, includeUncontexted, contextsFile, now }) => {
      const { entries, text, etag } = await renderOutlineView(config, {
        path,
        kind: kind ?? 'next',
        include,
        exclude,
        includeUncontexted,
        contextsFile,
        now,
      });
      return {
        content: [{ type: 'text', text: text || '(no entries)' }],
        structuredContent: { entries, text, etag },
      };
    }
  );

  server.registerTool(
    'action.complete',
    {
      title: 'Complete a project or action',
      description:
        'Mark the node at a 1-based line complete: appends (DONE now), or updates (LASTDONE now) for recurring actions. Completing twice is a no-op.',
      inputSchema: {
        path: z.string(),
        line: z.number().int().positive(),
        now: z.string().optional().describe(NOW_DESCRIPTION),
        dryRun: z.boolean().optional(),
        ifMatch: z.string().optional(),
      },
      outputSchema: {
        changed: z.boolean(),
        line: z.number().optional(),
        lineText: z.string().optional(),
        reason: z.enum(['already-done', 'not-a-task']).optional(),
        etag: z.string(),
      },
    },
    async ({ path, line, now, dryRun, ifMatch }) => {
      const result = await completeOutlineLine(config, { path, line, now, dryRun, ifMatch });
      return {
        content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
        structuredContent: { ...result },
      };
    }
  );

  server.registerTool(
    'doc.validate',
    {
      title: 'Validate an outline',
      description: 'Parse an outline file and report diagnostics with 1-based line numbers.',
      inputSchema: {
        path: z.string(),
        now: z.string().optional().describe(NOW_DESCRIPTION),
      },
      outputSchema: {
        errors: z.array(diagnosticSchema),
        warnings: z.array(diagnosticSchema),
      },
    },
    async ({ path, now }) => {
      const result = await validateOutlineDoc(config, { path, now });
      return {
        content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
        structuredContent: result,
      };
    }
  );

  return server;
}

/**
 * Connect the MCP server to stdio transport and start serving requests.
 *
 * This function does not return until the transport closes.
 */
export async function runStdioServer(config: OutlineConfig): Promise<void> {
  const server = createMcpServer(config);
  const transport = new StdioServerTransport();
  await server.connect(transport);
}
