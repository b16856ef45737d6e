#!/usr/bin/env node

/**
 * `sigil-gtd` - local CLI for sigil-annotated outline files.
 *
 * Goes through the same file-level API as the MCP server. Tests import
 * `runCli`, so the module only runs when it is the entry script.
 */

import { resolve as resolvePath } from 'node:path';
import { fileURLToPath } from 'node:url';

import type { OutlineConfig } from './config.js';
import {
  completeOutlineLine,
  getOutline,
  listOutlines,
  renderOutlineView,
  resolveNow,
  validateOutlineDoc,
} from './outline/api.js';
import { DEFAULT_INBOX_CONTEXT } from './outline/constants.js';
import { parseContextList } from './outline/contexts.js';
import { completeLine } from './outline/edit.js';
import type { ViewKind } from './outline/view.js';
import { isViewKind, VIEW_KINDS } from './outline/view.js';

export interface CliIo {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
}

/** Render CLI help text. */
function helpText(defaultRoot: string): string {
  return [
    'sigil-gtd - outline task engine CLI',
    '',
    'Usage:',
    '  sigil-gtd [--root <dir>] [--zone <iana>] [--inbox-context <name>] <cmd>',
    '',
    'Outline:',
    '  sigil-gtd list [--query <text>] [--now <ts>]',
    '  sigil-gtd parse <file> [--notes] [--now <ts>]',
    `  sigil-gtd view <file> [--kind ${VIEW_KINDS.join('|')}] [--include a,b] [--exclude c,d] [--contexts <file>] [--uncontexted] [--now <ts>] [--text]`,
    '  sigil-gtd validate <file> [--now <ts>]',
    '',
    'Complete:',
    '  sigil-gtd complete <file> --line <n> [--now <ts>] [--dry-run] [--if-match <etag>]',
    '  sigil-gtd complete-line <text> [--now <ts>]',
    '',
    'Notes:',
    `  Defaults: --root=${defaultRoot} --inbox-context=${DEFAULT_INBOX_CONTEXT} --kind=next`,
    '  Paths are relative to --root; <ts> is "YYYY-MM-DD HH:MM" or ISO 8601.',
    '  Output: JSON to stdout (plain list with --text); errors to stderr.',
    '',
  ].join('\n');
}

function writeHelp(io: CliIo, defaultRoot: string): void {
  io.stdout.write(helpText(defaultRoot));
}

function writeJson(io: CliIo, value: unknown): void {
  io.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}

/**
 * Consume a boolean flag from argv.
 *
 * Returns true if the flag was present and removed.
 */
function takeFlag(argv: string[], flag: string): boolean {
  const index = argv.indexOf(flag);
  if (index === -1) return false;
  argv.splice(index, 1);
  return true;
}

/**
 * Consume a `--flag value` or `--flag=value` option from argv.
 *
 * Returns undefined when absent. Throws if present but missing a value.
 */
function takeOption(argv: string[], flag: string): string | undefined {
  const indexEq = argv.findIndex((arg) => arg.startsWith(`${flag}=`));
  if (indexEq !== -1) {
    const value = argv[indexEq]?.slice(flag.length + 1);
    argv.splice(indexEq, 1);
    if (!value) throw new Error(`Missing value for ${flag}`);
    return value;
  }

  const index = argv.indexOf(flag);
  if (index === -1) return undefined;
  const value = argv[index + 1];
  argv.splice(index, 2);
  if (!value || value.startsWith('--')) throw new Error(`Missing value for ${flag}`);
  return value;
}

/**
 * Ensure there are no remaining `--unknown` flags in argv.
 *
 * Commands should call this after consuming all expected flags/options.
 */
function assertNoUnknownFlags(argv: string[]): void {
  const unknown = argv.find((arg) => arg.startsWith('--'));
  if (unknown) throw new Error(`Unknown option: ${unknown}`);
}

function parseKind(value: string | undefined): ViewKind | undefined {
  if (!value) return undefined;
  if (isViewKind(value)) return value;
  throw new Error(`Invalid --kind: ${JSON.stringify(value)}`);
}

function parseLine(value: string | undefined): number {
  if (!value) throw new Error('Missing --line');
  const line = Number(value);
  if (!Number.isInteger(line) || line < 1) throw new Error(`Invalid --line: ${JSON.stringify(value)}`);
  return line;
}

/**
 * Parse global CLI options into an API config object.
 *
 * Commands share the same config shape as the MCP server.
 */
function takeCliConfig(argv: string[], defaultRoot: string): OutlineConfig {
  let rootDir = defaultRoot;
  const rootArg = takeOption(argv, '--root');
  if (rootArg) rootDir = resolvePath(defaultRoot, rootArg);

  const config: OutlineConfig = {
    rootDir,
    inboxContext: takeOption(argv, '--inbox-context') ?? DEFAULT_INBOX_CONTEXT,
  };
  const zone = takeOption(argv, '--zone');
  if (zone) config.zone = zone;
  return config;
}

async function handleView(config: OutlineConfig, argv: string[], io: CliIo): Promise<number> {
  const path = argv.shift();
  const kind = parseKind(takeOption(argv, '--kind')) ?? 'next';
  const includeRaw = takeOption(argv, '--include');
  const excludeRaw = takeOption(argv, '--exclude');
  const contextsFile = takeOption(argv, '--contexts');
  const includeUncontexted = takeFlag(argv, '--uncontexted');
  const now = takeOption(argv, '--now');
  const asText = takeFlag(argv, '--text');
  assertNoUnknownFlags(argv);
  if (!path) throw new Error('Missing <file>');

  const { entries, text, etag } = await renderOutlineView(config, {
    path,
    kind,
    include: includeRaw !== undefined ? parseContextList(includeRaw) : undefined,
    exclude: excludeRaw !== undefined ? parseContextList(excludeRaw) : undefined,
    includeUncontexted,
    contextsFile,
    now,
  });
  if (asText) {
    io.stdout.write(text ? `${text}\n` : '');
  } else {
    writeJson(io, { entries, etag });
  }
  return 0;
}

/**
 * Execute one command; `argv` has the global options removed.
 */
async function handleCommand(cmd: string, config: OutlineConfig, argv: string[], io: CliIo): Promise<number> {
  if (cmd === 'list') {
    const query = takeOption(argv, '--query');
    const now = takeOption(argv, '--now');
    assertNoUnknownFlags(argv);
    const outlines = await listOutlines(config, { query, now });
    writeJson(io, { outlines });
    return 0;
  }

  if (cmd === 'parse') {
    const path = argv.shift();
    const includeNotes = takeFlag(argv, '--notes');
    const now = takeOption(argv, '--now');
    assertNoUnknownFlags(argv);
    if (!path) throw new Error('Missing <file>');
    const { outline, warnings, etag } = await getOutline(config, { path, now, includeNotes });
    writeJson(io, { outline, warnings, etag });
    return 0;
  }

  if (cmd === 'view') {
    return handleView(config, argv, io);
  }

  if (cmd === 'validate') {
    const path = argv.shift();
    const now = takeOption(argv, '--now');
    assertNoUnknownFlags(argv);
    if (!path) throw new Error('Missing <file>');
    const { errors, warnings } = await validateOutlineDoc(config, { path, now });
    writeJson(io, { errors, warnings });
    return 0;
  }

  if (cmd === 'complete') {
    const path = argv.shift();
    const line = parseLine(takeOption(argv, '--line'));
    const now = takeOption(argv, '--now');
    const dryRun = takeFlag(argv, '--dry-run');
    const ifMatch = takeOption(argv, '--if-match');
    assertNoUnknownFlags(argv);
    if (!path) throw new Error('Missing <file>');
    const result = await completeOutlineLine(config, { path, line, now, dryRun, ifMatch });
    writeJson(io, result);
    return 0;
  }

  if (cmd === 'complete-line') {
    const now = takeOption(argv, '--now');
    assertNoUnknownFlags(argv);
    const lineText = argv.shift();
    if (lineText === undefined) throw new Error('Missing <text>');
    writeJson(io, completeLine(lineText, resolveNow(config, now)));
    return 0;
  }

  throw new Error(`Unknown command: ${cmd}`);
}

/**
 * Run the CLI with argv minus `node` and the script path.
 *
 * Returns the exit code; never calls `process.exit()`.
 */
export async function runCli(
  args: string[],
  io: CliIo = { stdout: process.stdout, stderr: process.stderr }
): Promise<number> {
  const argv = [...args];
  const defaultRoot = process.cwd();

  try {
    if (takeFlag(argv, '--help') || takeFlag(argv, '-h') || argv.length === 0) {
      writeHelp(io, defaultRoot);
      return 0;
    }

    const config = takeCliConfig(argv, defaultRoot);
    const cmd = argv.shift();
    if (!cmd || cmd === 'help') {
      writeHelp(io, defaultRoot);
      return 0;
    }

    return await handleCommand(cmd, config, argv, io);
  } catch (error) {
    io.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
    io.stderr.write('\n');
    writeHelp(io, defaultRoot);
    return 1;
  }
}

const isMain = resolvePath(process.argv[1] ?? '') === fileURLToPath(import.meta.url);
if (isMain) {
  const exitCode = await runCli(process.argv.slice(2));
  if (exitCode !== 0) process.exitCode = exitCode;
}
