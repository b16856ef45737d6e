#!/usr/bin/env node

/**
 * `sigil-gtd-mcp`: serves outline files under `--root` over stdio.
 */
import { runStdioServer } from './server.js';
import { loadConfigFromArgs } from './config.js';

const VERSION = '0.1.0';

function printHelp(): void {
  process.stdout.write(
    [
      'sigil-gtd-mcp (stdio MCP server)',
      '',
      'Usage:',
      '  sigil-gtd-mcp [--root <dir>] [--contexts <file>] [--inbox-context <name>] [--zone <iana>]',
      '',
      'Options:',
      '  --root           Root directory holding outline files (default: cwd)',
      '  --contexts       Default contexts file, relative to root',
      '  --inbox-context  Context marking recurring inbox actions (default: inbox)',
      '  --zone           Time zone dates are read in (default: system zone)',
      '  --help           Show help',
      '',
    ].join('\n')
  );
}

function argsContainHelp(argv: string[]): boolean {
  return argv.includes('--help') || argv.includes('-h');
}

function argsContainVersion(argv: string[]): boolean {
  return argv.includes('--version') || argv.includes('-v');
}

/**
 * Parse args and run the stdio server.
 */
async function main(): Promise<void> {
  const argv = process.argv.slice(2);

  if (argsContainHelp(argv)) {
    printHelp();
    return;
  }

  if (argsContainVersion(argv)) {
    process.stdout.write(`sigil-gtd-mcp ${VERSION}\n`);
    return;
  }

  const config = loadConfigFromArgs(argv, process.cwd());
  await runStdioServer(config);
}

await main();
