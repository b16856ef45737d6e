import { resolve } from 'node:path';
import { DEFAULT_INBOX_CONTEXT } from './outline/constants.js';

/**
 * Runtime configuration for locating and reading outline files.
 *
 * `rootDir` is treated as a trust boundary: outline paths must resolve within it.
 */
export interface OutlineConfig {
  rootDir: string;
  /**
   * Contexts file (root-relative) applied to views that do not pass their own
   * include/exclude lists.
   */
  contextsFile?: string;
  /** Context that marks recurring actions as inboxes. */
  inboxContext: string;
  /** IANA zone dates are read in; defaults to the system zone. */
  zone?: string;
}

/**
 * Parse CLI args into an `OutlineConfig`.
 *
 * Supported flags:
 * - `--root <dir>`: filesystem root (defaults to `cwd`).
 * - `--contexts <file>`: default contexts file, relative to root.
 * - `--inbox-context <name>`: inbox context (defaults to `inbox`).
 * - `--zone <iana>`: zone for reading dates (defaults to the system zone).
 */
export function loadConfigFromArgs(argv: string[], cwd: string): OutlineConfig {
  const args = [...argv];

  let rootDir = cwd;
  let contextsFile: string | undefined;
  let inboxContext = DEFAULT_INBOX_CONTEXT;
  let zone: string | undefined;

  while (args.length > 0) {
    const flag = args.shift();
    if (!flag) break;

    if (flag === '--root') {
      const value = args.shift();
      if (!value) throw new Error('Missing value for --root');
      rootDir = resolve(cwd, value);
      continue;
    }

    if (flag === '--contexts') {
      const value = args.shift();
      if (!value) throw new Error('Missing value for --contexts');
      contextsFile = value;
      continue;
    }

    if (flag === '--inbox-context') {
      const value = args.shift();
      if (!value) throw new Error('Missing value for --inbox-context');
      inboxContext = value;
      continue;
    }

    if (flag === '--zone') {
      const value = args.shift();
      if (!value) throw new Error('Missing value for --zone');
      zone = value;
      continue;
    }

    throw new Error(`Unknown argument: ${flag}`);
  }

  const config: OutlineConfig = { rootDir, inboxContext };
  if (contextsFile !== undefined) config.contextsFile = contextsFile;
  if (zone !== undefined) config.zone = zone;
  return config;
}
