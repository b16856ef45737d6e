import { createHash, randomUUID } from 'node:crypto';
import { mkdir, readdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname, extname, isAbsolute, join, relative, resolve, sep } from 'node:path';
import type { OutlineConfig } from '../config.js';
import { OUTLINE_EXTENSIONS } from './constants.js';

/**
 * Filesystem helpers for outline storage.
 *
 * Responsibilities:
 * - Ensure all reads/writes stay within `config.rootDir`.
 * - Provide content hashing (etag) and atomic writes.
 */
export interface ReadOutlineFileResult {
  absolutePath: string;
  /** Root-relative path with `/` separators; used as the model's file id. */
  path: string;
  text: string;
  etag: string;
}

/**
 * Compute a stable hex-encoded SHA-256 digest.
 *
 * Used as:
 * - an etag for optimistic concurrency checks
 * - the cache key for resolved models
 */
export function sha256Hex(text: string): string {
  return createHash('sha256').update(text).digest('hex');
}

/**
 * Enforce that `absolutePath` does not escape `rootDir`.
 *
 * Note: this is a lexical/path-traversal guard only; symlinks are not resolved.
 */
function assertPathWithinRoot(rootDir: string, absolutePath: string): void {
  const rel = relative(rootDir, absolutePath);
  if (rel === '' || rel === '.') return;

  // On Windows, `path.relative()` can return an absolute path if drives differ.
  if (isAbsolute(rel)) {
    throw new Error(`Resolved path escapes rootDir: ${absolutePath}`);
  }

  const parts = rel.split(sep);
  if (parts.includes('..')) {
    throw new Error(`Resolved path escapes rootDir: ${absolutePath}`);
  }
}

function toFileId(rootDir: string, absolutePath: string): string {
  return relative(rootDir, absolutePath).split(sep).join('/');
}

/**
 * Resolve a root-relative file path, rejecting anything outside `rootDir`.
 */
export function resolveOutlinePath(config: OutlineConfig, path: string): string {
  if (!path.trim()) throw new Error('path must be non-empty');
  const rootDir = resolve(config.rootDir);
  const absolutePath = resolve(rootDir, path);
  assertPathWithinRoot(rootDir, absolutePath);
  if (absolutePath === rootDir) throw new Error(`Not a file path: ${path}`);
  return absolutePath;
}

/**
 * Read an outline file and compute its etag.
 *
 * The etag is derived from file contents (not mtime) to support safe retries and
 * optimistic concurrency for edits.
 */
export async function readOutlineFile(config: OutlineConfig, path: string): Promise<ReadOutlineFileResult> {
  const absolutePath = resolveOutlinePath(config, path);
  const text = await readFile(absolutePath, 'utf8');
  return { absolutePath, path: toFileId(resolve(config.rootDir), absolutePath), text, etag: sha256Hex(text) };
}

/**
 * Root-relative paths of every outline file under `rootDir`, sorted.
 *
 * Hidden entries and `node_modules` are skipped.
 */
export async function findOutlineFiles(config: OutlineConfig): Promise<string[]> {
  const rootDir = resolve(config.rootDir);
  const found: string[] = [];
  const stack: string[] = [rootDir];

  while (stack.length > 0) {
    const dir = stack.pop();
    if (dir === undefined) continue;
    const entries = await readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      if (entry.name.startsWith('.') || entry.name === 'node_modules') continue;
      const absolutePath = join(dir, entry.name);
      if (entry.isDirectory()) {
        stack.push(absolutePath);
      } else if (entry.isFile() && OUTLINE_EXTENSIONS.includes(extname(entry.name).toLowerCase())) {
        found.push(toFileId(rootDir, absolutePath));
      }
    }
  }

  return found.sort((a, b) => a.localeCompare(b));
}

/**
 * Write a file via a temporary path and atomic rename.
 */
export async function writeFileAtomic(absolutePath: string, text: string): Promise<void> {
  const dir = dirname(absolutePath);
  await mkdir(dir, { recursive: true });
  const tmpPath = `${absolutePath}.tmp.${randomUUID()}`;
  await writeFile(tmpPath, text, 'utf8');
  await rename(tmpPath, absolutePath);
}
