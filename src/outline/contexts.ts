/**
 * Contexts file reader.
 *
 * Format: whitespace-separated context names, `#` starts a comment that runs
 * to the end of the line, and a leading `-` moves a name to the exclude list.
 * A leading `@@` is accepted and dropped so names can be pasted from outlines.
 */
export interface ContextSelection {
  include: string[];
  exclude: string[];
}

function normalizeName(word: string): string {
  return word.startsWith('@@') ? word.slice(2) : word;
}

export function parseContextsFile(text: string): ContextSelection {
  const include: string[] = [];
  const exclude: string[] = [];

  for (const rawLine of text.split(/\r?\n/)) {
    const hash = rawLine.indexOf('#');
    const line = hash === -1 ? rawLine : rawLine.slice(0, hash);
    for (const word of line.split(/\s+/)) {
      if (!word) continue;
      const excluded = word.startsWith('-');
      const name = normalizeName(excluded ? word.slice(1) : word);
      if (!name) continue;
      const target = excluded ? exclude : include;
      if (!target.includes(name)) target.push(name);
    }
  }

  return { include, exclude };
}

/**
 * Split a comma-separated CLI/tool argument into context names.
 */
export function parseContextList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((part) => normalizeName(part.trim()))
    .filter((part) => part.length > 0);
}
