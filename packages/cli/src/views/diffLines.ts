export type DiffLineKind = 'meta' | 'hunk' | 'add' | 'remove' | 'context';

export interface DiffLine {
  kind: DiffLineKind;
  text: string;
  oldLine: number | null;
  /** line number in the target version; null for removed and header lines */
  newLine: number | null;
}

const HUNK_HEADER = /^@@ -(\d+)(?:,\d+)? \+(\d+)(?:,\d+)? @@/;

/**
 * Numbers the lines of a single-file patch so comments can be attached to
 * lines of the target version.
 */
export function parseDiffLines(content: string): DiffLine[] {
  if (!content) return [];

  const lines: DiffLine[] = [];
  let oldLine = 0;
  let newLine = 0;
  let inHunk = false;

  for (const text of content.split('\n')) {
    const hunk = text.match(HUNK_HEADER);
    if (hunk) {
      oldLine = parseInt(hunk[1], 10);
      newLine = parseInt(hunk[2], 10);
      inHunk = true;
      lines.push({ kind: 'hunk', text, oldLine: null, newLine: null });
      continue;
    }

    if (!inHunk || text.startsWith('\\')) {
      lines.push({ kind: 'meta', text, oldLine: null, newLine: null });
      continue;
    }

    if (text.startsWith('+')) {
      lines.push({ kind: 'add', text, oldLine: null, newLine: newLine++ });
    } else if (text.startsWith('-')) {
      lines.push({ kind: 'remove', text, oldLine: oldLine++, newLine: null });
    } else {
      lines.push({ kind: 'context', text, oldLine: oldLine++, newLine: newLine++ });
    }
  }

  return lines;
}
