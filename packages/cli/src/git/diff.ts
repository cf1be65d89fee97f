import type { SimpleGit } from 'simple-git';
import type { DiffFile, FileStatus } from '@local-review/shared';

/**
 * Files of the review diff: changes on `targetSha` since it forked from `baseSha`.
 */
export async function getDiffFiles(git: SimpleGit, baseSha: string, targetSha: string): Promise<DiffFile[]> {
  const range = `${baseSha}...${targetSha}`;

  const numstat = await git.raw(['diff', '--numstat', '--find-renames', range]);
  const nameStatus = await git.raw(['diff', '--name-status', '--find-renames', range]);
  const patch = await git.raw(['diff', '--no-color', '--find-renames', range]);

  const statMap = parseNumstat(numstat);
  const statusMap = parseNameStatus(nameStatus);
  const patchMap = splitPatch(patch);

  const files: DiffFile[] = [];

  for (const [path, status] of statusMap) {
    const stats = statMap.get(path) || { additions: 0, deletions: 0, binary: false };

    files.push({
      path,
      status: status.status,
      additions: stats.additions,
      deletions: stats.deletions,
      renamedFrom: status.renamedFrom,
      binary: stats.binary,
      content: patchMap.get(path) ?? '',
    });
  }

  files.sort((a, b) => a.path.localeCompare(b.path));

  return files;
}

/**
 * Paths touched between two commits of the same branch. Renames count as
 * both the old and the new path.
 */
export async function getChangedPaths(git: SimpleGit, fromSha: string, toSha: string): Promise<string[]> {
  if (fromSha === toSha) return [];

  const output = await git.raw(['diff', '--name-only', '--no-renames', fromSha, toSha]);
  return [...new Set(output.split('\n').map((line) => line.trim()).filter((line) => line.length > 0))].sort();
}

interface NumstatEntry {
  additions: number;
  deletions: number;
  binary: boolean;
}

export function parseNumstat(output: string): Map<string, NumstatEntry> {
  const map = new Map<string, NumstatEntry>();

  for (const line of output.trim().split('\n')) {
    if (!line) continue;

    const parts = line.split('\t');
    if (parts.length < 3) continue;

    const [add, del, ...pathParts] = parts;
    let path = pathParts.join('\t');

    // Renames: "old => new" or "dir/{old => new}/file"
    if (path.includes(' => ')) {
      const braced = path.match(/^(.*){[^}]*\s=>\s([^}]*)}(.*)$/);
      if (braced) {
        path = `${braced[1]}${braced[2]}${braced[3]}`.replace(/\/\//g, '/');
      } else {
        path = path.split(' => ')[1] ?? path;
      }
    }

    // Binary files show "-" for additions/deletions
    const binary = add === '-' || del === '-';

    map.set(path.trim(), {
      additions: binary ? 0 : parseInt(add, 10),
      deletions: binary ? 0 : parseInt(del, 10),
      binary,
    });
  }

  return map;
}

interface StatusEntry {
  status: FileStatus;
  renamedFrom?: string;
}

export function parseNameStatus(output: string): Map<string, StatusEntry> {
  const map = new Map<string, StatusEntry>();

  for (const line of output.trim().split('\n')) {
    if (!line) continue;

    const parts = line.split('\t');
    if (parts.length < 2) continue;

    const statusCode = parts[0];

    if (statusCode.startsWith('R') && parts.length >= 3) {
      // R100\told-path\tnew-path
      map.set(parts[2], { status: 'renamed', renamedFrom: parts[1] });
      continue;
    }

    if (statusCode.startsWith('C') && parts.length >= 3) {
      // Copies are shown as additions
      map.set(parts[2], { status: 'added' });
      continue;
    }

    let status: FileStatus;
    switch (statusCode) {
      case 'A':
        status = 'added';
        break;
      case 'D':
        status = 'deleted';
        break;
      default:
        // M, T (type change) and anything unknown
        status = 'modified';
    }
    map.set(parts[1], { status });
  }

  return map;
}

/**
 * Splits `git diff` output into per-file patches keyed by the new path.
 */
export function splitPatch(patch: string): Map<string, string> {
  const map = new Map<string, string>();
  const sections = patch.split(/^diff --git /m).filter((section) => section.length > 0);

  for (const section of sections) {
    const newline = section.indexOf('\n');
    const header = newline === -1 ? section : section.slice(0, newline);
    const body = newline === -1 ? '' : section.slice(newline + 1);

    const match = header.match(/^a\/(.*) b\/(.*)$/);
    if (!match) continue;

    map.set(match[2], body.replace(/\n$/, ''));
  }

  return map;
}
