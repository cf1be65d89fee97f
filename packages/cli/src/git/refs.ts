import type { SimpleGit } from 'simple-git';

/**
 * Local branch names, sorted.
 */
export async function listBranches(git: SimpleGit): Promise<string[]> {
  const output = await git.raw(['for-each-ref', '--format=%(refname:short)', 'refs/heads']);
  return output
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .sort((a, b) => a.localeCompare(b));
}

/**
 * Current commit of a local branch, or null when the branch does not exist.
 */
export async function resolveBranchSha(git: SimpleGit, branch: string): Promise<string | null> {
  const ref = `refs/heads/${branch}`;
  // for-each-ref matches path prefixes too (refs/heads/feat also lists feat/x), so compare exactly
  const output = await git.raw(['for-each-ref', '--format=%(refname) %(objectname)', ref]);

  for (const line of output.split('\n')) {
    const [refname, sha] = line.trim().split(' ');
    if (refname === ref && sha) {
      return sha;
    }
  }

  return null;
}

/**
 * True when `ancestor` is reachable from `descendant` (or equal to it).
 */
export async function isAncestor(git: SimpleGit, ancestor: string, descendant: string): Promise<boolean> {
  if (ancestor === descendant) return true;

  // commits reachable from `ancestor` but not from `descendant`; none means ancestry holds
  const output = await git.raw(['rev-list', '--count', `${descendant}..${ancestor}`]);
  return parseInt(output.trim(), 10) === 0;
}
