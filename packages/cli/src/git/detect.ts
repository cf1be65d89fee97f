import path from 'path';
import simpleGit from 'simple-git';

export interface RepoContext {
  root: string;
  branch: string | null;
}

export async function detectRepo(inputPath: string): Promise<RepoContext> {
  const absolutePath = path.resolve(inputPath);
  const git = simpleGit(absolutePath);

  const isRepo = await git.checkIsRepo();
  if (!isRepo) {
    throw new Error(`Not a git repository: ${absolutePath}`);
  }

  const root = await git.revparse(['--show-toplevel']);

  let branch: string | null = null;
  try {
    branch = (await git.revparse(['--abbrev-ref', 'HEAD'])).trim();
    if (branch === 'HEAD') {
      branch = null; // Detached HEAD
    }
  } catch {
    // Unborn branch: no commits yet
    branch = null;
  }

  return { root: root.trim(), branch };
}
