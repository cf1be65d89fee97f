import simpleGit, { type SimpleGit } from 'simple-git';
import type { DiffFile } from '@local-review/shared';
import { external } from '../errors';
import { getChangedPaths, getDiffFiles } from './diff';
import { isAncestor, listBranches, resolveBranchSha } from './refs';

/**
 * What the review core needs from Git.
 */
export interface GitGateway {
  listBranches(): Promise<string[]>;
  /** null when the branch does not exist */
  resolveBranch(branch: string): Promise<string | null>;
  changedFiles(fromSha: string, toSha: string): Promise<string[]>;
  isAncestor(ancestor: string, descendant: string): Promise<boolean>;
  diff(baseSha: string, targetSha: string): Promise<DiffFile[]>;
}

export class SimpleGitGateway implements GitGateway {
  private readonly git: SimpleGit;

  constructor(repoRoot: string) {
    this.git = simpleGit(repoRoot);
  }

  listBranches(): Promise<string[]> {
    return external('list branches', () => listBranches(this.git));
  }

  resolveBranch(branch: string): Promise<string | null> {
    return external(`resolve branch ${branch}`, () => resolveBranchSha(this.git, branch));
  }

  changedFiles(fromSha: string, toSha: string): Promise<string[]> {
    return external('list changed files', () => getChangedPaths(this.git, fromSha, toSha));
  }

  isAncestor(ancestor: string, descendant: string): Promise<boolean> {
    return external('check ancestry', () => isAncestor(this.git, ancestor, descendant));
  }

  diff(baseSha: string, targetSha: string): Promise<DiffFile[]> {
    return external('load diff', () => getDiffFiles(this.git, baseSha, targetSha));
  }
}
