import type { Comment, DiffFile, Review } from '@local-review/shared';
import { App, type GlobalHandler } from '../src/app/app';
import { navigationHandler } from '../src/app/navigation';
import type { GitGateway } from '../src/git/gateway';
import { silentLogger } from '../src/logging';
import { createServices } from '../src/services';
import { createRepositories, openDatabase, type Database, type Repositories } from '../src/storage';
import { ReviewSyncEngine } from '../src/sync/reviewSyncEngine';
import { FixedClock } from '../src/utils/clock';
import type { ViewStack } from '../src/views/stack';

export const BASE_SHA = '1111111111111111111111111111111111111111';
export const TARGET_SHA = '2222222222222222222222222222222222222222';
export const NEW_TARGET_SHA = '3333333333333333333333333333333333333333';
export const REBASED_TARGET_SHA = '4444444444444444444444444444444444444444';
export const NEW_BASE_SHA = '5555555555555555555555555555555555555555';

/**
 * In-memory Git: branches point at fake SHAs, ancestry and changed files are
 * declared by the test.
 */
export class FakeGitGateway implements GitGateway {
  readonly branches = new Map<string, string>();
  private readonly ancestry = new Set<string>();
  private readonly changes = new Map<string, string[]>();
  private readonly diffs = new Map<string, DiffFile[]>();

  setBranch(name: string, sha: string): this {
    this.branches.set(name, sha);
    return this;
  }

  deleteBranch(name: string): this {
    this.branches.delete(name);
    return this;
  }

  /** declares `descendant` as built on top of `ancestor` */
  addDescendant(ancestor: string, descendant: string): this {
    this.ancestry.add(`${ancestor}..${descendant}`);
    return this;
  }

  setChanges(fromSha: string, toSha: string, paths: string[]): this {
    this.changes.set(`${fromSha}..${toSha}`, paths);
    return this;
  }

  setDiff(baseSha: string, targetSha: string, files: DiffFile[]): this {
    this.diffs.set(`${baseSha}...${targetSha}`, files);
    return this;
  }

  async listBranches(): Promise<string[]> {
    return [...this.branches.keys()].sort();
  }

  async resolveBranch(branch: string): Promise<string | null> {
    return this.branches.get(branch) ?? null;
  }

  async changedFiles(fromSha: string, toSha: string): Promise<string[]> {
    if (fromSha === toSha) return [];
    return this.changes.get(`${fromSha}..${toSha}`) ?? [];
  }

  async isAncestor(ancestor: string, descendant: string): Promise<boolean> {
    return ancestor === descendant || this.ancestry.has(`${ancestor}..${descendant}`);
  }

  async diff(baseSha: string, targetSha: string): Promise<DiffFile[]> {
    return this.diffs.get(`${baseSha}...${targetSha}`) ?? [];
  }
}

export interface TestContext {
  database: Database;
  repositories: Repositories;
  git: FakeGitGateway;
  clock: FixedClock;
  sync: ReviewSyncEngine;
}

export async function createTestContext(): Promise<TestContext> {
  const database = await openDatabase(':memory:');
  const repositories = createRepositories(database);
  const git = new FakeGitGateway().setBranch('main', BASE_SHA).setBranch('feature', TARGET_SHA);
  const clock = new FixedClock('2024-03-01T10:00:00.000Z');
  const sync = new ReviewSyncEngine({ ...repositories, git, clock, logger: silentLogger });

  return { database, repositories, git, clock, sync };
}

export function createTestApp(
  context: TestContext,
  options: { stack?: ViewStack; globalHandlers?: GlobalHandler[] } = {},
): App {
  return new App({
    services: createServices({ checkBranchStatusOnStart: false }),
    serviceContext: {
      repositories: context.repositories,
      git: context.git,
      sync: context.sync,
      clock: context.clock,
      logger: silentLogger,
    },
    globalHandlers: options.globalHandlers ?? [navigationHandler],
    logger: silentLogger,
    stack: options.stack,
  });
}

export function makeReview(overrides: Partial<Review> = {}): Review {
  return {
    id: 'review-1',
    baseBranch: 'main',
    targetBranch: 'feature',
    baseSha: BASE_SHA,
    targetSha: TARGET_SHA,
    baseShaChanged: null,
    targetShaChanged: null,
    baseBranchExists: true,
    targetBranchExists: true,
    createdAt: '2024-03-01T09:00:00.000Z',
    updatedAt: '2024-03-01T09:00:00.000Z',
    ...overrides,
  };
}

export function makeComment(overrides: Partial<Comment> = {}): Comment {
  return {
    id: 'comment-1',
    reviewId: 'review-1',
    filePath: 'src/a.ts',
    lineNumber: null,
    content: 'Looks good',
    resolved: false,
    createdAt: '2024-03-01T09:30:00.000Z',
    ...overrides,
  };
}

export function makeDiffFile(path: string, overrides: Partial<DiffFile> = {}): DiffFile {
  return {
    path,
    status: 'modified',
    additions: 1,
    deletions: 0,
    binary: false,
    content: '',
    ...overrides,
  };
}
