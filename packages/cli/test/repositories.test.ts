import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { InvalidStateError } from '../src/errors';
import { createRepositories, loadSqlJs, openDatabase, runMigrations } from '../src/storage';
import { MIGRATIONS } from '../src/storage/migrations';
import { comments, fileViews } from '../src/storage/schema';
import {
  createTestContext,
  makeComment,
  makeReview,
  NEW_TARGET_SHA,
  REBASED_TARGET_SHA,
  type TestContext,
} from './helpers';

describe('repositories', () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = await createTestContext();
  });

  afterEach(() => {
    ctx.database.close();
  });

  describe('ReviewRepository', () => {
    it('lists reviews newest first', async () => {
      await ctx.repositories.reviews.create(makeReview({ id: 'old', createdAt: '2024-01-01T00:00:00.000Z' }));
      await ctx.repositories.reviews.create(makeReview({ id: 'new', createdAt: '2024-02-01T00:00:00.000Z' }));

      const reviews = await ctx.repositories.reviews.list();

      expect(reviews.map((review) => review.id)).toEqual(['new', 'old']);
    });

    it('round-trips nullable columns', async () => {
      const review = makeReview({ baseBranchExists: null, targetBranchExists: false, targetShaChanged: NEW_TARGET_SHA });
      await ctx.repositories.reviews.create(review);

      expect(await ctx.repositories.reviews.get(review.id)).toEqual(review);
      expect(await ctx.repositories.reviews.get('missing')).toBeNull();
    });

    it('deletes a review with its comments and file views', async () => {
      const review = makeReview();
      await ctx.repositories.reviews.create(review);
      await ctx.repositories.reviews.create(makeReview({ id: 'other' }));
      for (const id of ['c1', 'c2', 'c3']) {
        await ctx.repositories.comments.create(makeComment({ id }));
      }
      await ctx.repositories.comments.create(makeComment({ id: 'c4', reviewId: 'other' }));
      await ctx.repositories.fileViews.markViewed(review.id, 'src/a.ts', ctx.clock.now());
      await ctx.repositories.fileViews.markViewed(review.id, 'src/b.ts', ctx.clock.now());

      expect(await ctx.repositories.reviews.delete(review.id)).toBe(true);

      expect((await ctx.repositories.reviews.list()).map((r) => r.id)).toEqual(['other']);
      const remainingComments = ctx.database.db.select().from(comments).all();
      expect(remainingComments.map((comment) => comment.id)).toEqual(['c4']);
      expect(ctx.database.db.select().from(fileViews).all()).toEqual([]);
    });

    it('returns false when deleting an unknown review', async () => {
      expect(await ctx.repositories.reviews.delete('missing')).toBe(false);
    });

    it('accepts a pending refresh and drops markers of changed files', async () => {
      await ctx.repositories.reviews.create(makeReview({ targetShaChanged: NEW_TARGET_SHA }));
      await ctx.repositories.fileViews.markViewed('review-1', 'src/a.ts', ctx.clock.now());
      await ctx.repositories.fileViews.markViewed('review-1', 'src/b.ts', ctx.clock.now());

      const accepted = await ctx.repositories.reviews.acceptRefresh(
        'review-1',
        'target',
        NEW_TARGET_SHA,
        ['src/b.ts', 'src/c.ts'],
        ctx.clock.now(),
      );

      expect(accepted).toEqual({ removedFileViews: ['src/b.ts'] });
      expect(await ctx.repositories.reviews.get('review-1')).toMatchObject({
        targetSha: NEW_TARGET_SHA,
        targetShaChanged: null,
        updatedAt: '2024-03-01T10:00:00.000Z',
      });
    });

    it('refuses a refresh whose pending change was replaced and writes nothing', async () => {
      await ctx.repositories.reviews.create(makeReview({ targetShaChanged: REBASED_TARGET_SHA }));
      await ctx.repositories.fileViews.markViewed('review-1', 'src/a.ts', ctx.clock.now());

      await expect(
        ctx.repositories.reviews.acceptRefresh('review-1', 'target', NEW_TARGET_SHA, ['src/a.ts'], ctx.clock.now()),
      ).rejects.toBeInstanceOf(InvalidStateError);

      expect(await ctx.repositories.reviews.get('review-1')).toEqual(makeReview({ targetShaChanged: REBASED_TARGET_SHA }));
      expect(await ctx.repositories.fileViews.isViewed('review-1', 'src/a.ts')).toBe(true);
    });
  });

  describe('CommentRepository', () => {
    beforeEach(async () => {
      await ctx.repositories.reviews.create(makeReview());
      await ctx.repositories.comments.create(
        makeComment({ id: 'file-old', createdAt: '2024-03-01T09:00:00.000Z' }),
      );
      await ctx.repositories.comments.create(
        makeComment({ id: 'file-new', createdAt: '2024-03-01T09:05:00.000Z' }),
      );
      await ctx.repositories.comments.create(makeComment({ id: 'line-7', lineNumber: 7 }));
      await ctx.repositories.comments.create(makeComment({ id: 'line-3', lineNumber: 3 }));
      await ctx.repositories.comments.create(makeComment({ id: 'other-file', filePath: 'src/b.ts', lineNumber: 3 }));
    });

    it('separates file-level comments from line comments', async () => {
      const fileLevel = await ctx.repositories.comments.listForTarget({
        reviewId: 'review-1',
        filePath: 'src/a.ts',
        lineNumber: null,
      });
      const line = await ctx.repositories.comments.listForTarget({
        reviewId: 'review-1',
        filePath: 'src/a.ts',
        lineNumber: 7,
      });

      expect(fileLevel.map((comment) => comment.id)).toEqual(['file-new', 'file-old']);
      expect(line.map((comment) => comment.id)).toEqual(['line-7']);
    });

    it('toggles resolved on one comment or a whole target', async () => {
      const target = { reviewId: 'review-1', filePath: 'src/a.ts', lineNumber: null };

      expect(await ctx.repositories.comments.setResolved('file-old', true)).toBe(true);
      expect((await ctx.repositories.comments.get('file-old'))?.resolved).toBe(true);
      expect(await ctx.repositories.comments.setResolved('missing', true)).toBe(false);

      expect(await ctx.repositories.comments.setResolvedForTarget(target, true)).toBe(2);
      const resolved = await ctx.repositories.comments.listForTarget(target);
      expect(resolved.every((comment) => comment.resolved)).toBe(true);
      expect((await ctx.repositories.comments.get('line-7'))?.resolved).toBe(false);
    });

    it('summarizes which files and lines carry comments', async () => {
      expect(await ctx.repositories.comments.metadata('review-1')).toEqual({
        filesWithComments: ['src/a.ts', 'src/b.ts'],
        linesWithComments: { 'src/a.ts': [3, 7], 'src/b.ts': [3] },
      });
    });
  });

  describe('FileViewRepository', () => {
    it('keeps at most one marker per file', async () => {
      await ctx.repositories.reviews.create(makeReview());

      expect(await ctx.repositories.fileViews.markViewed('review-1', 'src/a.ts', ctx.clock.now())).toBe(true);
      expect(await ctx.repositories.fileViews.markViewed('review-1', 'src/a.ts', ctx.clock.now())).toBe(false);
      expect(await ctx.repositories.fileViews.list('review-1')).toEqual([
        { reviewId: 'review-1', filePath: 'src/a.ts', createdAt: '2024-03-01T10:00:00.000Z' },
      ]);

      expect(await ctx.repositories.fileViews.markUnviewed('review-1', 'src/a.ts')).toBe(true);
      expect(await ctx.repositories.fileViews.isViewed('review-1', 'src/a.ts')).toBe(false);
    });

    it('rejects markers for unknown reviews', async () => {
      await expect(ctx.repositories.fileViews.markViewed('missing', 'src/a.ts', ctx.clock.now())).rejects.toThrow(
        /^mark file viewed failed: /,
      );
    });
  });
});

describe('runMigrations', () => {
  it('applies each migration once', async () => {
    const SQL = await loadSqlJs();
    const sqlite = new SQL.Database();

    expect(runMigrations(sqlite)).toEqual(MIGRATIONS.map((migration) => migration.version));
    expect(runMigrations(sqlite)).toEqual([]);

    sqlite.close();
  });
});

describe('openDatabase', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'local-review-db-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('saves every write to the database file', async () => {
    const filename = path.join(dir, 'nested', 'reviews.db');

    const first = await openDatabase(filename);
    await createRepositories(first).reviews.create(makeReview());
    first.close();

    const second = await openDatabase(filename);
    const reopened = createRepositories(second);
    expect(await reopened.reviews.get('review-1')).toEqual(makeReview());

    // foreign keys stay enforced after a save
    await reopened.comments.create(makeComment());
    await reopened.reviews.delete('review-1');
    expect(await reopened.comments.listForReview('review-1')).toEqual([]);
    second.close();
  });
});
