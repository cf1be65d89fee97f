import { and, asc, eq } from 'drizzle-orm';
import type { FileView } from '@local-review/shared';
import { external } from '../errors';
import type { Db } from './database';
import { fileViews } from './schema';

export class FileViewRepository {
  constructor(
    private readonly db: Db,
    private readonly persist: () => void,
  ) {}

  list(reviewId: string): Promise<FileView[]> {
    return external('load file views', async () =>
      this.db
        .select({
          reviewId: fileViews.reviewId,
          filePath: fileViews.filePath,
          createdAt: fileViews.createdAt,
        })
        .from(fileViews)
        .where(eq(fileViews.reviewId, reviewId))
        .orderBy(asc(fileViews.filePath))
        .all(),
    );
  }

  /**
   * Returns false when the file was already marked.
   */
  markViewed(reviewId: string, filePath: string, createdAt: string): Promise<boolean> {
    return external('mark file viewed', async () => {
      const inserted = this.db
        .insert(fileViews)
        .values({ reviewId, filePath, createdAt })
        .onConflictDoNothing()
        .returning({ id: fileViews.id })
        .all();
      this.persist();
      return inserted.length > 0;
    });
  }

  markUnviewed(reviewId: string, filePath: string): Promise<boolean> {
    return external('mark file unviewed', async () => {
      const deleted = this.db
        .delete(fileViews)
        .where(and(eq(fileViews.reviewId, reviewId), eq(fileViews.filePath, filePath)))
        .returning({ id: fileViews.id })
        .all();
      this.persist();
      return deleted.length > 0;
    });
  }

  isViewed(reviewId: string, filePath: string): Promise<boolean> {
    return external('load file view', async () => {
      const row = this.db
        .select({ id: fileViews.id })
        .from(fileViews)
        .where(and(eq(fileViews.reviewId, reviewId), eq(fileViews.filePath, filePath)))
        .get();
      return row !== undefined;
    });
  }
}
