import { and, desc, eq, inArray } from 'drizzle-orm';
import type { BranchSide, BranchStatusUpdate, Comment, Review } from '@local-review/shared';
import { external, InvalidStateError } from '../errors';
import type { Db } from './database';
import { comments, fileViews, reviews } from './schema';

export interface AcceptedRefresh {
  /** file views that were deleted because their file changed */
  removedFileViews: string[];
}

export class ReviewRepository {
  constructor(
    private readonly db: Db,
    private readonly persist: () => void,
  ) {}

  list(): Promise<Review[]> {
    return external('list reviews', async () =>
      this.db.select().from(reviews).orderBy(desc(reviews.createdAt)).all(),
    );
  }

  get(id: string): Promise<Review | null> {
    return external('load review', async () =>
      this.db.select().from(reviews).where(eq(reviews.id, id)).get() ?? null,
    );
  }

  create(review: Review): Promise<void> {
    return external('create review', async () => {
      this.db.insert(reviews).values(review).run();
      this.persist();
    });
  }

  /**
   * Deletes the review; comments and file views go with it.
   * Returns false when no review had this id.
   */
  delete(id: string): Promise<boolean> {
    return external('delete review', async () => {
      const deleted = this.db.delete(reviews).where(eq(reviews.id, id)).returning({ id: reviews.id }).all();
      this.persist();
      return deleted.length > 0;
    });
  }

  updateBranchStatus(id: string, update: BranchStatusUpdate, updatedAt: string): Promise<void> {
    return external('update branch status', async () => {
      this.db
        .update(reviews)
        .set({ ...update, updatedAt })
        .where(eq(reviews.id, id))
        .run();
      this.persist();
    });
  }

  /**
   * Moves one side of the review to `newSha`, clears its pending change and
   * drops the file views on `changedPaths`, in one transaction.
   *
   * `newSha` must still be the side's pending change when the transaction
   * runs; otherwise nothing is written.
   *
   * @throws InvalidStateError when the pending change was accepted or replaced meanwhile
   */
  acceptRefresh(
    id: string,
    side: BranchSide,
    newSha: string,
    changedPaths: readonly string[],
    updatedAt: string,
  ): Promise<AcceptedRefresh> {
    return external('apply refresh', async () => {
      const accepted = this.db.transaction((tx): AcceptedRefresh => {
        const pendingColumn = side === 'base' ? reviews.baseShaChanged : reviews.targetShaChanged;
        const columns =
          side === 'base'
            ? { baseSha: newSha, baseShaChanged: null }
            : { targetSha: newSha, targetShaChanged: null };

        const updated = tx
          .update(reviews)
          .set({ ...columns, updatedAt })
          .where(and(eq(reviews.id, id), eq(pendingColumn, newSha)))
          .returning({ id: reviews.id })
          .all();
        if (updated.length === 0) {
          throw new InvalidStateError(
            `Pending ${side} change ${newSha.slice(0, 7)} of review ${id} is no longer current`,
          );
        }

        if (changedPaths.length === 0) {
          return { removedFileViews: [] };
        }

        const removed = tx
          .delete(fileViews)
          .where(and(eq(fileViews.reviewId, id), inArray(fileViews.filePath, [...changedPaths])))
          .returning({ filePath: fileViews.filePath })
          .all();

        return { removedFileViews: removed.map((row) => row.filePath).sort() };
      });

      this.persist();
      return accepted;
    });
  }

  /**
   * Inserts a review together with its copied comments.
   */
  createWithComments(review: Review, copied: readonly Comment[]): Promise<void> {
    return external('duplicate review', async () => {
      this.db.transaction((tx) => {
        tx.insert(reviews).values(review).run();
        if (copied.length > 0) {
          tx.insert(comments).values([...copied]).run();
        }
      });
      this.persist();
    });
  }
}
