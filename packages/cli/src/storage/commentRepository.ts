import { and, desc, eq, isNull, isNotNull } from 'drizzle-orm';
import type { Comment, CommentMetadata, CommentTarget } from '@local-review/shared';
import { external } from '../errors';
import type { Db } from './database';
import { comments } from './schema';

function targetCondition(target: CommentTarget) {
  return and(
    eq(comments.reviewId, target.reviewId),
    eq(comments.filePath, target.filePath),
    target.lineNumber === null ? isNull(comments.lineNumber) : eq(comments.lineNumber, target.lineNumber),
  );
}

export class CommentRepository {
  constructor(
    private readonly db: Db,
    private readonly persist: () => void,
  ) {}

  create(comment: Comment): Promise<void> {
    return external('create comment', async () => {
      this.db.insert(comments).values(comment).run();
      this.persist();
    });
  }

  /**
   * Comments of one file (file-level only) or one line, newest first.
   */
  listForTarget(target: CommentTarget): Promise<Comment[]> {
    return external('load comments', async () =>
      this.db
        .select()
        .from(comments)
        .where(targetCondition(target))
        .orderBy(desc(comments.createdAt))
        .all(),
    );
  }

  listForReview(reviewId: string): Promise<Comment[]> {
    return external('load comments', async () =>
      this.db
        .select()
        .from(comments)
        .where(eq(comments.reviewId, reviewId))
        .orderBy(desc(comments.createdAt))
        .all(),
    );
  }

  get(id: string): Promise<Comment | null> {
    return external('load comment', async () =>
      this.db.select().from(comments).where(eq(comments.id, id)).get() ?? null,
    );
  }

  setResolved(id: string, resolved: boolean): Promise<boolean> {
    return external('update comment', async () => {
      const updated = this.db
        .update(comments)
        .set({ resolved })
        .where(eq(comments.id, id))
        .returning({ id: comments.id })
        .all();
      this.persist();
      return updated.length > 0;
    });
  }

  /**
   * Sets `resolved` on every comment of the target. Returns the number of rows touched.
   */
  setResolvedForTarget(target: CommentTarget, resolved: boolean): Promise<number> {
    return external('update comments', async () => {
      const updated = this.db
        .update(comments)
        .set({ resolved })
        .where(targetCondition(target))
        .returning({ id: comments.id })
        .all();
      this.persist();
      return updated.length;
    });
  }

  metadata(reviewId: string): Promise<CommentMetadata> {
    return external('load comment metadata', async () => {
      const files = this.db
        .selectDistinct({ filePath: comments.filePath })
        .from(comments)
        .where(eq(comments.reviewId, reviewId))
        .all()
        .map((row) => row.filePath)
        .sort();

      const lines = this.db
        .selectDistinct({ filePath: comments.filePath, lineNumber: comments.lineNumber })
        .from(comments)
        .where(and(eq(comments.reviewId, reviewId), isNotNull(comments.lineNumber)))
        .all();

      const linesWithComments: Record<string, number[]> = {};
      for (const { filePath, lineNumber } of lines) {
        if (lineNumber === null) continue;
        (linesWithComments[filePath] ??= []).push(lineNumber);
      }
      for (const list of Object.values(linesWithComments)) {
        list.sort((a, b) => a - b);
      }

      return { filesWithComments: files, linesWithComments };
    });
  }
}
