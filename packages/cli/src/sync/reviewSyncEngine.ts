import { nanoid } from 'nanoid';
import type { BranchSide, BranchStatusUpdate, Comment, Review } from '@local-review/shared';
import { describeError, errorKindOf, InvalidStateError, NotFoundError } from '../errors';
import type { GitGateway } from '../git/gateway';
import type { Logger } from '../logging';
import type { CommentRepository, FileViewRepository, ReviewRepository } from '../storage';
import type { Clock } from '../utils/clock';
import type { DriftReport, ProbeResult, RefreshOutcome, SideDrift, SideRefreshResult } from './types';

export interface SyncDependencies {
  reviews: ReviewRepository;
  comments: CommentRepository;
  fileViews: FileViewRepository;
  git: GitGateway;
  clock: Clock;
  logger: Logger;
}

const SIDES: readonly BranchSide[] = ['base', 'target'];

function branchOf(review: Review, side: BranchSide): string {
  return side === 'base' ? review.baseBranch : review.targetBranch;
}

function shaOf(review: Review, side: BranchSide): string {
  return side === 'base' ? review.baseSha : review.targetSha;
}

function pendingShaOf(review: Review, side: BranchSide): string | null {
  return side === 'base' ? review.baseShaChanged : review.targetShaChanged;
}

function branchExistsOf(review: Review, side: BranchSide): boolean | null {
  return side === 'base' ? review.baseBranchExists : review.targetBranchExists;
}

function statusFor(side: BranchSide, exists: boolean, shaChanged: string | null): BranchStatusUpdate {
  return side === 'base'
    ? { baseBranchExists: exists, baseShaChanged: shaChanged }
    : { targetBranchExists: exists, targetShaChanged: shaChanged };
}

/**
 * Keeps a review's recorded heads, branch existence flags and viewed-file
 * markers consistent with the branches in the repository.
 *
 * Drift is handled in two steps: a probe records the newly observed head in
 * `*ShaChanged` and leaves `*Sha` alone, so the commit the user actually
 * reviewed stays known until they accept the new head with a refresh.
 */
export class ReviewSyncEngine {
  private readonly logger: Logger;

  constructor(private readonly deps: SyncDependencies) {
    this.logger = deps.logger.child('sync');
  }

  /**
   * Probes one branch of the review and persists what changed.
   */
  async probeBranch(review: Review, side: BranchSide): Promise<ProbeResult> {
    const update = await this.probeSide(review, side);
    return this.persistStatus(review, update);
  }

  /**
   * Probes both branches and persists once.
   */
  async probeAll(review: Review): Promise<ProbeResult> {
    const update: BranchStatusUpdate = {};
    for (const side of SIDES) {
      Object.assign(update, await this.probeSide(review, side));
    }
    return this.persistStatus(review, update);
  }

  /**
   * Accepts the pending head of one side: files changed between the old and
   * the new head lose their viewed marker, then the new head becomes `*Sha`.
   * The write only goes through if the head read here is still the pending
   * one, so overlapping refreshes and probes cannot both win.
   *
   * @throws InvalidStateError when nothing is pending, the branch is gone or
   * the pending head changed meanwhile
   */
  async applyRefresh(review: Review, side: BranchSide): Promise<RefreshOutcome> {
    const current = await this.reload(review.id);
    const pendingSha = pendingShaOf(current, side);
    const branch = branchOf(current, side);

    if (branchExistsOf(current, side) === false) {
      throw new InvalidStateError(`Cannot refresh ${side}: branch ${branch} no longer exists`);
    }
    if (pendingSha === null) {
      throw new InvalidStateError(`No pending ${side} change to refresh for ${branch}`);
    }

    const oldSha = shaOf(current, side);
    const rebase = await this.isRebase(oldSha, pendingSha);
    const changedFiles = await this.deps.git.changedFiles(oldSha, pendingSha);

    const { removedFileViews } = await this.deps.reviews.acceptRefresh(
      current.id,
      side,
      pendingSha,
      changedFiles,
      this.deps.clock.now(),
    );

    this.logger.info(
      `Refreshed ${side} of review ${current.id}: ${oldSha.slice(0, 7)} -> ${pendingSha.slice(0, 7)}` +
        `${rebase ? ' (rebase)' : ''}, ${changedFiles.length} changed, ${removedFileViews.length} unmarked`,
    );

    return { side, oldSha, newSha: pendingSha, rebase, changedFiles, removedFileViews };
  }

  /**
   * Refreshes base then target. Each side stands alone: a failure on one is
   * reported and does not undo the other.
   */
  async refreshBoth(review: Review): Promise<SideRefreshResult[]> {
    const results: SideRefreshResult[] = [];

    for (const side of SIDES) {
      try {
        results.push({ side, ok: true, outcome: await this.applyRefresh(review, side) });
      } catch (error) {
        this.logger.warn(`Refresh of ${side} failed for review ${review.id}: ${describeError(error)}`);
        results.push({ side, ok: false, kind: errorKindOf(error), message: describeError(error) });
      }
    }

    return results;
  }

  /**
   * True when `newSha` is not a descendant of `oldSha`, i.e. history was
   * rewritten (or the branch was recreated somewhere unrelated).
   */
  async isRebase(oldSha: string, newSha: string): Promise<boolean> {
    if (oldSha === newSha) return false;
    return !(await this.deps.git.isAncestor(oldSha, newSha));
  }

  /**
   * Pending changes of the stored review and whether accepting each would be a rebase.
   */
  async analyzeDrift(review: Review): Promise<DriftReport> {
    const current = await this.reload(review.id);

    const driftOf = async (side: BranchSide): Promise<SideDrift | null> => {
      const pendingSha = pendingShaOf(current, side);
      if (pendingSha === null) return null;

      const currentSha = shaOf(current, side);
      return {
        side,
        branch: branchOf(current, side),
        currentSha,
        pendingSha,
        rebase: await this.isRebase(currentSha, pendingSha),
      };
    };

    return {
      base: await driftOf('base'),
      target: await driftOf('target'),
      baseBranchExists: current.baseBranchExists,
      targetBranchExists: current.targetBranchExists,
    };
  }

  /**
   * Creates a new review bound to the current heads of both branches and
   * copies every comment onto it. No file is marked viewed in the copy, even
   * when its content did not change.
   */
  async duplicateFromCurrentHeads(review: Review): Promise<Review> {
    const source = await this.reload(review.id);

    const baseSha = await this.deps.git.resolveBranch(source.baseBranch);
    if (baseSha === null) {
      throw new InvalidStateError(`Cannot duplicate: branch ${source.baseBranch} no longer exists`);
    }
    const targetSha = await this.deps.git.resolveBranch(source.targetBranch);
    if (targetSha === null) {
      throw new InvalidStateError(`Cannot duplicate: branch ${source.targetBranch} no longer exists`);
    }

    const now = this.deps.clock.now();
    const duplicate: Review = {
      id: nanoid(12),
      baseBranch: source.baseBranch,
      targetBranch: source.targetBranch,
      baseSha,
      targetSha,
      baseShaChanged: null,
      targetShaChanged: null,
      baseBranchExists: true,
      targetBranchExists: true,
      createdAt: now,
      updatedAt: now,
    };

    const copied: Comment[] = (await this.deps.comments.listForReview(source.id)).map((comment) => ({
      ...comment,
      id: nanoid(12),
      reviewId: duplicate.id,
    }));

    await this.deps.reviews.createWithComments(duplicate, copied);

    this.logger.info(`Duplicated review ${source.id} as ${duplicate.id} with ${copied.length} comment(s)`);

    return duplicate;
  }

  private async probeSide(review: Review, side: BranchSide): Promise<BranchStatusUpdate> {
    const currentSha = await this.deps.git.resolveBranch(branchOf(review, side));

    if (currentSha === null) {
      return statusFor(side, false, null);
    }

    return statusFor(side, true, currentSha === shaOf(review, side) ? null : currentSha);
  }

  private async persistStatus(review: Review, update: BranchStatusUpdate): Promise<ProbeResult> {
    const next: Review = { ...review, ...update };
    const changed =
      next.baseShaChanged !== review.baseShaChanged ||
      next.targetShaChanged !== review.targetShaChanged ||
      next.baseBranchExists !== review.baseBranchExists ||
      next.targetBranchExists !== review.targetBranchExists;

    if (!changed) {
      return { review, changed: false };
    }

    const updatedAt = this.deps.clock.now();
    await this.deps.reviews.updateBranchStatus(review.id, update, updatedAt);

    this.logger.info(
      `Branch status of review ${review.id}: base exists=${next.baseBranchExists} changed=${next.baseShaChanged ?? '-'}, ` +
        `target exists=${next.targetBranchExists} changed=${next.targetShaChanged ?? '-'}`,
    );

    return { review: { ...next, updatedAt }, changed: true };
  }

  private async reload(id: string): Promise<Review> {
    const review = await this.deps.reviews.get(id);
    if (!review) {
      throw new NotFoundError('Review', id);
    }
    return review;
  }
}
