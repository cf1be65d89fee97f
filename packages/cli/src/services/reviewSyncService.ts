import type { BranchSide, Review } from '@local-review/shared';
import { NotFoundError } from '../errors';
import type { AppEvent } from '../events/event';
import type { SideRefreshResult } from '../sync/types';
import { AppEventService, type ServiceContext } from './service';

/**
 * Bridges the refresh chooser to the sync engine.
 */
export class ReviewSyncService extends AppEventService {
  readonly name = 'review_sync';
  protected readonly eventTypes = new Set<AppEvent['type']>(['review_refresh_open', 'review_refresh', 'review_duplicate']);

  protected handleAppEvent(event: AppEvent, context: ServiceContext): AppEvent[] {
    switch (event.type) {
      case 'review_refresh_open':
        return this.analyze(event.reviewId, context);
      case 'review_refresh':
        return this.refresh(event.reviewId, event.side, context);
      case 'review_duplicate':
        return this.duplicate(event.reviewId, context);
      default:
        return [];
    }
  }

  private analyze(reviewId: string, context: ServiceContext): AppEvent[] {
    context.spawn('analyze drift', async () => {
      const review = await loadReview(reviewId, context);
      // Probe first so the chooser reflects the branches as they are now
      const { changed } = await context.sync.probeAll(review);
      const report = await context.sync.analyzeDrift(review);

      const events: AppEvent[] = [{ type: 'review_drift_analyzed', reviewId, report }];
      if (changed) events.push({ type: 'reviews_load' }, { type: 'review_load', reviewId });
      return events;
    });

    return [];
  }

  private refresh(reviewId: string, side: BranchSide | 'both', context: ServiceContext): AppEvent[] {
    context.spawn('refresh review', async () => {
      const review = await loadReview(reviewId, context);

      const results: SideRefreshResult[] =
        side === 'both'
          ? await context.sync.refreshBoth(review)
          : [{ side, ok: true, outcome: await context.sync.applyRefresh(review, side) }];

      const events: AppEvent[] = [];
      const outcomes = results.flatMap((result) => (result.ok ? [result.outcome] : []));
      const failures = results.flatMap((result) => (result.ok ? [] : [result]));

      if (outcomes.length > 0) {
        events.push({ type: 'review_refreshed', reviewId, outcomes });
      }
      if (failures.length > 0) {
        events.push(
          { type: 'review_refresh_failed', reviewId, results: failures },
          {
            type: 'error',
            kind: failures[0].kind,
            message: failures.map((failure) => failure.message).join('; '),
            source: 'refresh review',
          },
        );
      }

      events.push({ type: 'reviews_load' }, { type: 'review_load', reviewId });
      return events;
    });

    return [];
  }

  private duplicate(reviewId: string, context: ServiceContext): AppEvent[] {
    context.spawn('duplicate review', async () => {
      const review = await loadReview(reviewId, context);
      const duplicate = await context.sync.duplicateFromCurrentHeads(review);
      return [{ type: 'review_duplicated', sourceId: reviewId, review: duplicate }, { type: 'reviews_load' }];
    });

    return [];
  }
}

async function loadReview(reviewId: string, context: ServiceContext): Promise<Review> {
  const review = await context.repositories.reviews.get(reviewId);
  if (!review) {
    throw new NotFoundError('Review', reviewId);
  }
  return review;
}
