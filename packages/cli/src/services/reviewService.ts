import { nanoid } from 'nanoid';
import type { Review, ReviewCreateData } from '@local-review/shared';
import { describeError, ValidationError } from '../errors';
import type { AppEvent } from '../events/event';
import { AppEventService, type ServiceContext } from './service';

/**
 * Checks the create form. Returns the trimmed data.
 *
 * @throws ValidationError
 */
export function validateReviewCreateData(data: ReviewCreateData): ReviewCreateData {
  const baseBranch = data.baseBranch.trim();
  const targetBranch = data.targetBranch.trim();

  if (!baseBranch) throw new ValidationError('Base branch is required');
  if (!targetBranch) throw new ValidationError('Target branch is required');
  if (baseBranch === targetBranch) {
    throw new ValidationError('Base and target branch must differ');
  }

  return { baseBranch, targetBranch };
}

/** source of the error event published when creating a review fails */
export const CREATE_REVIEW_TASK = 'create review';

export class ReviewService extends AppEventService {
  readonly name = 'reviews';
  protected readonly eventTypes = new Set<AppEvent['type']>([
    'init',
    'reviews_load',
    'review_load',
    'review_details_open',
    'review_create_submit',
    'review_delete',
  ]);

  protected handleAppEvent(event: AppEvent, context: ServiceContext): AppEvent[] {
    switch (event.type) {
      case 'init':
        return [{ type: 'reviews_load' }];
      case 'reviews_load':
        return this.loadReviews(context);
      case 'review_details_open':
      case 'review_load':
        return this.loadReview(event.reviewId, context);
      case 'review_create_submit':
        return this.createReview(event.data, context);
      case 'review_delete':
        return this.deleteReview(event.reviewId, context);
      default:
        return [];
    }
  }

  private loadReviews(context: ServiceContext): AppEvent[] {
    context.spawn('load reviews', async () => {
      try {
        const reviews = await context.repositories.reviews.list();
        return [{ type: 'reviews_loading_state', state: { status: 'loaded', data: reviews } }];
      } catch (error) {
        context.logger.error(`Failed to load reviews: ${describeError(error)}`);
        return [{ type: 'reviews_loading_state', state: { status: 'error', message: describeError(error) } }];
      }
    });

    return [{ type: 'reviews_loading_state', state: { status: 'loading' } }];
  }

  private loadReview(reviewId: string, context: ServiceContext): AppEvent[] {
    context.spawn('load review', async () => {
      try {
        const review = await context.repositories.reviews.get(reviewId);
        if (!review) {
          context.logger.warn(`Review not found: ${reviewId}`);
          return [
            { type: 'review_loading_state', reviewId, state: { status: 'not_found' } },
            { type: 'error', kind: 'not_found', message: `Review not found: ${reviewId}`, source: 'load review' },
          ];
        }
        return [{ type: 'review_loading_state', reviewId, state: { status: 'loaded', data: review } }];
      } catch (error) {
        return [
          { type: 'review_loading_state', reviewId, state: { status: 'error', message: describeError(error) } },
        ];
      }
    });

    return [{ type: 'review_loading_state', reviewId, state: { status: 'loading' } }];
  }

  private createReview(data: ReviewCreateData, context: ServiceContext): AppEvent[] {
    let valid: ReviewCreateData;
    try {
      valid = validateReviewCreateData(data);
    } catch (error) {
      return [{ type: 'review_create_error', message: describeError(error) }];
    }

    context.spawn(CREATE_REVIEW_TASK, async () => {
      const baseSha = await context.git.resolveBranch(valid.baseBranch);
      if (baseSha === null) {
        return [{ type: 'review_create_error', message: `Branch ${valid.baseBranch} does not exist` }];
      }
      const targetSha = await context.git.resolveBranch(valid.targetBranch);
      if (targetSha === null) {
        return [{ type: 'review_create_error', message: `Branch ${valid.targetBranch} does not exist` }];
      }

      const now = context.clock.now();
      const review: Review = {
        id: nanoid(12),
        baseBranch: valid.baseBranch,
        targetBranch: valid.targetBranch,
        baseSha,
        targetSha,
        baseShaChanged: null,
        targetShaChanged: null,
        baseBranchExists: true,
        targetBranchExists: true,
        createdAt: now,
        updatedAt: now,
      };

      await context.repositories.reviews.create(review);
      context.logger.info(`Created review ${review.id}: ${review.baseBranch} -> ${review.targetBranch}`);

      return [{ type: 'review_created', review }, { type: 'reviews_load' }];
    });

    return [];
  }

  private deleteReview(reviewId: string, context: ServiceContext): AppEvent[] {
    context.spawn('delete review', async () => {
      const deleted = await context.repositories.reviews.delete(reviewId);
      if (!deleted) {
        context.logger.warn(`Tried to delete missing review ${reviewId}`);
        return [
          { type: 'error', kind: 'not_found', message: `Review not found: ${reviewId}`, source: 'delete review' },
          { type: 'reviews_load' },
        ];
      }

      context.logger.info(`Deleted review ${reviewId}`);
      return [{ type: 'review_deleted', reviewId }, { type: 'reviews_load' }];
    });

    return [];
  }
}
