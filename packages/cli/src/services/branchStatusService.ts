import { describeError } from '../errors';
import type { AppEvent } from '../events/event';
import { AppEventService, type ServiceContext } from './service';

/**
 * Probes the branches of every review and records drift and missing branches.
 */
export class BranchStatusService extends AppEventService {
  readonly name = 'branch_status';
  protected readonly eventTypes: ReadonlySet<AppEvent['type']>;

  constructor(checkOnStart: boolean) {
    super();
    this.eventTypes = new Set<AppEvent['type']>(
      checkOnStart ? ['init', 'reviews_branch_status_check'] : ['reviews_branch_status_check'],
    );
  }

  protected handleAppEvent(event: AppEvent, context: ServiceContext): AppEvent[] {
    if (event.type === 'init') {
      return [{ type: 'reviews_branch_status_check' }];
    }
    if (event.type !== 'reviews_branch_status_check') {
      return [];
    }

    context.spawn('check branch status', async () => {
      const reviews = await context.repositories.reviews.list();
      let updated = 0;

      for (const review of reviews) {
        try {
          const { changed } = await context.sync.probeAll(review);
          if (changed) updated++;
        } catch (error) {
          // One unreadable review must not stop the others
          context.logger.warn(`Branch status check failed for review ${review.id}: ${describeError(error)}`);
        }
      }

      context.logger.info(`Checked branch status of ${reviews.length} review(s), ${updated} updated`);

      const events: AppEvent[] = [{ type: 'reviews_branch_status_checked', updated }];
      if (updated > 0) events.push({ type: 'reviews_load' });
      return events;
    });

    return [];
  }
}
