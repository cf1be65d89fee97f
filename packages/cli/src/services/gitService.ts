import { describeError } from '../errors';
import type { AppEvent } from '../events/event';
import { AppEventService, type ServiceContext } from './service';

/**
 * Loads branch lists and diffs. Load failures end up in the loading state of
 * the view that asked, not in an error notice.
 */
export class GitService extends AppEventService {
  readonly name = 'git';
  protected readonly eventTypes = new Set<AppEvent['type']>(['review_create_open', 'git_branches_load', 'git_diff_load']);

  protected handleAppEvent(event: AppEvent, context: ServiceContext): AppEvent[] {
    switch (event.type) {
      case 'review_create_open':
        return [{ type: 'git_branches_load' }];
      case 'git_branches_load':
        return this.loadBranches(context);
      case 'git_diff_load':
        return this.loadDiff(event.reviewId, event.baseSha, event.targetSha, context);
      default:
        return [];
    }
  }

  private loadBranches(context: ServiceContext): AppEvent[] {
    context.spawn('load branches', async () => {
      try {
        const branches = await context.git.listBranches();
        return [{ type: 'git_branches_loading_state', state: { status: 'loaded', data: branches } }];
      } catch (error) {
        context.logger.error(`Failed to list branches: ${describeError(error)}`);
        return [{ type: 'git_branches_loading_state', state: { status: 'error', message: describeError(error) } }];
      }
    });

    return [{ type: 'git_branches_loading_state', state: { status: 'loading' } }];
  }

  private loadDiff(reviewId: string, baseSha: string, targetSha: string, context: ServiceContext): AppEvent[] {
    context.spawn('load diff', async () => {
      try {
        const files = await context.git.diff(baseSha, targetSha);
        context.logger.debug(`Diff ${baseSha.slice(0, 7)}...${targetSha.slice(0, 7)}: ${files.length} file(s)`);
        return [{ type: 'git_diff_loading_state', reviewId, state: { status: 'loaded', data: files } }];
      } catch (error) {
        context.logger.error(`Failed to load diff for review ${reviewId}: ${describeError(error)}`);
        return [{ type: 'git_diff_loading_state', reviewId, state: { status: 'error', message: describeError(error) } }];
      }
    });

    return [{ type: 'git_diff_loading_state', reviewId, state: { status: 'loading' } }];
  }
}
