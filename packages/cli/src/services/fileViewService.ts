import type { AppEvent } from '../events/event';
import { AppEventService, type ServiceContext } from './service';

export class FileViewService extends AppEventService {
  readonly name = 'file_views';
  protected readonly eventTypes = new Set<AppEvent['type']>(['file_views_load', 'file_view_toggle']);

  protected handleAppEvent(event: AppEvent, context: ServiceContext): AppEvent[] {
    switch (event.type) {
      case 'file_views_load': {
        const { reviewId } = event;
        context.spawn('load file views', async () => {
          const views = await context.repositories.fileViews.list(reviewId);
          return [{ type: 'file_views_loaded', reviewId, filePaths: views.map((view) => view.filePath) }];
        });
        return [];
      }

      case 'file_view_toggle': {
        const { reviewId, filePath } = event;
        context.spawn('toggle file viewed', async () => {
          const { fileViews } = context.repositories;
          const viewed = !(await fileViews.isViewed(reviewId, filePath));

          if (viewed) {
            await fileViews.markViewed(reviewId, filePath, context.clock.now());
          } else {
            await fileViews.markUnviewed(reviewId, filePath);
          }

          context.logger.debug(`Marked ${filePath} ${viewed ? 'viewed' : 'not viewed'} in review ${reviewId}`);
          return [{ type: 'file_view_toggled', reviewId, filePath, viewed }];
        });
        return [];
      }

      default:
        return [];
    }
  }
}
