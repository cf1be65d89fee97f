import { inputEvent, type AppEvent } from '../events/event';
import { CommentsView } from '../views/commentsView';
import { ConfirmationDialog } from '../views/confirmationDialog';
import { HelpModal } from '../views/helpModal';
import { RefreshChooserView } from '../views/refreshChooserView';
import { ReviewCreateView } from '../views/reviewCreateView';
import { ReviewDetailsView } from '../views/reviewDetailsView';
import type { View } from '../views/view';
import type { GlobalHandler } from './app';

/**
 * The view an open request asks for, or null when the event opens nothing.
 */
export function viewForEvent(event: AppEvent): View | null {
  switch (event.type) {
    case 'review_create_open':
      return new ReviewCreateView();
    case 'review_details_open':
      return new ReviewDetailsView(event.reviewId);
    case 'comments_open':
      return new CommentsView(event.target);
    case 'review_refresh_open':
      return new RefreshChooserView(event.reviewId);
    case 'review_delete_confirm':
      return new ConfirmationDialog({
        title: 'Delete review',
        message: 'Delete this review with all its comments and viewed files?',
        onConfirm: [{ type: 'review_delete', reviewId: event.reviewId }],
      });
    case 'help_open':
      return new HelpModal(event.keybindings);
    case 'error':
      // Validation problems are shown inline by the form that raised them
      return event.kind === 'validation' ? null : ConfirmationDialog.errorNotice(event.message);
    default:
      return null;
  }
}

/**
 * Quit, view open and close requests, and error notices.
 */
export const navigationHandler: GlobalHandler = (event, context) => {
  if (event.kind !== 'app') return;
  const appEvent = event.event;

  switch (appEvent.type) {
    case 'quit':
      context.quit();
      return;
    case 'view_close':
      context.stack.pop();
      return;
    case 'help_key_selected':
      // Replayed as input, so it reaches whatever view is on top once the help modal is gone
      context.publishEvent(inputEvent({ type: 'key', key: appEvent.key }));
      return;
  }

  const view = viewForEvent(appEvent);
  if (view) {
    context.stack.push(view);
  }
};
