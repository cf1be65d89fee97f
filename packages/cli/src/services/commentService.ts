import { nanoid } from 'nanoid';
import type { Comment, CommentTarget } from '@local-review/shared';
import { describeError, NotFoundError, ValidationError } from '../errors';
import type { AppEvent } from '../events/event';
import { AppEventService, type ServiceContext } from './service';

/**
 * Checks a new comment's text. Returns it trimmed.
 *
 * @throws ValidationError
 */
export function validateCommentContent(content: string): string {
  const trimmed = content.trim();
  if (!trimmed) {
    throw new ValidationError('Comment cannot be empty');
  }
  return trimmed;
}

export class CommentService extends AppEventService {
  readonly name = 'comments';
  protected readonly eventTypes = new Set<AppEvent['type']>([
    'comments_open',
    'comments_load',
    'comment_create',
    'comment_toggle_resolved',
    'comments_toggle_all_resolved',
    'comment_metadata_load',
  ]);

  protected handleAppEvent(event: AppEvent, context: ServiceContext): AppEvent[] {
    switch (event.type) {
      case 'comments_open':
        return [{ type: 'comments_load', target: event.target }];
      case 'comments_load':
        return this.loadComments(event.target, context);
      case 'comment_create':
        return this.createComment(event.target, event.content, context);
      case 'comment_toggle_resolved':
        return this.toggleResolved(event.target, event.commentId, context);
      case 'comments_toggle_all_resolved':
        return this.toggleAllResolved(event.target, context);
      case 'comment_metadata_load': {
        const { reviewId } = event;
        context.spawn('load comment metadata', async () => [
          { type: 'comment_metadata_loaded', reviewId, metadata: await context.repositories.comments.metadata(reviewId) },
        ]);
        return [];
      }
      default:
        return [];
    }
  }

  private loadComments(target: CommentTarget, context: ServiceContext): AppEvent[] {
    context.spawn('load comments', async () => {
      try {
        const comments = await context.repositories.comments.listForTarget(target);
        return [{ type: 'comments_loading_state', target, state: { status: 'loaded', data: comments } }];
      } catch (error) {
        return [{ type: 'comments_loading_state', target, state: { status: 'error', message: describeError(error) } }];
      }
    });

    return [{ type: 'comments_loading_state', target, state: { status: 'loading' } }];
  }

  private createComment(target: CommentTarget, content: string, context: ServiceContext): AppEvent[] {
    let text: string;
    try {
      text = validateCommentContent(content);
    } catch (error) {
      return [{ type: 'comment_create_error', target, message: describeError(error) }];
    }

    context.spawn('create comment', async () => {
      const comment: Comment = {
        id: nanoid(12),
        reviewId: target.reviewId,
        filePath: target.filePath,
        lineNumber: target.lineNumber,
        content: text,
        resolved: false,
        createdAt: context.clock.now(),
      };

      await context.repositories.comments.create(comment);
      context.logger.info(`Added comment ${comment.id} on ${describeTarget(target)}`);

      return [
        { type: 'comment_created', comment },
        { type: 'comments_load', target },
        { type: 'comment_metadata_load', reviewId: target.reviewId },
      ];
    });

    return [];
  }

  private toggleResolved(target: CommentTarget, commentId: string, context: ServiceContext): AppEvent[] {
    context.spawn('toggle comment resolved', async () => {
      const comment = await context.repositories.comments.get(commentId);
      if (!comment) {
        throw new NotFoundError('Comment', commentId);
      }

      await context.repositories.comments.setResolved(commentId, !comment.resolved);
      return [{ type: 'comments_load', target }];
    });

    return [];
  }

  private toggleAllResolved(target: CommentTarget, context: ServiceContext): AppEvent[] {
    context.spawn('toggle all comments resolved', async () => {
      const comments = await context.repositories.comments.listForTarget(target);
      if (comments.length === 0) return [];

      // All resolved: reopen them. Otherwise resolve the rest.
      const resolved = !comments.every((comment) => comment.resolved);
      const count = await context.repositories.comments.setResolvedForTarget(target, resolved);
      context.logger.info(`Marked ${count} comment(s) ${resolved ? 'resolved' : 'unresolved'} on ${describeTarget(target)}`);

      return [{ type: 'comments_load', target }];
    });

    return [];
  }
}

export function describeTarget(target: CommentTarget): string {
  return target.lineNumber === null ? target.filePath : `${target.filePath}:${target.lineNumber}`;
}
