import type {
  BranchSide,
  Comment,
  CommentMetadata,
  CommentTarget,
  DiffFile,
  LoadingState,
  Review,
  ReviewCreateData,
} from '@local-review/shared';
import type { AppErrorPayload } from '../errors';
import type { InputEvent, KeyInput } from '../keyboard/keys';
import type { Keybinding } from '../keyboard/keymap';
import type { DriftReport, RefreshOutcome, SideRefreshResult } from '../sync/types';

/**
 * Centralized application state shared across views.
 */
export interface AppState {
  reviews: LoadingState<Review[]>;
  gitBranches: LoadingState<string[]>;
}

/**
 * Application events. Payloads are frozen when published and must not be
 * mutated by any consumer.
 */
export type AppEvent =
  | { type: 'init' }
  | { type: 'quit' }
  | { type: 'view_close' }
  | AppErrorPayload

  // Reviews list
  | { type: 'reviews_load' }
  | { type: 'reviews_loading_state'; state: LoadingState<Review[]> }
  | { type: 'reviews_branch_status_check' }
  | { type: 'reviews_branch_status_checked'; updated: number }

  // Single review
  | { type: 'review_load'; reviewId: string }
  | { type: 'review_loading_state'; reviewId: string; state: LoadingState<Review> }
  | { type: 'review_create_open' }
  | { type: 'review_create_submit'; data: ReviewCreateData }
  | { type: 'review_created'; review: Review }
  | { type: 'review_create_error'; message: string }
  | { type: 'review_delete_confirm'; reviewId: string }
  | { type: 'review_delete'; reviewId: string }
  | { type: 'review_deleted'; reviewId: string }
  | { type: 'review_details_open'; reviewId: string }

  // Refresh and duplicate
  | { type: 'review_refresh_open'; reviewId: string }
  | { type: 'review_drift_analyzed'; reviewId: string; report: DriftReport }
  | { type: 'review_refresh'; reviewId: string; side: BranchSide | 'both' }
  | { type: 'review_refreshed'; reviewId: string; outcomes: RefreshOutcome[] }
  | { type: 'review_refresh_failed'; reviewId: string; results: SideRefreshResult[] }
  | { type: 'review_duplicate'; reviewId: string }
  | { type: 'review_duplicated'; sourceId: string; review: Review }

  // Git
  | { type: 'git_branches_load' }
  | { type: 'git_branches_loading_state'; state: LoadingState<string[]> }
  | { type: 'git_diff_load'; reviewId: string; baseSha: string; targetSha: string }
  | { type: 'git_diff_loading_state'; reviewId: string; state: LoadingState<DiffFile[]> }

  // File views
  | { type: 'file_views_load'; reviewId: string }
  | { type: 'file_views_loaded'; reviewId: string; filePaths: string[] }
  | { type: 'file_view_toggle'; reviewId: string; filePath: string }
  | { type: 'file_view_toggled'; reviewId: string; filePath: string; viewed: boolean }

  // Comments
  | { type: 'comments_open'; target: CommentTarget }
  | { type: 'comments_load'; target: CommentTarget }
  | { type: 'comments_loading_state'; target: CommentTarget; state: LoadingState<Comment[]> }
  | { type: 'comment_create'; target: CommentTarget; content: string }
  | { type: 'comment_created'; comment: Comment }
  | { type: 'comment_create_error'; target: CommentTarget; message: string }
  | { type: 'comment_toggle_resolved'; target: CommentTarget; commentId: string }
  | { type: 'comments_toggle_all_resolved'; target: CommentTarget }
  | { type: 'comment_metadata_load'; reviewId: string }
  | { type: 'comment_metadata_loaded'; reviewId: string; metadata: CommentMetadata }

  // Help and dialogs
  | { type: 'help_open'; keybindings: Keybinding[] }
  | { type: 'help_key_selected'; key: KeyInput }

  // State
  | { type: 'state_update'; state: AppState };

export type Event =
  | { kind: 'tick' }
  | { kind: 'input'; input: InputEvent }
  | { kind: 'app'; event: AppEvent };

export const tickEvent = (): Event => ({ kind: 'tick' });

export const inputEvent = (input: InputEvent): Event => ({ kind: 'input', input });

export const appEvent = (event: AppEvent): Event => ({ kind: 'app', event });

/**
 * Recursively freezes a payload so every consumer sees the value that was published.
 */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
