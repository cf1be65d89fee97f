import type { LoadingState, Review } from '@local-review/shared';
import type { AppEvent } from '../events/event';
import type { KeyInput } from '../keyboard/keys';
import { findBinding, KEY, type Keybinding } from '../keyboard/keymap';
import { clampIndex, SELECTION_INDICATOR, type View, type ViewContext, type ViewRender } from './view';

type MainAction = 'quit' | 'new' | 'up' | 'down' | 'open' | 'delete' | 'check' | 'help';

const BINDINGS: Keybinding<MainAction>[] = [
  {
    id: 'quit',
    label: 'Quit',
    combos: [
      { key: 'q', displayKeys: ['q'] },
      { key: 'c', displayKeys: ['Ctrl', 'c'], ctrl: true },
    ],
  },
  { id: 'new', label: 'New review', combos: [{ key: 'n', displayKeys: ['n'] }] },
  { id: 'up', label: 'Select previous', combos: KEY.up },
  { id: 'down', label: 'Select next', combos: KEY.down },
  {
    id: 'open',
    label: 'Open review',
    combos: [{ key: 'o', displayKeys: ['o'] }, ...KEY.enter, { key: ' ', displayKeys: ['Space'] }],
  },
  { id: 'delete', label: 'Delete review', combos: [{ key: 'd', displayKeys: ['d'] }] },
  { id: 'check', label: 'Check branch status', combos: [{ key: 's', displayKeys: ['s'] }] },
  { id: 'help', label: 'Help', combos: KEY.help },
];

/**
 * Marker shown before a review: a branch is gone, or a branch moved since
 * the review was last refreshed.
 */
export function reviewMarker(review: Review): string {
  if (review.baseBranchExists === false || review.targetBranchExists === false) return '✗';
  if (review.baseShaChanged !== null || review.targetShaChanged !== null) return '↻';
  return ' ';
}

export function formatReviewLine(review: Review): string {
  return (
    `${reviewMarker(review)} ${review.baseBranch} → ${review.targetBranch}  ` +
    `${review.baseSha.slice(0, 7)}..${review.targetSha.slice(0, 7)}  ${review.createdAt.slice(0, 10)}`
  );
}

/**
 * Review list. Always at the bottom of the view stack.
 */
export class MainView implements View {
  readonly viewType = 'main';

  private reviews: LoadingState<Review[]> = { status: 'init' };
  private selected = 0;
  private status: string | null = null;

  get selectedReview(): Review | null {
    return this.reviews.status === 'loaded' ? (this.reviews.data[this.selected] ?? null) : null;
  }

  handleKey(key: KeyInput, context: ViewContext): void {
    const action = findBinding(key, BINDINGS);
    const review = this.selectedReview;

    switch (action) {
      case 'quit':
        context.publish({ type: 'quit' });
        break;
      case 'new':
        context.publish({ type: 'review_create_open' });
        break;
      case 'up':
      case 'down':
        this.selected = clampIndex(this.selected, action === 'up' ? -1 : 1, this.reviewCount());
        break;
      case 'open':
        if (review) context.publish({ type: 'review_details_open', reviewId: review.id });
        break;
      case 'delete':
        if (review) context.publish({ type: 'review_delete_confirm', reviewId: review.id });
        break;
      case 'check':
        this.status = 'Checking branches...';
        context.publish({ type: 'reviews_branch_status_check' });
        break;
      case 'help':
        context.publish({ type: 'help_open', keybindings: this.keybindings() });
        break;
      case null:
        break;
    }
  }

  handleAppEvent(event: AppEvent): void {
    switch (event.type) {
      case 'state_update':
        this.reviews = event.state.reviews;
        this.selected = clampIndex(this.selected, 0, this.reviewCount());
        break;
      case 'reviews_branch_status_checked':
        this.status = event.updated === 0 ? 'Branches up to date' : `${event.updated} review(s) updated`;
        break;
      case 'review_created':
        this.status = `Created review ${event.review.baseBranch} → ${event.review.targetBranch}`;
        break;
      case 'review_deleted':
        this.status = 'Review deleted';
        break;
      case 'review_duplicated':
        this.status = `Duplicated review as ${event.review.id}`;
        break;
    }
  }

  keybindings(): Keybinding[] {
    return BINDINGS;
  }

  render(): ViewRender {
    const lines: string[] = [];

    switch (this.reviews.status) {
      case 'init':
      case 'loading':
        lines.push('Loading reviews...');
        break;
      case 'error':
        lines.push(`Failed to load reviews: ${this.reviews.message}`);
        break;
      case 'not_found':
        lines.push('No reviews found.');
        break;
      case 'loaded':
        if (this.reviews.data.length === 0) {
          lines.push('No reviews yet. Press n to create one.');
        }
        this.reviews.data.forEach((review, index) => {
          const indicator = index === this.selected ? SELECTION_INDICATOR : ' ';
          lines.push(`${indicator} ${formatReviewLine(review)}`);
        });
        break;
    }

    if (this.status) {
      lines.push('', this.status);
    }

    return { title: 'Reviews', lines, modal: false };
  }

  private reviewCount(): number {
    return this.reviews.status === 'loaded' ? this.reviews.data.length : 0;
  }
}
