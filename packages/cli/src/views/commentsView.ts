import type { Comment, CommentTarget, LoadingState } from '@local-review/shared';
import type { AppEvent } from '../events/event';
import { isPrintable, type KeyInput } from '../keyboard/keys';
import { findBinding, KEY, type Keybinding } from '../keyboard/keymap';
import { describeTarget } from '../services/commentService';
import { clampIndex, SELECTION_INDICATOR, type View, type ViewContext, type ViewRender } from './view';

type CommentsAction = 'focus' | 'submit' | 'up' | 'down' | 'resolve' | 'resolve_all' | 'close';
export type CommentsFocus = 'input' | 'list';

const BINDINGS: Keybinding<CommentsAction>[] = [
  { id: 'focus', label: 'Switch between input and list', combos: KEY.tab },
  { id: 'submit', label: 'Add comment', combos: KEY.enter },
  { id: 'up', label: 'Previous comment', combos: KEY.up },
  { id: 'down', label: 'Next comment', combos: KEY.down },
  { id: 'resolve', label: 'Toggle resolved', combos: [{ key: 'r', displayKeys: ['r'] }] },
  { id: 'resolve_all', label: 'Toggle resolved for all', combos: [{ key: 'R', displayKeys: ['R'] }] },
  { id: 'close', label: 'Close', combos: KEY.escape },
];

// Keys that act on the list and would otherwise be typed into the input
const LIST_ACTIONS: ReadonlySet<CommentsAction> = new Set(['up', 'down', 'resolve', 'resolve_all']);

export function sameTarget(a: CommentTarget, b: CommentTarget): boolean {
  return a.reviewId === b.reviewId && a.filePath === b.filePath && a.lineNumber === b.lineNumber;
}

export class CommentsView implements View {
  readonly viewType = 'comments';

  private comments: LoadingState<Comment[]> = { status: 'init' };
  private focus: CommentsFocus = 'input';
  private input = '';
  private selected = 0;
  private error: string | null = null;

  constructor(readonly target: CommentTarget) {}

  get currentFocus(): CommentsFocus {
    return this.focus;
  }

  get inputText(): string {
    return this.input;
  }

  handleKey(key: KeyInput, context: ViewContext): void {
    const action = findBinding(key, BINDINGS);

    if (this.focus === 'input' && (action === null || LIST_ACTIONS.has(action))) {
      this.edit(key);
      return;
    }

    switch (action) {
      case 'focus':
        this.focus = this.focus === 'input' ? 'list' : 'input';
        break;
      case 'submit':
        if (this.focus === 'input') {
          context.publish({ type: 'comment_create', target: this.target, content: this.input });
        }
        break;
      case 'up':
      case 'down':
        this.selected = clampIndex(this.selected, action === 'up' ? -1 : 1, this.commentList().length);
        break;
      case 'resolve': {
        const comment = this.commentList()[this.selected];
        if (comment) {
          context.publish({ type: 'comment_toggle_resolved', target: this.target, commentId: comment.id });
        }
        break;
      }
      case 'resolve_all':
        context.publish({ type: 'comments_toggle_all_resolved', target: this.target });
        break;
      case 'close':
        context.publish({ type: 'view_close' });
        break;
      case null:
        break;
    }
  }

  handleAppEvent(event: AppEvent): void {
    switch (event.type) {
      case 'comments_loading_state':
        if (!sameTarget(event.target, this.target)) return;
        // Keep showing the old list while it reloads
        if (event.state.status === 'loading' && this.comments.status === 'loaded') return;
        this.comments = event.state;
        this.selected = clampIndex(this.selected, 0, this.commentList().length);
        break;
      case 'comment_create_error':
        if (sameTarget(event.target, this.target)) this.error = event.message;
        break;
      case 'comment_created':
        if (sameTarget(event.comment, this.target)) {
          this.input = '';
          this.error = null;
        }
        break;
    }
  }

  keybindings(): Keybinding[] {
    return BINDINGS;
  }

  render(): ViewRender {
    const cursor = this.focus === 'input' ? '_' : '';
    const lines = [`${this.focus === 'input' ? SELECTION_INDICATOR : ' '} New comment: ${this.input}${cursor}`];
    if (this.error) lines.push(`  Error: ${this.error}`);
    lines.push('');

    switch (this.comments.status) {
      case 'init':
      case 'loading':
        lines.push('Loading comments...');
        break;
      case 'error':
        lines.push(`Failed to load comments: ${this.comments.message}`);
        break;
      case 'not_found':
        lines.push('No comments.');
        break;
      case 'loaded':
        if (this.comments.data.length === 0) lines.push('No comments yet.');
        this.comments.data.forEach((comment, index) => {
          const indicator = this.focus === 'list' && index === this.selected ? SELECTION_INDICATOR : ' ';
          const state = comment.resolved ? '[x]' : '[ ]';
          lines.push(`${indicator} ${state} ${comment.content}  ${comment.createdAt.slice(0, 16).replace('T', ' ')}`);
        });
        break;
    }

    return { title: `Comments on ${describeTarget(this.target)}`, lines, modal: false };
  }

  private commentList(): Comment[] {
    return this.comments.status === 'loaded' ? this.comments.data : [];
  }

  private edit(key: KeyInput): void {
    if (key.key === 'backspace' && !key.ctrl && !key.alt) {
      this.input = [...this.input].slice(0, -1).join('');
    } else if (isPrintable(key)) {
      this.input += key.key;
    }
  }
}
