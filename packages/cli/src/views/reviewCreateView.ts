import type { LoadingState } from '@local-review/shared';
import { describeError } from '../errors';
import type { AppEvent } from '../events/event';
import type { KeyInput } from '../keyboard/keys';
import { findBinding, KEY, type Keybinding } from '../keyboard/keymap';
import { CREATE_REVIEW_TASK, validateReviewCreateData } from '../services/reviewService';
import { SELECTION_INDICATOR, wrapIndex, type View, type ViewContext, type ViewRender } from './view';

type CreateAction = 'switch' | 'up' | 'down' | 'submit' | 'cancel';
type Field = 'base' | 'target';

const BINDINGS: Keybinding<CreateAction>[] = [
  { id: 'switch', label: 'Switch field', combos: KEY.tab },
  { id: 'up', label: 'Previous branch', combos: KEY.up },
  { id: 'down', label: 'Next branch', combos: KEY.down },
  { id: 'submit', label: 'Create review', combos: KEY.enter },
  { id: 'cancel', label: 'Cancel', combos: KEY.escape },
];

const DEFAULT_BASE_BRANCHES = ['main', 'master', 'develop'];

/**
 * Initial base and target selection: a usual trunk name as base and the
 * first other branch as target.
 */
export function defaultSelection(branches: readonly string[]): { base: number; target: number } {
  const trunk = DEFAULT_BASE_BRANCHES.map((name) => branches.indexOf(name)).find((index) => index >= 0);
  const base = trunk ?? 0;
  const target = branches.findIndex((_, index) => index !== base);
  return { base, target: target === -1 ? base : target };
}

export class ReviewCreateView implements View {
  readonly viewType = 'review_create';

  private branches: LoadingState<string[]> = { status: 'init' };
  private field: Field = 'base';
  private selection = { base: 0, target: 0 };
  private error: string | null = null;
  private submitting = false;

  handleKey(key: KeyInput, context: ViewContext): void {
    const action = findBinding(key, BINDINGS);

    switch (action) {
      case 'switch':
        this.field = this.field === 'base' ? 'target' : 'base';
        break;
      case 'up':
      case 'down':
        this.selection[this.field] = wrapIndex(this.selection[this.field], action === 'up' ? -1 : 1, this.branchList().length);
        this.error = null;
        break;
      case 'submit':
        this.submit(context);
        break;
      case 'cancel':
        context.publish({ type: 'view_close' });
        break;
      case null:
        break;
    }
  }

  handleAppEvent(event: AppEvent, context: ViewContext): void {
    switch (event.type) {
      case 'state_update':
        if (this.branches.status !== 'loaded' && event.state.gitBranches.status === 'loaded') {
          this.selection = defaultSelection(event.state.gitBranches.data);
        }
        this.branches = event.state.gitBranches;
        break;
      case 'review_create_error':
        this.error = event.message;
        this.submitting = false;
        break;
      case 'error':
        if (this.submitting && event.source === CREATE_REVIEW_TASK) {
          this.error = event.message;
          this.submitting = false;
        }
        break;
      case 'review_created':
        if (this.submitting) {
          this.submitting = false;
          context.publish({ type: 'view_close' });
        }
        break;
    }
  }

  keybindings(): Keybinding[] {
    return BINDINGS;
  }

  render(): ViewRender {
    const lines: string[] = [];

    switch (this.branches.status) {
      case 'init':
      case 'loading':
        lines.push('Loading branches...');
        break;
      case 'error':
        lines.push(`Failed to load branches: ${this.branches.message}`);
        break;
      case 'not_found':
        lines.push('No branches found.');
        break;
      case 'loaded': {
        const branches = this.branches.data;
        lines.push(
          `${this.field === 'base' ? SELECTION_INDICATOR : ' '} Base:   ${branches[this.selection.base] ?? '-'}`,
          `${this.field === 'target' ? SELECTION_INDICATOR : ' '} Target: ${branches[this.selection.target] ?? '-'}`,
          '',
        );
        branches.forEach((branch, index) => {
          const selected = index === this.selection[this.field];
          lines.push(`${selected ? SELECTION_INDICATOR : ' '} ${branch}`);
        });
        break;
      }
    }

    if (this.submitting) lines.push('', 'Creating review...');
    if (this.error) lines.push('', `Error: ${this.error}`);

    return { title: 'New review', lines, modal: false };
  }

  private branchList(): readonly string[] {
    return this.branches.status === 'loaded' ? this.branches.data : [];
  }

  private submit(context: ViewContext): void {
    if (this.submitting) return;

    const branches = this.branchList();
    const baseBranch = branches[this.selection.base];
    const targetBranch = branches[this.selection.target];
    if (baseBranch === undefined || targetBranch === undefined) {
      this.error = 'No branches to choose from';
      return;
    }

    try {
      const data = validateReviewCreateData({ baseBranch, targetBranch });
      this.error = null;
      this.submitting = true;
      context.publish({ type: 'review_create_submit', data });
    } catch (error) {
      this.error = describeError(error);
    }
  }
}
