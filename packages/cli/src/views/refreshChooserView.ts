import type { AppEvent } from '../events/event';
import type { KeyInput } from '../keyboard/keys';
import { findBinding, KEY, type Keybinding } from '../keyboard/keymap';
import type { DriftReport, SideDrift } from '../sync/types';
import type { View, ViewContext, ViewRender } from './view';

type RefreshAction = 'base' | 'target' | 'both' | 'duplicate' | 'cancel' | 'help';

const BINDINGS: Keybinding<RefreshAction>[] = [
  { id: 'base', label: 'Refresh base', combos: [{ key: 'b', displayKeys: ['b'] }] },
  { id: 'target', label: 'Refresh target', combos: [{ key: 't', displayKeys: ['t'] }] },
  { id: 'both', label: 'Refresh both', combos: [{ key: 'a', displayKeys: ['a'] }] },
  { id: 'duplicate', label: 'Duplicate from current heads', combos: [{ key: 'd', displayKeys: ['d'] }] },
  { id: 'cancel', label: 'Cancel', combos: KEY.escape },
  { id: 'help', label: 'Help', combos: KEY.help },
];

export function describeDrift(label: string, drift: SideDrift | null, exists: boolean | null): string {
  if (exists === false) return `${label}: branch no longer exists`;
  if (!drift) return `${label}: up to date`;

  const move = `${drift.branch} ${drift.currentSha.slice(0, 7)} → ${drift.pendingSha.slice(0, 7)}`;
  return drift.rebase
    ? `${label}: ${move} (history rewritten, viewed files may need a second look)`
    : `${label}: ${move} (fast-forward)`;
}

/**
 * Lets the user accept moved heads in place, or start over with a copy of
 * the review bound to the current heads.
 */
export class RefreshChooserView implements View {
  readonly viewType = 'refresh_chooser';

  private report: DriftReport | null = null;

  constructor(readonly reviewId: string) {}

  handleKey(key: KeyInput, context: ViewContext): void {
    const action = findBinding(key, BINDINGS);

    switch (action) {
      case 'base':
      case 'target':
      case 'both':
        context.publish({ type: 'view_close' });
        context.publish({ type: 'review_refresh', reviewId: this.reviewId, side: action });
        break;
      case 'duplicate':
        context.publish({ type: 'view_close' });
        context.publish({ type: 'review_duplicate', reviewId: this.reviewId });
        break;
      case 'cancel':
        context.publish({ type: 'view_close' });
        break;
      case 'help':
        context.publish({ type: 'help_open', keybindings: this.keybindings() });
        break;
      case null:
        break;
    }
  }

  handleAppEvent(event: AppEvent): void {
    if (event.type === 'review_drift_analyzed' && event.reviewId === this.reviewId) {
      this.report = event.report;
    }
  }

  keybindings(): Keybinding[] {
    return BINDINGS;
  }

  render(): ViewRender {
    const lines = this.report
      ? [
          describeDrift('Base', this.report.base, this.report.baseBranchExists),
          describeDrift('Target', this.report.target, this.report.targetBranchExists),
        ]
      : ['Checking branches...'];

    lines.push('', '[b] base  [t] target  [a] both  [d] duplicate  [Esc] cancel');

    return { title: 'Refresh review', lines, modal: true };
  }
}
