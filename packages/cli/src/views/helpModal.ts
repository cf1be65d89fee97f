import type { KeyInput } from '../keyboard/keys';
import { findBinding, formatCombos, KEY, primaryKey, type Keybinding } from '../keyboard/keymap';
import { SELECTION_INDICATOR, wrapIndex, type View, type ViewContext, type ViewRender } from './view';

type HelpAction = 'up' | 'down' | 'run' | 'close';

const BINDINGS: Keybinding<HelpAction>[] = [
  { id: 'up', label: 'Previous', combos: KEY.up },
  { id: 'down', label: 'Next', combos: KEY.down },
  { id: 'run', label: 'Run', combos: KEY.enter },
  { id: 'close', label: 'Close', combos: [...KEY.escape, { key: 'q', displayKeys: ['q'] }] },
];

/**
 * Lists the keybindings of the view that opened it. Enter closes the modal
 * and replays the selected binding's key to that view.
 */
export class HelpModal implements View {
  readonly viewType = 'help_modal';

  private selected = 0;

  constructor(private readonly bindings: readonly Keybinding[]) {}

  handleKey(key: KeyInput, context: ViewContext): void {
    switch (findBinding(key, BINDINGS)) {
      case 'up':
        this.selected = wrapIndex(this.selected, -1, this.bindings.length);
        break;
      case 'down':
        this.selected = wrapIndex(this.selected, 1, this.bindings.length);
        break;
      case 'run': {
        const binding = this.bindings[this.selected];
        const selectedKey = binding ? primaryKey(binding) : null;
        context.publish({ type: 'view_close' });
        if (selectedKey) context.publish({ type: 'help_key_selected', key: selectedKey });
        break;
      }
      case 'close':
        context.publish({ type: 'view_close' });
        break;
      case null:
        break;
    }
  }

  handleAppEvent(): void {}

  keybindings(): Keybinding[] {
    return BINDINGS;
  }

  render(): ViewRender {
    const width = Math.max(0, ...this.bindings.map((binding) => formatCombos(binding).length));
    const lines = this.bindings.map((binding, index) => {
      const indicator = index === this.selected ? SELECTION_INDICATOR : ' ';
      return `${indicator} ${formatCombos(binding).padEnd(width)}  ${binding.label}`;
    });

    return { title: 'Keybindings', lines, modal: true };
  }
}
