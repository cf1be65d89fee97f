import type { AppEvent } from '../events/event';
import type { KeyInput } from '../keyboard/keys';
import { findBinding, KEY, type Keybinding } from '../keyboard/keymap';
import type { View, ViewContext, ViewRender } from './view';

type DialogAction = 'confirm' | 'cancel';

const BINDINGS: Keybinding<DialogAction>[] = [
  { id: 'confirm', label: 'Confirm', combos: [{ key: 'y', displayKeys: ['y'] }, ...KEY.enter] },
  {
    id: 'cancel',
    label: 'Cancel',
    combos: [
      { key: 'n', displayKeys: ['n'] },
      { key: 'q', displayKeys: ['q'] },
      ...KEY.escape,
      { key: 'c', displayKeys: ['Ctrl', 'c'], ctrl: true },
    ],
  },
];

export interface ConfirmationOptions {
  title: string;
  message: string;
  /** published after the dialog closes */
  onConfirm?: AppEvent[];
  onCancel?: AppEvent[];
  /** hint line; defaults to the y/n prompt */
  hint?: string;
}

export class ConfirmationDialog implements View {
  readonly viewType = 'confirmation_dialog';

  constructor(private readonly options: ConfirmationOptions) {}

  /**
   * A dismissible notice for a failed operation.
   */
  static errorNotice(message: string): ConfirmationDialog {
    return new ConfirmationDialog({ title: 'Error', message, hint: 'Press Enter to dismiss' });
  }

  handleKey(key: KeyInput, context: ViewContext): void {
    const action = findBinding(key, BINDINGS);
    if (action === null) return;

    context.publish({ type: 'view_close' });
    const events = action === 'confirm' ? this.options.onConfirm : this.options.onCancel;
    for (const event of events ?? []) {
      context.publish(event);
    }
  }

  handleAppEvent(): void {}

  keybindings(): Keybinding[] {
    return BINDINGS;
  }

  render(): ViewRender {
    return {
      title: this.options.title,
      lines: [...this.options.message.split('\n'), '', this.options.hint ?? '[y] yes  [n] no'],
      modal: true,
    };
  }
}
