import { describe, expect, it } from 'vitest';
import type { AppEvent } from '../src/events/event';
import { keyInput } from '../src/keyboard/keys';
import { ConfirmationDialog } from '../src/views/confirmationDialog';
import { HelpModal } from '../src/views/helpModal';
import { MainView } from '../src/views/mainView';
import { ViewStack } from '../src/views/stack';
import { clampIndex, wrapIndex, type ViewContext } from '../src/views/view';

function collectingContext(): { context: ViewContext; published: AppEvent[] } {
  const published: AppEvent[] = [];
  return { context: { publish: (event) => published.push(event) }, published };
}

describe('ViewStack', () => {
  it('starts with the main view and never pops it', () => {
    const stack = new ViewStack();

    expect(stack.viewTypes()).toEqual(['main']);
    expect(stack.pop()).toBeNull();
    expect(stack.size).toBe(1);
    expect(stack.top()).toBeInstanceOf(MainView);
  });

  it('pushes and pops views on top of main', () => {
    const stack = new ViewStack();
    const dialog = new ConfirmationDialog({ title: 'Delete review', message: 'Sure?' });

    stack.push(dialog);
    stack.push(new HelpModal([]));

    expect(stack.viewTypes()).toEqual(['main', 'confirmation_dialog', 'help_modal']);
    expect(stack.topDown().map((view) => view.viewType)).toEqual(['help_modal', 'confirmation_dialog', 'main']);
    expect(stack.pop()?.viewType).toBe('help_modal');
    expect(stack.top()).toBe(dialog);
  });

  it('sends keys to the top view only', () => {
    const stack = new ViewStack();
    stack.push(new ConfirmationDialog({ title: 'Delete review', message: 'Sure?', onConfirm: [{ type: 'init' }] }));
    const { context, published } = collectingContext();

    // "n" would open the create form on the main view; the dialog treats it as cancel
    stack.routeInput({ type: 'key', key: keyInput('n') }, context);

    expect(published).toEqual([{ type: 'view_close' }]);
  });

  it('maps the scroll wheel to up and down for views without mouse handling', () => {
    const stack = new ViewStack();
    const help = new HelpModal([
      { id: 'first', label: 'First', combos: [{ key: 'a', displayKeys: ['a'] }] },
      { id: 'second', label: 'Second', combos: [{ key: 'b', displayKeys: ['b'] }] },
    ]);
    stack.push(help);
    const { context } = collectingContext();

    stack.routeInput({ type: 'mouse', action: 'scroll_down', column: 1, row: 1 }, context);

    expect(help.render().lines).toEqual(['  a  First', '> b  Second']);
  });

  it('broadcasts to every view and isolates a failing one', () => {
    const stack = new ViewStack();
    stack.push({
      viewType: 'help_modal',
      handleKey: () => {},
      handleAppEvent: () => {
        throw new Error('broken view');
      },
      keybindings: () => [],
      render: () => ({ title: '', lines: [], modal: true }),
    });
    const failures: string[] = [];
    const { context } = collectingContext();

    stack.broadcast(
      { type: 'reviews_branch_status_checked', updated: 2 },
      context,
      (view, error) => failures.push(`${view.viewType}: ${error instanceof Error ? error.message : ''}`),
    );

    expect(failures).toEqual(['help_modal: broken view']);
    expect(stack.viewTypes()[0]).toBe('main');
    const main = stack.topDown()[1];
    expect(main.render().lines).toEqual(['Loading reviews...', '', '2 review(s) updated']);
  });
});

describe('selection helpers', () => {
  it('wraps around both ends', () => {
    expect(wrapIndex(0, -1, 3)).toBe(2);
    expect(wrapIndex(2, 1, 3)).toBe(0);
    expect(wrapIndex(0, 1, 0)).toBe(0);
  });

  it('clamps at both ends', () => {
    expect(clampIndex(0, -1, 3)).toBe(0);
    expect(clampIndex(2, 1, 3)).toBe(2);
    expect(clampIndex(5, 0, 3)).toBe(2);
    expect(clampIndex(1, 0, 0)).toBe(0);
  });
});
