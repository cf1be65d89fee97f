import type { AppEvent } from '../events/event';
import type { InputEvent } from '../keyboard/keys';
import { keyInput } from '../keyboard/keys';
import { MainView } from './mainView';
import type { View, ViewContext, ViewType } from './view';

/**
 * Modal navigation stack. The bottom entry is always the main view and can
 * never be popped.
 */
export class ViewStack {
  private readonly views: View[];

  constructor(main: View = new MainView()) {
    this.views = [main];
  }

  push(view: View): void {
    this.views.push(view);
  }

  /**
   * Removes the top view. Returns it, or null when only the main view is left.
   */
  pop(): View | null {
    if (this.views.length <= 1) return null;
    return this.views.pop() ?? null;
  }

  top(): View {
    return this.views[this.views.length - 1];
  }

  get size(): number {
    return this.views.length;
  }

  viewTypes(): ViewType[] {
    return this.views.map((view) => view.viewType);
  }

  /**
   * Views from top to bottom.
   */
  topDown(): View[] {
    return [...this.views].reverse();
  }

  /**
   * Delivers input to the top view only.
   */
  routeInput(input: InputEvent, context: ViewContext): void {
    const view = this.top();

    if (input.type === 'key') {
      view.handleKey(input.key, context);
      return;
    }

    if (view.handleMouse) {
      view.handleMouse(input.action, context);
    } else {
      view.handleKey(keyInput(input.action === 'scroll_up' ? 'up' : 'down'), context);
    }
  }

  /**
   * Delivers an app event to every view, top to bottom. The walk runs over a
   * snapshot, so the stack seen by one event never changes halfway through.
   */
  broadcast(event: AppEvent, context: ViewContext, onError: (view: View, error: unknown) => void): void {
    for (const view of this.topDown()) {
      try {
        view.handleAppEvent(event, context);
      } catch (error) {
        onError(view, error);
      }
    }
  }
}
