import type { AppEvent } from '../events/event';
import type { KeyInput, MouseAction } from '../keyboard/keys';
import type { Keybinding } from '../keyboard/keymap';

export type ViewType =
  | 'main'
  | 'review_create'
  | 'review_details'
  | 'comments'
  | 'refresh_chooser'
  | 'confirmation_dialog'
  | 'help_modal';

/**
 * What a view may do to the rest of the app: publish events. Nothing else.
 */
export interface ViewContext {
  publish(event: AppEvent): void;
}

export interface ViewRender {
  title: string;
  lines: string[];
  /** drawn over the view below it instead of replacing the screen */
  modal: boolean;
}

export interface View {
  readonly viewType: ViewType;
  /** only called while the view is on top of the stack */
  handleKey(key: KeyInput, context: ViewContext): void;
  /** mouse wheel; when absent the stack maps scrolling to up/down keys */
  handleMouse?(action: MouseAction, context: ViewContext): void;
  /** called for every app event while the view is anywhere on the stack */
  handleAppEvent(event: AppEvent, context: ViewContext): void;
  keybindings(): Keybinding[];
  render(): ViewRender;
}

export const SELECTION_INDICATOR = '>';

/**
 * Moves a selection index by `delta`, wrapping around a list of `length` items.
 */
export function wrapIndex(index: number, delta: number, length: number): number {
  if (length === 0) return 0;
  return (((index + delta) % length) + length) % length;
}

/**
 * Moves a selection index by `delta`, stopping at both ends.
 */
export function clampIndex(index: number, delta: number, length: number): number {
  if (length === 0) return 0;
  return Math.min(length - 1, Math.max(0, index + delta));
}
