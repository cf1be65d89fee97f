import type { KeyInput } from './keys';

export interface KeyCombo {
  key: string;
  displayKeys: string[];
  ctrl?: boolean;
}

export interface Keybinding<Id extends string = string> {
  id: Id;
  label: string;
  combos: KeyCombo[];
}

export function matchesCombo(input: KeyInput, combo: KeyCombo): boolean {
  if ((combo.ctrl ?? false) !== input.ctrl) return false;
  if (input.alt) return false;
  return input.key === combo.key;
}

export function matchesKeybinding(input: KeyInput, binding: Keybinding): boolean {
  return binding.combos.some((combo) => matchesCombo(input, combo));
}

/**
 * Id of the first binding the input matches, or null.
 */
export function findBinding<Id extends string>(
  input: KeyInput,
  bindings: readonly Keybinding<Id>[],
): Id | null {
  return bindings.find((binding) => matchesKeybinding(input, binding))?.id ?? null;
}

/**
 * The key press a binding stands for, used when running it from the help modal.
 */
export function primaryKey(binding: Keybinding): KeyInput | null {
  const combo = binding.combos[0];
  if (!combo) return null;
  return { key: combo.key, ctrl: combo.ctrl ?? false, alt: false };
}

export function formatCombos(binding: Keybinding): string {
  return binding.combos.map((combo) => combo.displayKeys.join('+')).join(' / ');
}

// Shared combos
export const KEY = {
  up: [
    { key: 'k', displayKeys: ['k'] },
    { key: 'up', displayKeys: ['↑'] },
  ],
  down: [
    { key: 'j', displayKeys: ['j'] },
    { key: 'down', displayKeys: ['↓'] },
  ],
  escape: [{ key: 'escape', displayKeys: ['Esc'] }],
  enter: [{ key: 'enter', displayKeys: ['Enter'] }],
  help: [{ key: '?', displayKeys: ['?'] }],
  tab: [{ key: 'tab', displayKeys: ['Tab'] }],
} satisfies Record<string, KeyCombo[]>;
