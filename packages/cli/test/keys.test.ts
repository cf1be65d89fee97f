import { describe, expect, it } from 'vitest';
import { decodeInput, isPrintable, keyInput } from '../src/keyboard/keys';
import { findBinding, formatCombos, matchesCombo, primaryKey, type Keybinding } from '../src/keyboard/keymap';

describe('decodeInput', () => {
  it('splits a chunk into single keys', () => {
    expect(decodeInput('jk')).toEqual([
      { type: 'key', key: keyInput('j') },
      { type: 'key', key: keyInput('k') },
    ]);
  });

  it('decodes special keys', () => {
    expect(decodeInput('\x1b[A\r\t\x7f').map((event) => event.type === 'key' && event.key.key)).toEqual([
      'up',
      'enter',
      'tab',
      'backspace',
    ]);
  });

  it('tells a lone escape from alt combinations', () => {
    expect(decodeInput('\x1b')).toEqual([{ type: 'key', key: keyInput('escape') }]);
    expect(decodeInput('\x1bx')).toEqual([{ type: 'key', key: keyInput('x', { alt: true }) }]);
  });

  it('decodes control characters', () => {
    expect(decodeInput('\x03')).toEqual([{ type: 'key', key: keyInput('c', { ctrl: true }) }]);
  });

  it('decodes the mouse wheel and drops clicks', () => {
    expect(decodeInput('\x1b[<64;10;5M\x1b[<0;1;1M\x1b[<65;3;4Mq')).toEqual([
      { type: 'mouse', action: 'scroll_up', column: 10, row: 5 },
      { type: 'mouse', action: 'scroll_down', column: 3, row: 4 },
      { type: 'key', key: keyInput('q') },
    ]);
  });

  it('keeps the case of letters', () => {
    expect(decodeInput('rR').map((event) => event.type === 'key' && event.key.key)).toEqual(['r', 'R']);
  });
});

describe('isPrintable', () => {
  it('accepts plain characters only', () => {
    expect(isPrintable(keyInput('a'))).toBe(true);
    expect(isPrintable(keyInput(' '))).toBe(true);
    expect(isPrintable(keyInput('enter'))).toBe(false);
    expect(isPrintable(keyInput('a', { ctrl: true }))).toBe(false);
  });
});

describe('keymap', () => {
  const bindings: Keybinding<'quit' | 'open'>[] = [
    {
      id: 'quit',
      label: 'Quit',
      combos: [
        { key: 'q', displayKeys: ['q'] },
        { key: 'c', displayKeys: ['Ctrl', 'c'], ctrl: true },
      ],
    },
    { id: 'open', label: 'Open', combos: [{ key: 'enter', displayKeys: ['Enter'] }] },
  ];

  it('finds the binding a key belongs to', () => {
    expect(findBinding(keyInput('c', { ctrl: true }), bindings)).toBe('quit');
    expect(findBinding(keyInput('enter'), bindings)).toBe('open');
    expect(findBinding(keyInput('c'), bindings)).toBeNull();
  });

  it('never matches alt combinations', () => {
    expect(matchesCombo(keyInput('q', { alt: true }), { key: 'q', displayKeys: ['q'] })).toBe(false);
  });

  it('formats combos and picks the primary key', () => {
    expect(formatCombos(bindings[0])).toBe('q / Ctrl+c');
    expect(primaryKey(bindings[1])).toEqual(keyInput('enter'));
  });
});
