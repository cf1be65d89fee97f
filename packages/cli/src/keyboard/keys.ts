/**
 * A decoded key press. Printable characters keep their case in `key`
 * ("r" and "R" are different keys); special keys use lowercase names.
 */
export interface KeyInput {
  key: string;
  ctrl: boolean;
  alt: boolean;
}

export type MouseAction = 'scroll_up' | 'scroll_down';

export type InputEvent =
  | { type: 'key'; key: KeyInput }
  | { type: 'mouse'; action: MouseAction; column: number; row: number };

export function keyInput(key: string, modifiers: { ctrl?: boolean; alt?: boolean } = {}): KeyInput {
  return { key, ctrl: modifiers.ctrl ?? false, alt: modifiers.alt ?? false };
}

/**
 * True for a single printable character typed without modifiers.
 */
export function isPrintable(input: KeyInput): boolean {
  return !input.ctrl && !input.alt && [...input.key].length === 1 && input.key >= ' ';
}

const ESCAPE_SEQUENCES: Record<string, string> = {
  '\x1b[A': 'up',
  '\x1b[B': 'down',
  '\x1b[C': 'right',
  '\x1b[D': 'left',
  '\x1bOA': 'up',
  '\x1bOB': 'down',
  '\x1bOC': 'right',
  '\x1bOD': 'left',
  '\x1b[H': 'home',
  '\x1b[F': 'end',
  '\x1b[1~': 'home',
  '\x1b[4~': 'end',
  '\x1b[3~': 'delete',
  '\x1b[5~': 'pageup',
  '\x1b[6~': 'pagedown',
  '\x1b[Z': 'backtab',
};

// SGR extended mouse mode: ESC [ < button ; x ; y (M|m)
const SGR_MOUSE = /^\x1b\[<(\d+);(\d+);(\d+)([Mm])/;

/**
 * Decodes a chunk of raw-mode stdin into input events. A chunk may hold
 * several keys (pasted text, fast typing).
 */
export function decodeInput(data: string): InputEvent[] {
  const events: InputEvent[] = [];
  let rest = data;

  while (rest.length > 0) {
    const mouse = rest.match(SGR_MOUSE);
    if (mouse) {
      const button = parseInt(mouse[1], 10);
      // Button 64 = wheel up, 65 = wheel down; clicks are ignored
      if (mouse[4] === 'M' && (button === 64 || button === 65)) {
        events.push({
          type: 'mouse',
          action: button === 64 ? 'scroll_up' : 'scroll_down',
          column: parseInt(mouse[2], 10),
          row: parseInt(mouse[3], 10),
        });
      }
      rest = rest.slice(mouse[0].length);
      continue;
    }

    const sequence = Object.keys(ESCAPE_SEQUENCES).find((seq) => rest.startsWith(seq));
    if (sequence) {
      events.push({ type: 'key', key: keyInput(ESCAPE_SEQUENCES[sequence]) });
      rest = rest.slice(sequence.length);
      continue;
    }

    const [char] = [...rest];
    rest = rest.slice(char.length);

    if (char === '\x1b') {
      // ESC followed by a printable character is Alt+char
      const [next] = [...rest];
      if (next !== undefined && next >= ' ' && next !== '\x7f' && next !== '[') {
        events.push({ type: 'key', key: keyInput(next, { alt: true }) });
        rest = rest.slice(next.length);
      } else {
        events.push({ type: 'key', key: keyInput('escape') });
      }
      continue;
    }

    events.push({ type: 'key', key: decodeChar(char) });
  }

  return events;
}

function decodeChar(char: string): KeyInput {
  switch (char) {
    case '\r':
    case '\n':
      return keyInput('enter');
    case '\t':
      return keyInput('tab');
    case '\x7f':
    case '\b':
      return keyInput('backspace');
  }

  const code = char.charCodeAt(0);
  if (code >= 1 && code <= 26) {
    // Ctrl+A .. Ctrl+Z
    return keyInput(String.fromCharCode(code + 96), { ctrl: true });
  }

  return keyInput(char);
}
