import pc from 'picocolors';
import type { Keybinding } from '../keyboard/keymap';
import type { ViewStack } from '../views/stack';
import { SELECTION_INDICATOR, type ViewRender } from '../views/view';

export interface FrameSize {
  columns: number;
  rows: number;
}

export type SegmentStyle = 'plain' | 'title' | 'selected' | 'dim' | 'border';

export interface Segment {
  text: string;
  style: SegmentStyle;
}

export type FrameRow = Segment[];

type Colors = Pick<typeof pc, 'bold' | 'cyan' | 'dim' | 'inverse'>;

/**
 * Cuts or pads `text` to exactly `width` characters.
 */
export function fit(text: string, width: number): string {
  const chars = [...text];
  if (chars.length >= width) return chars.slice(0, width).join('');
  return text + ' '.repeat(width - chars.length);
}

function lineStyle(line: string): SegmentStyle {
  return line.startsWith(SELECTION_INDICATOR) ? 'selected' : 'plain';
}

export function formatHint(bindings: readonly Keybinding[]): string {
  return bindings
    .map((binding) => {
      const combo = binding.combos[0];
      return combo ? `${combo.displayKeys.join('+')} ${binding.label}` : binding.label;
    })
    .join('  ');
}

/**
 * Lays out the stack as plain rows: the topmost full-screen view fills the
 * screen and every modal above it is drawn as a centered box.
 * `renders` go from the bottom of the stack to the top.
 */
export function layoutFrame(renders: readonly ViewRender[], hint: string, size: FrameSize): FrameRow[] {
  let baseIndex = 0;
  renders.forEach((render, index) => {
    if (!render.modal) baseIndex = index;
  });

  const base = renders[baseIndex];
  const bodyHeight = Math.max(0, size.rows - 3);
  const rows: FrameRow[] = [
    [{ text: fit(base ? base.title : '', size.columns), style: 'title' }],
    [{ text: '─'.repeat(size.columns), style: 'border' }],
  ];

  const body = base ? base.lines.slice(0, bodyHeight) : [];
  for (let index = 0; index < bodyHeight; index++) {
    const line = body[index] ?? '';
    rows.push([{ text: fit(line, size.columns), style: lineStyle(line) }]);
  }
  rows.push([{ text: fit(hint, size.columns), style: 'dim' }]);

  for (const modal of renders.slice(baseIndex + 1)) {
    overlayBox(rows, modal, size);
  }

  return rows;
}

function overlayBox(rows: FrameRow[], modal: ViewRender, size: FrameSize): void {
  const maxInner = Math.max(1, size.columns - 4);
  const inner = Math.min(maxInner, Math.max(modal.title.length + 2, ...modal.lines.map((line) => [...line].length)));
  const width = inner + 4;
  const lines = modal.lines.slice(0, Math.max(0, rows.length - 2));

  const label = `┌─ ${modal.title} `;
  const topBorder = fit(label + '─'.repeat(Math.max(0, width - 1 - [...label].length)), width - 1) + '┐';

  const boxRows: FrameRow[] = [
    [{ text: topBorder, style: 'border' }],
    ...lines.map((line): FrameRow => [
      { text: '│ ', style: 'border' },
      { text: fit(line, inner), style: lineStyle(line) },
      { text: ' │', style: 'border' },
    ]),
    [{ text: `└${'─'.repeat(width - 2)}┘`, style: 'border' }],
  ];

  const top = Math.max(0, Math.floor((rows.length - boxRows.length) / 2));
  const left = Math.max(0, Math.floor((size.columns - width) / 2));

  rows.forEach((row, index) => {
    // Everything below a modal is dimmed, including earlier modals
    const text = row.map((segment) => segment.text).join('');
    const boxRow = boxRows[index - top];

    if (!boxRow) {
      rows[index] = [{ text, style: 'dim' }];
      return;
    }

    const chars = [...text];
    rows[index] = [
      { text: chars.slice(0, left).join(''), style: 'dim' },
      ...boxRow,
      { text: chars.slice(left + width).join(''), style: 'dim' },
    ];
  });
}

export function paint(rows: readonly FrameRow[], colors: Colors = pc): string[] {
  return rows.map((row) =>
    row
      .map(({ text, style }) => {
        switch (style) {
          case 'title':
            return colors.bold(colors.cyan(text));
          case 'selected':
            return colors.inverse(text);
          case 'dim':
            return colors.dim(text);
          case 'border':
            return colors.cyan(text);
          case 'plain':
            return text;
        }
      })
      .join(''),
  );
}

export function renderStack(stack: ViewStack, size: FrameSize, colors: Colors = pc): string[] {
  const renders = stack.topDown().reverse().map((view) => view.render());
  return paint(layoutFrame(renders, formatHint(stack.top().keybindings()), size), colors);
}
