import { decodeInput, type InputEvent } from '../keyboard/keys';
import type { FrameSize } from './renderer';

const ALT_SCREEN_ON = '\x1b[?1049h';
const ALT_SCREEN_OFF = '\x1b[?1049l';
const CURSOR_HIDE = '\x1b[?25l';
const CURSOR_SHOW = '\x1b[?25h';
// Mouse tracking with SGR extended coordinates, for the scroll wheel
const MOUSE_ON = '\x1b[?1000h\x1b[?1006h';
const MOUSE_OFF = '\x1b[?1006l\x1b[?1000l';

export interface TerminalStreams {
  stdin: NodeJS.ReadStream;
  stdout: NodeJS.WriteStream;
}

/**
 * Raw-mode full-screen terminal: decoded input in, whole frames out.
 */
export class Terminal {
  private active = false;

  constructor(private readonly streams: TerminalStreams = { stdin: process.stdin, stdout: process.stdout }) {}

  get size(): FrameSize {
    return {
      columns: this.streams.stdout.columns || 80,
      rows: this.streams.stdout.rows || 24,
    };
  }

  /**
   * @throws Error when stdin is not a TTY
   */
  enter(): void {
    const { stdin, stdout } = this.streams;
    if (!stdin.isTTY) {
      throw new Error('local-review needs an interactive terminal');
    }

    stdin.setRawMode(true);
    stdin.setEncoding('utf8');
    stdin.resume();
    stdout.write(ALT_SCREEN_ON + CURSOR_HIDE + MOUSE_ON);
    this.active = true;
  }

  onInput(listener: (input: InputEvent) => void): () => void {
    const handler = (data: string | Buffer): void => {
      for (const input of decodeInput(data.toString())) {
        listener(input);
      }
    };

    this.streams.stdin.on('data', handler);
    return () => {
      this.streams.stdin.off('data', handler);
    };
  }

  onResize(listener: () => void): () => void {
    this.streams.stdout.on('resize', listener);
    return () => {
      this.streams.stdout.off('resize', listener);
    };
  }

  draw(rows: readonly string[]): void {
    // Home, then overwrite each row and clear what is left of it
    this.streams.stdout.write(`\x1b[H${rows.map((row) => `${row}\x1b[K`).join('\r\n')}\x1b[J`);
  }

  restore(): void {
    if (!this.active) return;
    this.active = false;

    const { stdin, stdout } = this.streams;
    stdout.write(MOUSE_OFF + CURSOR_SHOW + ALT_SCREEN_OFF);
    stdin.setRawMode(false);
    stdin.pause();
  }
}
