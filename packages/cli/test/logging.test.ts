import { Writable } from 'stream';
import { describe, expect, it } from 'vitest';
import { createStreamLogger, formatLogLine, isLogLevel } from '../src/logging';

function collect(): { stream: Writable; lines: string[] } {
  const lines: string[] = [];
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      lines.push(String(chunk));
      callback();
    },
  });
  return { stream, lines };
}

describe('logging', () => {
  it('formats a log line', () => {
    expect(formatLogLine('2024-03-01T10:00:00.000Z', 'warn', 'app:sync', 'careful')).toBe(
      '2024-03-01T10:00:00.000Z WARN  [app:sync] careful',
    );
  });

  it('drops messages below the minimum level and scopes children', () => {
    const { stream, lines } = collect();
    const logger = createStreamLogger(stream, 'info');

    logger.debug('hidden');
    logger.info('shown');
    logger.child('sync').error('broken');

    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/^\S+ INFO  \[app\] shown\n$/);
    expect(lines[1]).toMatch(/^\S+ ERROR \[app:sync\] broken\n$/);
  });

  it('recognises log levels', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });
});
