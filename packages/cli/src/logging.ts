import fs from 'fs';
import path from 'path';
import { Console } from 'console';
import type { LogLevel } from '@local-review/shared';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(scope: string): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LEVEL_ORDER, value);
}

export function formatLogLine(time: string, level: LogLevel, scope: string, message: string): string {
  return `${time} ${level.toUpperCase().padEnd(5)} [${scope}] ${message}`;
}

class ConsoleLogger implements Logger {
  constructor(
    private readonly sink: Console,
    private readonly minLevel: LogLevel,
    private readonly scope: string,
  ) {}

  debug(message: string): void {
    this.write('debug', message);
  }

  info(message: string): void {
    this.write('info', message);
  }

  warn(message: string): void {
    this.write('warn', message);
  }

  error(message: string): void {
    this.write('error', message);
  }

  child(scope: string): Logger {
    return new ConsoleLogger(this.sink, this.minLevel, `${this.scope}:${scope}`);
  }

  private write(level: LogLevel, message: string): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;

    const line = formatLogLine(new Date().toISOString(), level, this.scope, message);
    if (level === 'error' || level === 'warn') {
      this.sink.error(line);
    } else {
      this.sink.log(line);
    }
  }
}

/**
 * The terminal belongs to the UI while the app runs, so logs go to a file.
 */
export function createFileLogger(logPath: string, minLevel: LogLevel): Logger {
  fs.mkdirSync(path.dirname(logPath), { recursive: true });
  const stream = fs.createWriteStream(logPath, { flags: 'a' });
  return new ConsoleLogger(new Console({ stdout: stream, stderr: stream }), minLevel, 'app');
}

export function createStreamLogger(
  stream: NodeJS.WritableStream,
  minLevel: LogLevel,
  scope = 'app',
): Logger {
  return new ConsoleLogger(new Console({ stdout: stream, stderr: stream }), minLevel, scope);
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};
