import { createWriteStream, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod/v4';
import { describeError } from './errors.js';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export type LogLevel = z.infer<typeof LogLevelSchema>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LogSink {
  write(line: string): void;
  close?(): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  sink: LogSink;
  clock?: () => Date;
}

export class Logger {
  private readonly level: LogLevel;
  private readonly sink: LogSink;
  private readonly clock: () => Date;

  constructor({ level = 'info', sink, clock = () => new Date() }: LoggerOptions) {
    this.level = level;
    this.sink = sink;
    this.clock = clock;
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  debug(message: string): void {
    this.log('debug', message);
  }

  info(message: string): void {
    this.log('info', message);
  }

  warn(message: string): void {
    this.log('warn', message);
  }

  error(message: string): void {
    this.log('error', message);
  }

  close(): void {
    this.sink.close?.();
  }

  private log(level: LogLevel, message: string): void {
    if (!this.isEnabled(level)) {
      return;
    }
    this.sink.write(`${this.clock().toISOString()} ${level.toUpperCase()} ${message}\n`);
  }
}

/** Truncates `path` and appends every line to it. */
export function createFileSink(path: string): LogSink {
  mkdirSync(dirname(path), { recursive: true });
  const stream = createWriteStream(path, { flags: 'w' });

  // The terminal belongs to the display, so a broken log file only stops logging
  let broken = false;
  stream.on('error', () => {
    broken = true;
  });

  return {
    write: (line) => {
      if (!broken) {
        stream.write(line);
      }
    },
    close: () => {
      stream.end();
    },
  };
}

/** Accepts every line and keeps none. */
export function createDiscardSink(): LogSink {
  return { write: () => undefined };
}

/**
 * Logs to `path`. When the file cannot be opened, `onUnavailable` hears why and
 * the logger discards its lines so the app still starts.
 */
export function createFileLogger(
  level: LogLevel,
  path: string,
  onUnavailable: (reason: string) => void
): Logger {
  let sink: LogSink;
  try {
    sink = createFileSink(path);
  } catch (error) {
    onUnavailable(describeError(error));
    sink = createDiscardSink();
  }
  return new Logger({ level, sink });
}

export function createMemorySink(): LogSink & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    write: (line) => {
      lines.push(line);
    },
  };
}
