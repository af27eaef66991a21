/**
 * Console logging for the command line tool.
 */

import type { DfuLogger } from '../models/session';

type Level = keyof DfuLogger;

const LEVEL_NAMES: Record<Level, string> = {
  debug: 'DEBUG',
  info: 'INFO',
  warn: 'WARNING',
  error: 'ERROR',
};

/**
 * Where formatted lines go. `console` satisfies it.
 */
export interface LogSink {
  log(line: string): void;
  error(line: string): void;
}

export interface CliLoggerOptions {
  verbose: boolean;
  now?: () => Date;
  sink?: LogSink;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

export function formatTime(date: Date, withMillis: boolean): string {
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return withMillis ? `${time}.${pad(date.getMilliseconds(), 3)}` : time;
}

/**
 * Verbose: `HH:MM:SS.mmm  message` at every level.
 * Otherwise: `HH:MM:SS [LEVEL] message`, debug suppressed.
 *
 * Warnings and errors go to the sink's error stream.
 */
export function createCliLogger(options: CliLoggerOptions): DfuLogger {
  const { verbose } = options;
  const now = options.now ?? (() => new Date());
  const sink = options.sink ?? console;

  const emit = (level: Level, message: string): void => {
    if (level === 'debug' && !verbose) {
      return;
    }
    const timestamp = formatTime(now(), verbose);
    const line = verbose ? `${timestamp}  ${message}` : `${timestamp} [${LEVEL_NAMES[level]}] ${message}`;
    if (level === 'warn' || level === 'error') {
      sink.error(line);
    } else {
      sink.log(line);
    }
  };

  return {
    debug: (message) => emit('debug', message),
    info: (message) => emit('info', message),
    warn: (message) => emit('warn', message),
    error: (message) => emit('error', message),
  };
}
