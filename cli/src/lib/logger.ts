import chalk from 'chalk';
import { formatLogMeta, isLevelEnabled, type LogLevel, type LogMeta, type Logger } from '@rangeserve/core';

export interface LogSink {
  log(line: string): void;
  error(line: string): void;
}

export interface CliLoggerOptions {
  level?: LogLevel;
  /** Where lines go. Defaults to the console. */
  sink?: LogSink;
}

const LEVEL_COLORS = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
} satisfies Record<LogLevel, (text: string) => string>;

/**
 * Console logger for the CLI. Debug and info go to stdout, warn and error to
 * stderr; anything below `level` is dropped.
 */
export function createCliLogger(options: CliLoggerOptions = {}): Logger {
  const threshold = options.level ?? 'info';
  const sink = options.sink ?? globalThis.console;

  const write = (level: LogLevel, message: string, meta?: LogMeta) => {
    if (!isLevelEnabled(level, threshold)) {
      return;
    }
    const details = formatLogMeta(meta);
    const line = [LEVEL_COLORS[level](`[${level}]`), message, details ? chalk.dim(details) : ''].filter(Boolean).join(' ');
    if (level === 'warn' || level === 'error') {
      sink.error(line);
    } else {
      sink.log(line);
    }
  };

  return {
    debug: (message, meta) => write('debug', message, meta),
    info: (message, meta) => write('info', message, meta),
    warn: (message, meta) => write('warn', message, meta),
    error: (message, meta) => write('error', message, meta),
  };
}
