import { ConfigErrorCode, LOG_LEVELS, createConfigError, isLogLevel, type LogLevel } from '@rangeserve/core';
import { DEFAULT_PORT } from '@rangeserve/server';

export const PORT_ENV = 'RANGESERVE_PORT';
export const DIRECTORY_ENV = 'RANGESERVE_DIRECTORY';
export const LOG_LEVEL_ENV = 'RANGESERVE_LOG_LEVEL';

export interface ServeFlags {
  port?: number;
  directory?: string;
}

export interface ServeConfig {
  port: number;
  /** As given; resolved against the working directory at startup. */
  directory: string;
}

/**
 * Merges `serve` flags over environment values over defaults. Flags win, then
 * `RANGESERVE_PORT` / `RANGESERVE_DIRECTORY`, then port 8080 and the working
 * directory.
 */
export function resolveServeConfig(flags: ServeFlags, env: NodeJS.ProcessEnv = process.env): ServeConfig {
  const port = flags.port ?? parsePortText(env[PORT_ENV]) ?? DEFAULT_PORT;
  assertPort(port);
  const directory = flags.directory ?? nonEmpty(env[DIRECTORY_ENV]) ?? '.';
  return { port, directory };
}

export function resolveLogLevel(value: string | undefined): LogLevel {
  const level = nonEmpty(value)?.toLowerCase();
  if (level === undefined) {
    return 'info';
  }
  if (!isLogLevel(level)) {
    throw createConfigError(ConfigErrorCode.INVALID_LOG_LEVEL, `Invalid log level "${value}"`, {
      context: LOG_LEVEL_ENV,
      suggestion: `Use one of: ${LOG_LEVELS.join(', ')}.`,
    });
  }
  return level;
}

function parsePortText(value: string | undefined): number | undefined {
  const text = nonEmpty(value);
  if (text === undefined) {
    return undefined;
  }
  if (!/^\d+$/.test(text)) {
    throw invalidPort(text, PORT_ENV);
  }
  return Number(text);
}

function assertPort(port: number): void {
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw invalidPort(String(port));
  }
}

function invalidPort(text: string, context?: string) {
  return createConfigError(ConfigErrorCode.INVALID_PORT, `Invalid port "${text}"`, {
    context,
    suggestion: 'Use a whole number between 0 and 65535.',
  });
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}
