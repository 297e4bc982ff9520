import type { LogLevel } from '@nestjs/common';

const LEVELS: Record<string, LogLevel[]> = {
  fatal: ['fatal'],
  error: ['fatal', 'error'],
  warn: ['fatal', 'error', 'warn'],
  info: ['fatal', 'error', 'warn', 'log'],
  debug: ['fatal', 'error', 'warn', 'log', 'debug'],
  trace: ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'],
};

/** Maps LOG_LEVEL to the set of Nest logger levels that stay enabled. */
export const resolveLogLevels = (level?: string): LogLevel[] =>
  LEVELS[(level ?? '').trim().toLowerCase()] ?? LEVELS.info;
