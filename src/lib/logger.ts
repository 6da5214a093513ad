import type { LogLevel as NestLogLevel } from '@nestjs/common';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const NEST_LEVELS: Record<LogLevel, NestLogLevel[]> = {
  debug: ['debug', 'verbose'],
  info: ['log'],
  warn: ['warn'],
  error: ['error', 'fatal'],
};

export const resolveLogLevel = (value?: string): LogLevel => {
  if (!value) return 'debug';
  const normalized = value.toLowerCase();
  if (
    normalized === 'debug' ||
    normalized === 'info' ||
    normalized === 'warn' ||
    normalized === 'error'
  ) {
    return normalized;
  }
  return 'info';
};

/**
 * Nest log levels enabled at or above the given threshold.
 */
export const toNestLogLevels = (value?: string): NestLogLevel[] => {
  const threshold = LEVEL_ORDER[resolveLogLevel(value)];
  return LEVELS.filter((level) => LEVEL_ORDER[level] >= threshold).flatMap(
    (level) => NEST_LEVELS[level],
  );
};
