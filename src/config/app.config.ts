import { registerAs } from '@nestjs/config';
import type { LogLevel } from '@nestjs/common';

const LOG_LEVELS: LogLevel[] = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'];

/**
 * Expand a single threshold level into the list Nest expects,
 * e.g. "warn" → ['fatal', 'error', 'warn'].
 */
export function resolveLogLevels(level: string | undefined): LogLevel[] {
  const index = LOG_LEVELS.findIndex((l) => l === level);
  return LOG_LEVELS.slice(0, index === -1 ? LOG_LEVELS.indexOf('log') + 1 : index + 1);
}

export default registerAs('app', () => ({
  nodeEnv: process.env.NODE_ENV || 'development',
  logLevel: process.env.LOG_LEVEL || 'log',
}));
