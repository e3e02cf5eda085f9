import { LogLevel } from '@nestjs/common';

/** Nest log levels, most severe first. */
const LEVELS: LogLevel[] = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'];

/**
 * Expand a minimum level (LOG_LEVEL) into the list NestFactory expects.
 * Unknown values fall back to 'log'.
 *
 * @example
 * resolveLogLevels('warn') // ['fatal', 'error', 'warn']
 */
export function resolveLogLevels(level: string | undefined): LogLevel[] {
  const normalized = (level ?? 'log').trim().toLowerCase();
  const index = LEVELS.findIndex((candidate) => candidate === normalized);
  return LEVELS.slice(0, (index === -1 ? LEVELS.indexOf('log') : index) + 1);
}
