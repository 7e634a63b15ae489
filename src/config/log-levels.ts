import { LogLevel } from '@nestjs/common';
import { LOG_LEVELS, WorkerLogLevel } from './env.validation';

/**
 * Levels at or above the configured one, e.g. `warn` → error and warn.
 * Unknown or missing values fall back to `log`.
 */
export function resolveLogLevels(level: string | undefined): LogLevel[] {
  const index = LOG_LEVELS.findIndex((candidate) => candidate === level);
  const enabled: readonly WorkerLogLevel[] =
    index === -1 ? LOG_LEVELS.slice(0, 3) : LOG_LEVELS.slice(0, index + 1);
  return [...enabled];
}
