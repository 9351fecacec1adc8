import { pino } from 'pino';
import type { Logger, LevelWithSilent } from 'pino';

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

/** Map a level name (typically `NDJSON_LOADER_LOG_LEVEL`) to a pino level, falling back to `info`. */
export function resolveLogLevel(value: string | undefined): LevelWithSilent {
  const level = value?.trim().toLowerCase();
  return LEVELS.find((candidate) => candidate === level) ?? 'info';
}

/**
 * Create a named logger writing JSON lines to stdout.
 *
 * @example
 * ```typescript
 * const log = createLogger('data-loader');
 * log.info({ file: 'registry.njson' }, 'Loading data file');
 * ```
 */
export function createLogger(
  name: string,
  level: LevelWithSilent = resolveLogLevel(process.env.NDJSON_LOADER_LOG_LEVEL),
): Logger {
  return pino({ name, level });
}
