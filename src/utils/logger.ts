/**
 * Structured logging for mux-serving
 *
 * All components log through pino. A root logger is created once per process
 * and components take a child bound to `{ component }`. The level comes from
 * `MUX_SERVING_LOG_LEVEL`, then from `logging.level` in runtime.yaml.
 */

import { pino, type Logger, type LevelWithSilent } from 'pino';

export type { Logger } from 'pino';

type LogContext = Record<string, unknown>;

const DEFAULT_LOG_LEVEL = 'info';

let rootLogger: Logger | null = null;

/**
 * Create (or replace) the process-wide root logger
 */
export function initializeLogger(level?: LevelWithSilent): Logger {
  rootLogger = pino({
    name: 'mux-serving',
    level: process.env.MUX_SERVING_LOG_LEVEL || level || DEFAULT_LOG_LEVEL,
  });
  return rootLogger;
}

/**
 * Get a logger for one component
 *
 * @example
 * ```typescript
 * const logger = createLogger('VersionCache');
 * logger.info({ versionId: '2' }, 'Version loaded');
 * ```
 */
export function createLogger(component: string): Logger {
  const root = rootLogger ?? initializeLogger();
  return root.child({ component });
}

/**
 * Log with a context object that is only built when the level is enabled
 *
 * @example
 * lazyLog(logger, 'debug', () => ({ request, versionId }), 'Request validated');
 */
export function lazyLog(
  logger: Logger | undefined,
  level: 'trace' | 'debug' | 'info',
  contextBuilder: () => LogContext,
  message: string
): void {
  if (!logger || !logger.isLevelEnabled(level)) {
    return;
  }

  logger[level](contextBuilder(), message);
}
