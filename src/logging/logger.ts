/**
 * Pino-based logging.
 *
 * All output goes to stderr: stdout may be carrying pipe-transport frames.
 *
 * @module logging/logger
 */

import { destination, pino, type Logger, type LoggerOptions } from 'pino';

export type { Logger } from 'pino';

const ROOT_NAME = 'relayline';

/**
 * Options for the root logger.
 */
export interface RootLoggerOptions {
  /** Log level (default: `LOG_LEVEL`, else `silent` under test, else `info`) */
  readonly level?: string;

  /** Pretty-print through pino-pretty (default: `LOG_PRETTY=1`) */
  readonly pretty?: boolean;
}

function defaultLevel(): string {
  const fromEnv = process.env['LOG_LEVEL'];
  if (fromEnv) {
    return fromEnv;
  }
  return process.env['NODE_ENV'] === 'test' ? 'silent' : 'info';
}

/**
 * Builds a root logger writing to stderr.
 */
export function createRootLogger(options: RootLoggerOptions = {}): Logger {
  const { level = defaultLevel(), pretty = process.env['LOG_PRETTY'] === '1' } = options;
  const base: LoggerOptions = { name: ROOT_NAME, level };

  if (pretty) {
    return pino({
      ...base,
      transport: { target: 'pino-pretty', options: { colorize: true, destination: 2 } },
    });
  }

  return pino(base, destination(2));
}

let root: Logger | null = null;

/**
 * Replaces the shared root logger. Loggers created afterwards inherit it.
 */
export function setRootLogger(logger: Logger): void {
  root = logger;
}

/**
 * Returns a child logger bound to a module name.
 *
 * @example
 * ```typescript
 * const log = createLogger('connection');
 * log.debug({ state: 'active' }, 'state changed');
 * ```
 */
export function createLogger(module: string, bindings: Record<string, unknown> = {}): Logger {
  if (root === null) {
    root = createRootLogger();
  }
  return root.child({ module, ...bindings });
}
