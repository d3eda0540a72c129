/**
 * Logging infrastructure.
 *
 * @module logging
 */

export {
  createLogger,
  createRootLogger,
  setRootLogger,
  type Logger,
  type RootLoggerOptions,
} from './logger.js';
