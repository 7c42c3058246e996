/**
 * Utility exports
 */

export { logger, createLogger, initErrorTracking, Logger, type LogLevel, type LogFormat } from './logger.js';
export {
  CONFIG_FILE_NAME,
  findConfigFile,
  loadConfig,
  getConfig,
  getDefaultConfig,
  saveConfig,
  validateConfig,
  resetConfig,
} from './config.js';
export * from './validation.js';
export { retryWithBackoff, sleep, type RetryOptions } from './retry.js';
export { Semaphore, KeyedLock } from './semaphore.js';
