/**
 * Logger configuration defaults
 */

import type { LogLevel } from '../fields/level.js';
import type { Timestamp } from '../fields/timestamp.js';
import type { Clock, LoggerConfig } from './types.js';

/**
 * Default log level for new loggers
 */
export const DEFAULT_LOG_LEVEL: LogLevel = 'info';

export const DEFAULT_LOGGER_NAME = 'default';

export function systemClock(): Timestamp {
  return new Date();
}

/**
 * Facade defaults; engine defaults live with the engine options
 */
export const DEFAULT_LOGGER_CONFIG: Readonly<{ name: string; clock: Clock }> = Object.freeze({
  name: DEFAULT_LOGGER_NAME,
  clock: systemClock
});

/**
 * Merges user configuration with the facade defaults
 *
 * @throws {TypeError} when `name` is empty
 */
export function mergeConfig(userConfig: LoggerConfig = {}): LoggerConfig & { name: string; clock: Clock } {
  const name = userConfig.name ?? DEFAULT_LOGGER_CONFIG.name;
  if (name.length === 0) {
    throw new TypeError('Logger name must not be empty');
  }
  return {
    ...userConfig,
    name,
    clock: userConfig.clock ?? DEFAULT_LOGGER_CONFIG.clock
  };
}
