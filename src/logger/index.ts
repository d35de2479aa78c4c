/**
 * emberlog logger facade
 *
 * @example
 * ```typescript
 * import { createLogger, str, int } from 'emberlog/logger';
 *
 * const logger = createLogger({ format: 'json' });
 * const api = logger.with(str('svc', 'api'));
 *
 * api.info('ready', int('port', 8080));
 * api.event('debug').str('cache', 'warm').send();
 * ```
 */

// Facade
export * from './types.js';
export * from './events.js';
export * from './observer.js';
export * from './logger-config.js';
export * from './logger-impl.js';
export * from './env-config.js';
export * from './default-logger.js';

// Field constructors and levels, so `emberlog/logger` is usable on its own
export * from '../fields/index.js';

/** Current version of the logger package */
export const LOGGER_VERSION = '0.1.0';
