/**
 * Process-wide default logger.
 *
 * Pass loggers explicitly where you can. For code that cannot, one default may
 * be installed at startup with {@link initDefaultLogger}; it is never replaced
 * afterwards. Until then {@link defaultLogger} returns a silent logger.
 *
 * @example
 * ```typescript
 * // main.ts
 * initDefaultLogger({ ...loggerConfigFromEnv(), name: 'api' });
 *
 * // anywhere else
 * defaultLogger().info('cache warmed', int('entries', 5120));
 * ```
 */

import { LevelWriterFactory } from '../transports/transport-interface.js';
import { createLogger } from './logger-impl.js';
import type { Logger, LoggerConfig } from './types.js';

let installed: Logger | undefined;
let silent: Logger | undefined;

/**
 * Builds the default logger
 *
 * @throws {Error} when a default logger is already installed
 */
export function initDefaultLogger(config: LoggerConfig = {}): Logger {
  if (installed !== undefined) {
    throw new Error(`Default logger "${installed.name}" is already initialized`);
  }
  installed = createLogger(config);
  return installed;
}

/** The installed default, or a silent logger before initialization */
export function defaultLogger(): Logger {
  if (installed !== undefined) {
    return installed;
  }
  if (silent === undefined) {
    silent = createSilentLogger();
  }
  return silent;
}

export function isDefaultLoggerInitialized(): boolean {
  return installed !== undefined;
}

/**
 * Logger that filters every level and has no transport
 */
export function createSilentLogger(name: string = 'silent'): Logger {
  return createLogger({
    name,
    minLevel: Number.MAX_SAFE_INTEGER,
    writers: new LevelWriterFactory(undefined)
  });
}

/**
 * Closes and uninstalls the default logger. Meant for test teardown.
 */
export async function resetDefaultLogger(): Promise<void> {
  const current = installed;
  installed = undefined;
  if (current !== undefined) {
    await current.close();
  }
}
