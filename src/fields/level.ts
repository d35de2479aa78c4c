/**
 * Log level scale.
 *
 * Levels are plain integers compared against a threshold; the named levels
 * are spaced four apart so that intermediate values stay expressible. No
 * level carries runtime behaviour: `fatal` is rendered like any other level.
 */

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
 * Numeric value of each named level
 */
export const LOG_LEVEL_VALUES: Readonly<Record<LogLevel, number>> = Object.freeze({
  trace: -8,
  debug: -4,
  info: 0,
  warn: 4,
  error: 8,
  fatal: 12
});

const NAMES_DESCENDING: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'];

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVEL_VALUES, value);
}

/**
 * Resolves a level name or integer to its numeric value
 *
 * @throws {TypeError} for an unknown name or a non-integer number
 */
export function levelValue(level: LogLevel | number): number {
  if (typeof level === 'number') {
    if (!Number.isInteger(level)) {
      throw new TypeError(`Invalid log level: ${level}`);
    }
    return level;
  }
  if (!isLogLevel(level)) {
    throw new TypeError(`Invalid log level: ${String(level)}`);
  }
  return LOG_LEVEL_VALUES[level];
}

/**
 * Name of a numeric level. Values between named levels render as the nearest
 * lower name plus the offset (`info+2`); values below trace render as digits.
 */
export function levelName(level: number): string {
  for (const name of NAMES_DESCENDING) {
    const base = LOG_LEVEL_VALUES[name];
    if (level === base) {
      return name;
    }
    if (level > base) {
      return `${name}+${level - base}`;
    }
  }
  return String(level);
}
