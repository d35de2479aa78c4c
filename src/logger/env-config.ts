/**
 * Logger configuration from environment variables
 *
 * | Variable              | Values                                  |
 * |-----------------------|-----------------------------------------|
 * | `EMBERLOG_FORMAT`     | `text`, `json`                          |
 * | `EMBERLOG_LEVEL`      | level name or integer                   |
 * | `EMBERLOG_ASYNC`      | `1`, `0`, `true`, `false`               |
 * | `EMBERLOG_QUEUE_SIZE` | integer                                 |
 * | `EMBERLOG_OVERFLOW`   | `drop-newest`, `drop-oldest`, `block`   |
 * | `EMBERLOG_TIME`       | `rfc3339nano`, `unix-millis`, `unix-nanos` |
 * | `EMBERLOG_DURATION`   | `string`, `millis`, `nanos`             |
 *
 * Unset or empty variables are left out so the defaults (or explicit options
 * spread over the result) apply.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ ...loggerConfigFromEnv(), name: 'worker' });
 * ```
 */

import { isLogLevel, type LogLevel } from '../fields/level.js';
import {
  DURATION_ENCODINGS,
  OUTPUT_FORMATS,
  TIME_ENCODINGS
} from '../encoding/render-options.js';
import { OVERFLOW_POLICIES } from '../delivery/types.js';
import type { LoggerConfig } from './types.js';

export const ENV_PREFIX = 'EMBERLOG_';

export type Environment = Readonly<Record<string, string | undefined>>;

/**
 * @throws {TypeError} when a variable holds a value it cannot take
 */
export function loggerConfigFromEnv(env: Environment = process.env): LoggerConfig {
  const config: LoggerConfig = {};

  const format = read(env, 'FORMAT');
  if (format !== undefined) {
    config.format = pick('FORMAT', format, OUTPUT_FORMATS);
  }

  const level = read(env, 'LEVEL');
  if (level !== undefined) {
    config.minLevel = parseLevel(level);
  }

  const async = read(env, 'ASYNC');
  if (async !== undefined) {
    config.async = parseBoolean('ASYNC', async);
  }

  const queueSize = read(env, 'QUEUE_SIZE');
  if (queueSize !== undefined) {
    config.queueCapacity = parseInteger('QUEUE_SIZE', queueSize);
  }

  const overflow = read(env, 'OVERFLOW');
  if (overflow !== undefined) {
    config.overflowPolicy = pick('OVERFLOW', overflow, OVERFLOW_POLICIES);
  }

  const time = read(env, 'TIME');
  if (time !== undefined) {
    config.timeEncoding = pick('TIME', time, TIME_ENCODINGS);
  }

  const duration = read(env, 'DURATION');
  if (duration !== undefined) {
    config.durationEncoding = pick('DURATION', duration, DURATION_ENCODINGS);
  }

  return config;
}

function read(env: Environment, suffix: string): string | undefined {
  const value = env[ENV_PREFIX + suffix]?.trim();
  return value === undefined || value === '' ? undefined : value;
}

function pick<T extends string>(suffix: string, value: string, allowed: readonly T[]): T {
  const lower = value.toLowerCase();
  const match = allowed.find((candidate) => candidate === lower);
  if (match === undefined) {
    throw invalid(suffix, value);
  }
  return match;
}

function parseLevel(value: string): LogLevel | number {
  const lower = value.toLowerCase();
  if (isLogLevel(lower)) {
    return lower;
  }
  if (/^[+-]?\d+$/.test(value)) {
    return Number.parseInt(value, 10);
  }
  throw invalid('LEVEL', value);
}

function parseBoolean(suffix: string, value: string): boolean {
  switch (value.toLowerCase()) {
    case '1':
    case 'true':
      return true;
    case '0':
    case 'false':
      return false;
    default:
      throw invalid(suffix, value);
  }
}

function parseInteger(suffix: string, value: string): number {
  if (!/^[+-]?\d+$/.test(value)) {
    throw invalid(suffix, value);
  }
  return Number.parseInt(value, 10);
}

function invalid(suffix: string, value: string): TypeError {
  return new TypeError(`Invalid ${ENV_PREFIX}${suffix}: "${value}"`);
}
