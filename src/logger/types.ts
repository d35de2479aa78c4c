/**
 * Logger facade types
 *
 * The facade turns calls such as `logger.info('ready', int('port', 8080))`
 * into `(level, message, timestamp, fields)` requests for the delivery engine.
 *
 * @example
 * ```typescript
 * import type { Logger, LoggerConfig } from 'emberlog';
 *
 * const config: LoggerConfig = {
 *   name: 'api',
 *   format: 'json',
 *   minLevel: 'debug',
 *   async: true,
 *   overflowPolicy: 'drop-oldest'
 * };
 *
 * function handle(logger: Logger): void {
 *   logger.with(str('route', '/health')).debug('request');
 * }
 * ```
 */

import type { Field } from '../fields/field.js';
import type { LogLevel } from '../fields/level.js';
import type { Timestamp } from '../fields/timestamp.js';
import type { LogResult } from '../delivery/delivery-engine.js';
import type { MetricsObserver } from '../delivery/metrics.js';
import type { StatsSnapshot } from '../delivery/stats.js';
import type { EngineOptions } from '../delivery/types.js';
import type { LogEventBuilder } from './events.js';
import type { LoggerObserver } from './observer.js';

/** Source of record timestamps */
export type Clock = () => Timestamp;

/**
 * Logger configuration: engine options plus facade settings
 */
export interface LoggerConfig extends EngineOptions {
  /** Logger name/identifier (default: 'default') */
  name?: string;

  /** Timestamp source, read only for records that pass the level filter (default: `new Date()`) */
  clock?: Clock;

  /** Notified of emitted records and level changes; shared with children (default: none) */
  observers?: readonly LoggerObserver[];
}

/**
 * Structured logger
 */
export interface Logger {
  /** Logger name/identifier */
  readonly name: string;

  /** Numeric minimum level */
  readonly level: number;

  /**
   * Changes the minimum level. The level is shared: the parent and every
   * child see the change.
   */
  setLevel(level: LogLevel | number): void;

  /** Fields bound with {@link Logger.with}, in output order */
  readonly boundFields: readonly Field[];

  trace(message: string, ...fields: readonly Field[]): LogResult;
  debug(message: string, ...fields: readonly Field[]): LogResult;
  info(message: string, ...fields: readonly Field[]): LogResult;
  warn(message: string, ...fields: readonly Field[]): LogResult;
  error(message: string, ...fields: readonly Field[]): LogResult;

  /** Logs at level 12; the process keeps running */
  fatal(message: string, ...fields: readonly Field[]): LogResult;

  /** Logs at any named or numeric level */
  log(level: LogLevel | number, message: string, fields?: readonly Field[]): LogResult;

  /** True when a record of `level` would be written */
  enabled(level: LogLevel | number): boolean;

  /** Child logger whose records carry `fields` after this logger's bound fields */
  with(...fields: readonly Field[]): Logger;

  /** Fluent builder for one record; finish it with `msg()` or `send()` */
  event(level: LogLevel | number): LogEventBuilder;

  /** Delivery counters shared with every child */
  stats(): StatsSnapshot;

  resetStats(): void;

  setMetricsObserver(observer: MetricsObserver): void;

  /** Waits for queued and in-flight records, then flushes transports */
  flush(): Promise<void>;

  /** Drains and shuts the engine down; shared by every child */
  close(): Promise<void>;
}

/**
 * Logger factory function type
 */
export type LoggerFactory = (config?: LoggerConfig) => Logger;
