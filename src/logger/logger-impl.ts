/** Logger facade over the delivery engine */

import type { Field } from '../fields/field.js';
import { LOG_LEVEL_VALUES, levelValue, type LogLevel } from '../fields/level.js';
import { createDeliveryEngine, type DeliveryEngine, type LogResult } from '../delivery/delivery-engine.js';
import type { MetricsObserver } from '../delivery/metrics.js';
import type { StatsSnapshot } from '../delivery/stats.js';
import { DISABLED_EVENT, EventBuilderPool, type EventSink, type LogEventBuilder } from './events.js';
import { mergeConfig } from './logger-config.js';
import { ObserverList } from './observer.js';
import type { Clock, Logger, LoggerConfig } from './types.js';

/** Logger handle; children share the engine, clock and builder pool */
export class LoggerImpl implements Logger, EventSink {
  /** Creates a logger over an existing engine handle */
  constructor(
    private readonly engine: DeliveryEngine,
    private readonly clock: Clock,
    private readonly loggerName: string = 'default',
    private readonly builders: EventBuilderPool = new EventBuilderPool(),
    private readonly observers: ObserverList = ObserverList.EMPTY
  ) {}

  /** Logger name/identifier */
  get name(): string {
    return this.loggerName;
  }

  /** Current minimum log level */
  get level(): number {
    return this.engine.minLevel;
  }

  /**
   * @throws {TypeError} for an unknown level name or a non-integer level
   */
  setLevel(level: LogLevel | number): void {
    const previous = this.engine.setMinLevel(level);
    const current = this.engine.minLevel;
    if (previous !== current) {
      this.observers.notifyConfig(this.loggerName, previous, current);
    }
  }

  get boundFields(): readonly Field[] {
    return this.engine.boundFields;
  }

  /** Logs a trace-level message */
  trace(message: string, ...fields: readonly Field[]): LogResult {
    return this.emit(LOG_LEVEL_VALUES.trace, message, fields);
  }

  /** Logs a debug-level message */
  debug(message: string, ...fields: readonly Field[]): LogResult {
    return this.emit(LOG_LEVEL_VALUES.debug, message, fields);
  }

  /** Logs an info-level message */
  info(message: string, ...fields: readonly Field[]): LogResult {
    return this.emit(LOG_LEVEL_VALUES.info, message, fields);
  }

  /** Logs a warning-level message */
  warn(message: string, ...fields: readonly Field[]): LogResult {
    return this.emit(LOG_LEVEL_VALUES.warn, message, fields);
  }

  /** Logs an error-level message */
  error(message: string, ...fields: readonly Field[]): LogResult {
    return this.emit(LOG_LEVEL_VALUES.error, message, fields);
  }

  /** Logs a fatal-level message without terminating the process */
  fatal(message: string, ...fields: readonly Field[]): LogResult {
    return this.emit(LOG_LEVEL_VALUES.fatal, message, fields);
  }

  /**
   * Logs at any level
   *
   * @throws {TypeError} for an unknown level name or a non-integer level
   */
  log(level: LogLevel | number, message: string, fields: readonly Field[] = []): LogResult {
    return this.emit(levelValue(level), message, fields);
  }

  enabled(level: LogLevel | number): boolean {
    return this.engine.enabled(levelValue(level));
  }

  /** Creates a child logger with additional bound fields */
  with(...fields: readonly Field[]): Logger {
    if (fields.length === 0) {
      return this;
    }
    return new LoggerImpl(this.engine.bind(fields), this.clock, this.loggerName, this.builders, this.observers);
  }

  event(level: LogLevel | number): LogEventBuilder {
    const value = levelValue(level);
    if (!this.engine.enabled(value)) {
      return DISABLED_EVENT;
    }
    return this.builders.acquire(this, value);
  }

  /**
   * Hands one record to the engine, then to the observers. The level is
   * checked before the clock is read or the request is built.
   */
  emit(level: number, message: string, fields: readonly Field[]): LogResult {
    if (!this.engine.enabled(level)) {
      return;
    }
    const timestamp = this.clock();
    const result = this.engine.log({ level, message, timestamp, fields });
    this.observers.notifyEvent(this.loggerName, level, message, timestamp, fields);
    return result;
  }

  stats(): StatsSnapshot {
    return this.engine.stats();
  }

  resetStats(): void {
    this.engine.resetStats();
  }

  setMetricsObserver(observer: MetricsObserver): void {
    this.engine.setMetricsObserver(observer);
  }

  /** Flushes queued records and transports */
  async flush(): Promise<void> {
    await this.engine.flush();
  }

  /** Drains and closes the shared engine */
  async close(): Promise<void> {
    await this.engine.close();
  }
}

/**
 * Creates a new logger with its own delivery engine
 *
 * @throws {TypeError} for invalid configuration
 *
 * @example
 * ```typescript
 * const logger = createLogger({ format: 'json', minLevel: 'debug' });
 * logger.info('listening', int('port', 8080));
 * ```
 */
export function createLogger(config?: LoggerConfig): Logger {
  const merged = mergeConfig(config);
  return new LoggerImpl(
    createDeliveryEngine(merged),
    merged.clock,
    merged.name,
    new EventBuilderPool(),
    new ObserverList(merged.observers ?? [])
  );
}
