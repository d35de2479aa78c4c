/**
 * Logger observers.
 *
 * Observers see every record a logger emits, as a snapshot taken after the
 * record was handed to the delivery engine, and every change of the minimum
 * level. They run on the caller's stack, so keep them cheap. An observer that
 * throws is reported to `console.error` and never affects the log call or the
 * other observers.
 *
 * @example
 * ```typescript
 * const levelAudit: LoggerObserver = {
 *   onEvent: () => undefined,
 *   onConfig: (change) => audit.push(`${change.previousLevel} -> ${change.level}`)
 * };
 * const logger = createLogger({ observers: [levelAudit] });
 * logger.setLevel('debug');
 * ```
 */

import type { Field } from '../fields/field.js';
import type { Timestamp } from '../fields/timestamp.js';

/** Read-only snapshot of one emitted record; safe to keep */
export interface LogEventData {
  readonly loggerName: string;
  readonly level: number;
  readonly message: string;
  readonly timestamp: Timestamp;
  readonly fields: readonly Field[];
}

/** Minimum-level change */
export interface LevelChangedEvent {
  readonly loggerName: string;
  readonly previousLevel: number;
  readonly level: number;
}

export interface LoggerObserver {
  onEvent(event: LogEventData): void;
  onConfig(change: LevelChangedEvent): void;
}

/**
 * Immutable observer list shared by a logger and its children
 */
export class ObserverList {
  static readonly EMPTY = new ObserverList([]);

  private readonly observers: readonly LoggerObserver[];

  constructor(observers: readonly LoggerObserver[]) {
    this.observers = Object.freeze([...observers]);
  }

  get isEmpty(): boolean {
    return this.observers.length === 0;
  }

  notifyEvent(loggerName: string, level: number, message: string, timestamp: Timestamp, fields: readonly Field[]): void {
    if (this.observers.length === 0) {
      return;
    }
    const event: LogEventData = Object.freeze({
      loggerName,
      level,
      message,
      timestamp,
      fields: Object.freeze([...fields])
    });
    for (const observer of this.observers) {
      try {
        observer.onEvent(event);
      } catch (error: unknown) {
        console.error('[emberlog] observer failed on event:', error);
      }
    }
  }

  notifyConfig(loggerName: string, previousLevel: number, level: number): void {
    if (this.observers.length === 0) {
      return;
    }
    const change: LevelChangedEvent = Object.freeze({ loggerName, previousLevel, level });
    for (const observer of this.observers) {
      try {
        observer.onConfig(change);
      } catch (error: unknown) {
        console.error('[emberlog] observer failed on level change:', error);
      }
    }
  }
}
