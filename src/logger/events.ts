/**
 * Fluent per-record builder.
 *
 * Builders come from a bounded freelist and go back to it when the record is
 * sent, so a builder must not be touched after `msg()` or `send()`. A builder
 * obtained for a disabled level is a shared inert instance: every method is a
 * no-op and no field is constructed.
 *
 * @example
 * ```typescript
 * logger.event('warn')
 *   .str('path', '/upload')
 *   .int('status', 413)
 *   .dur('elapsed', Duration.ms(12))
 *   .msg('request rejected');
 * ```
 */

import type { Duration } from '../fields/duration.js';
import {
  any,
  bool,
  bytes,
  dur,
  err,
  float64,
  int64,
  str,
  time,
  uint64,
  type Field
} from '../fields/field.js';
import type { Timestamp } from '../fields/timestamp.js';
import type { LogResult } from '../delivery/delivery-engine.js';

export const MAX_POOLED_EVENT_BUILDERS = 64;

/** Field arrays grown beyond this are replaced instead of reused */
export const MAX_RETAINED_EVENT_FIELDS = 128;

/**
 * Receives the finished record
 */
export interface EventSink {
  emit(level: number, message: string, fields: readonly Field[]): LogResult;
}

export class LogEventBuilder {
  private pending: Field[] = [];
  private sink: EventSink | undefined;
  private level = 0;

  /** @internal obtain builders from {@link EventBuilderPool} or `Logger.event` */
  constructor(private readonly pool: EventBuilderPool | undefined) {}

  /** False for the inert builder and for a builder already sent */
  get active(): boolean {
    return this.sink !== undefined;
  }

  /** @internal */
  start(sink: EventSink, level: number): this {
    this.sink = sink;
    this.level = level;
    return this;
  }

  str(key: string, value: string): this {
    return this.sink === undefined ? this : this.add(str(key, value));
  }

  int(key: string, value: number | bigint): this {
    return this.sink === undefined ? this : this.add(int64(key, value));
  }

  uint(key: string, value: number | bigint): this {
    return this.sink === undefined ? this : this.add(uint64(key, value));
  }

  float(key: string, value: number): this {
    return this.sink === undefined ? this : this.add(float64(key, value));
  }

  bool(key: string, value: boolean): this {
    return this.sink === undefined ? this : this.add(bool(key, value));
  }

  dur(key: string, value: Duration | number): this {
    return this.sink === undefined ? this : this.add(dur(key, value));
  }

  time(key: string, value: Timestamp): this {
    return this.sink === undefined ? this : this.add(time(key, value));
  }

  err(value: Error | null | undefined, key: string = 'error'): this {
    return this.sink === undefined ? this : this.add(err(key, value));
  }

  bytes(key: string, value: Uint8Array): this {
    return this.sink === undefined ? this : this.add(bytes(key, value));
  }

  any(key: string, value: unknown): this {
    return this.sink === undefined ? this : this.add(any(key, value));
  }

  /** Appends prebuilt fields */
  fields(...fields: readonly Field[]): this {
    if (this.sink !== undefined) {
      for (const field of fields) {
        this.pending.push(field);
      }
    }
    return this;
  }

  /** Sends the record and returns the builder to its pool */
  msg(message: string): LogResult {
    const sink = this.sink;
    if (sink === undefined) {
      return;
    }
    try {
      return sink.emit(this.level, message, this.pending);
    } finally {
      this.recycle();
    }
  }

  /** Sends the record with an empty message */
  send(): LogResult {
    return this.msg('');
  }

  private add(field: Field): this {
    this.pending.push(field);
    return this;
  }

  private recycle(): void {
    this.sink = undefined;
    if (this.pending.length > MAX_RETAINED_EVENT_FIELDS) {
      this.pending = [];
    } else {
      this.pending.length = 0;
    }
    this.pool?.release(this);
  }
}

/**
 * Shared builder for disabled levels
 */
export const DISABLED_EVENT: LogEventBuilder = new LogEventBuilder(undefined);

/**
 * Bounded freelist of builders
 */
export class EventBuilderPool {
  private readonly free: LogEventBuilder[] = [];

  constructor(private readonly maxPooled: number = MAX_POOLED_EVENT_BUILDERS) {}

  get size(): number {
    return this.free.length;
  }

  acquire(sink: EventSink, level: number): LogEventBuilder {
    const builder = this.free.pop() ?? new LogEventBuilder(this);
    return builder.start(sink, level);
  }

  /** @internal called by the builder once its record is sent */
  release(builder: LogEventBuilder): void {
    if (this.free.length < this.maxPooled) {
      this.free.push(builder);
    }
  }
}
