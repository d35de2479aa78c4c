/**
 * Delivery engine: level filter, optional background queue, render and write.
 *
 * An engine and every child created with {@link DeliveryEngine.bind} share one
 * core (options, queue, worker, write lock, stats). A child differs only in
 * its pre-encoded bound fields.
 *
 * States: `open` → `closing` → `closed`. While closing, new records bypass the
 * queue and are written synchronously; once closed, `log()` does nothing.
 *
 * @example
 * ```typescript
 * const engine = createDeliveryEngine({ format: 'json', writer: new MemoryTransport() });
 * const api = engine.bind([str('svc', 'api')]);
 * api.log({ level: 0, message: 'ready', timestamp: new Date(), fields: [int('port', 8080)] });
 * await engine.close();
 * ```
 */

import type { Field } from '../fields/field.js';
import { levelValue, type LogLevel } from '../fields/level.js';
import type { Timestamp } from '../fields/timestamp.js';
import { BoundFields } from '../encoding/bound-prefix.js';
import { rendererFor, type Renderer } from '../encoding/renderer.js';
import {
  isClosable,
  isFlushable,
  type ClosableWriter,
  type FlushableWriter
} from '../transports/transport-interface.js';
import { AsyncWorker } from './async-worker.js';
import { BoundedQueue } from './bounded-queue.js';
import { resolveEngineOptions } from './engine-options.js';
import { DeliveryError, QueueFullError, RenderError, WriteError } from './errors.js';
import { FieldListPool } from './field-list-pool.js';
import { isNoopObserver, type MetricsObserver } from './metrics.js';
import { DeliveryStats, type StatsSnapshot } from './stats.js';
import type { EngineOptions, EngineState, LogRequest, ResolvedEngineOptions } from './types.js';
import { WriteLock } from './write-lock.js';

/** `log()` returns a promise only when a Block-policy caller must wait */
export type LogResult = void | Promise<void>;

interface QueuedRecord {
  readonly bound: BoundFields;
  readonly level: number;
  readonly message: string;
  readonly timestamp: Timestamp;
  readonly fields: Field[];
}

/**
 * State shared by an engine and its children
 *
 * @internal
 */
export class EngineCore {
  readonly renderer: Renderer;
  readonly stats = new DeliveryStats();
  state: EngineState = 'open';
  minLevel: number;

  private readonly fieldLists = new FieldListPool();
  private readonly lock: WriteLock;
  private readonly queue: BoundedQueue<QueuedRecord> | undefined;
  private readonly worker: AsyncWorker<QueuedRecord> | undefined;
  private readonly flushables: readonly FlushableWriter[];
  private readonly closables: readonly ClosableWriter[];
  private metrics: MetricsObserver;
  private measure: boolean;
  private closing: Promise<void> | undefined;

  constructor(readonly options: ResolvedEngineOptions) {
    this.renderer = rendererFor(options.format);
    this.minLevel = options.minLevel;
    this.lock = new WriteLock((error) => this.fault(error));
    if (options.async) {
      const queue = new BoundedQueue<QueuedRecord>(options.queueCapacity);
      this.queue = queue;
      this.worker = new AsyncWorker(
        queue,
        (record) => this.deliverQueued(record),
        (error) => this.fault(error)
      );
    }
    const writers = options.writers.writers();
    this.flushables = writers.filter(isFlushable);
    this.closables = writers.filter(isClosable);
    this.metrics = options.metrics;
    this.measure = !isNoopObserver(options.metrics);
  }

  log(bound: BoundFields, level: number, message: string, timestamp: Timestamp, fields: readonly Field[]): LogResult {
    if (!this.enabled(level)) {
      return;
    }
    if (this.queue !== undefined && this.state === 'open') {
      return this.enqueue(this.queue, { bound, level, message, timestamp, fields: this.fieldLists.copy(fields) });
    }
    void this.deliver(bound, level, message, timestamp, fields);
  }

  /** Non-integer levels are never enabled */
  enabled(level: number): boolean {
    return Number.isInteger(level) && level >= this.minLevel && this.state !== 'closed';
  }

  setMetricsObserver(observer: MetricsObserver): void {
    this.metrics = observer;
    this.measure = !isNoopObserver(observer);
  }

  async flush(): Promise<void> {
    if (this.state === 'closed') {
      return;
    }
    await this.settle();
    await this.eachWriter(this.flushables, 'flush', (writer) => writer.flush());
  }

  close(): Promise<void> {
    if (this.closing === undefined) {
      this.state = 'closing';
      this.closing = this.shutdown();
    }
    return this.closing;
  }

  private async shutdown(): Promise<void> {
    await this.settle();
    await this.eachWriter(this.flushables, 'flush', (writer) => writer.flush());
    if (this.options.closeWritersOnClose) {
      await this.eachWriter(this.closables, 'close', (writer) => writer.close());
    }
    this.state = 'closed';
  }

  /** Waits until the queue is drained and no write is in flight */
  private async settle(): Promise<void> {
    do {
      await this.worker?.idle();
      await this.lock.idle();
    } while (this.worker?.isRunning === true || this.lock.busy);
  }

  private enqueue(queue: BoundedQueue<QueuedRecord>, record: QueuedRecord): LogResult {
    if (queue.tryPush(record)) {
      this.worker?.wake();
      return;
    }
    switch (this.options.overflowPolicy) {
      case 'block': {
        const admitted = queue.waitPush(record);
        this.worker?.wake();
        return admitted;
      }
      case 'drop-oldest': {
        // the evicted record is released silently; only a failed retry counts
        const evicted = queue.evictOldest();
        if (evicted !== undefined) {
          this.fieldLists.release(evicted.fields);
        }
        if (queue.tryPush(record)) {
          this.worker?.wake();
          return;
        }
        this.drop(record);
        return;
      }
      case 'drop-newest':
        this.drop(record);
        return;
    }
  }

  private drop(record: QueuedRecord): void {
    this.fieldLists.release(record.fields);
    this.stats.recordDrop();
    this.report(new QueueFullError(this.options.overflowPolicy));
  }

  private deliverQueued(record: QueuedRecord): Promise<void> | undefined {
    try {
      return this.deliver(record.bound, record.level, record.message, record.timestamp, record.fields);
    } finally {
      this.fieldLists.release(record.fields);
    }
  }

  /**
   * Renders one record and hands it to the write lock. Rendering finishes
   * before this returns; only the write may still be pending.
   */
  private deliver(
    bound: BoundFields,
    level: number,
    message: string,
    timestamp: Timestamp,
    fields: readonly Field[]
  ): Promise<void> | undefined {
    const writer = this.options.writers.writerFor(level);
    if (writer === undefined) {
      return undefined;
    }

    const measuring = this.measure;
    const started = measuring ? performance.now() : 0;
    const pool = this.options.bufferPool;
    const buf = pool.acquire(this.options.bufferSize);
    try {
      this.renderer.render(buf, level, message, timestamp, bound.prefix(this.renderer.format), fields, this.options);
    } catch (fault: unknown) {
      pool.release(buf);
      const error = new RenderError(fault);
      this.stats.recordError();
      this.report(error);
      this.observe(level, 0, 0, error);
      return undefined;
    }

    const bytes = buf.length;
    return this.lock.run(
      () => writer.write(buf.view()),
      (outcome) => {
        pool.release(buf);
        const elapsed = measuring ? performance.now() - started : 0;
        if (!outcome.failed) {
          this.observe(level, elapsed, bytes);
          return;
        }
        const error = new WriteError(writer.name, outcome.error);
        this.stats.recordError();
        this.report(error);
        this.observe(level, elapsed, 0, error);
      }
    );
  }

  private report(error: DeliveryError): void {
    try {
      this.options.errorHandler(error);
    } catch (handlerError: unknown) {
      console.error('[emberlog] error handler failed:', handlerError, error);
    }
  }

  private observe(level: number, durationMs: number, bytes: number, error?: Error): void {
    try {
      this.metrics.loggedMessage(level, durationMs, bytes, error);
    } catch (observerError: unknown) {
      console.error('[emberlog] metrics observer failed:', observerError);
    }
  }

  private fault(error: unknown): void {
    console.error('[emberlog] delivery fault:', error);
  }

  private async eachWriter<W extends FlushableWriter | ClosableWriter>(
    writers: readonly W[],
    operation: 'flush' | 'close',
    run: (writer: W) => void | Promise<void>
  ): Promise<void> {
    await Promise.all(
      writers.map(async (writer) => {
        try {
          await run(writer);
        } catch (error: unknown) {
          console.error(`[emberlog] transport ${writer.name} ${operation} failed:`, error);
        }
      })
    );
  }
}

/**
 * Handle onto a delivery engine carrying its own bound fields
 */
export class DeliveryEngine {
  /** @internal use {@link createDeliveryEngine} */
  constructor(
    private readonly core: EngineCore,
    private readonly bound: BoundFields
  ) {}

  get options(): ResolvedEngineOptions {
    return this.core.options;
  }

  get state(): EngineState {
    return this.core.state;
  }

  /** Current minimum level, shared with every child */
  get minLevel(): number {
    return this.core.minLevel;
  }

  /** Fields bound to this handle, in output order */
  get boundFields(): readonly Field[] {
    return this.bound.fields;
  }

  /** True when a record of `level` would be delivered */
  enabled(level: number): boolean {
    return this.core.enabled(level);
  }

  /**
   * Changes the minimum level of this engine and all its children
   *
   * @returns the previous minimum level
   * @throws {TypeError} for an unknown level name or a non-integer level
   */
  setMinLevel(level: LogLevel | number): number {
    const previous = this.core.minLevel;
    this.core.minLevel = levelValue(level);
    return previous;
  }

  /**
   * Delivers one record. Never throws; failures go to the error handler.
   *
   * @returns a promise only under the Block policy while the queue is full;
   * it resolves once the record is queued
   */
  log(request: LogRequest): LogResult {
    return this.core.log(this.bound, request.level, request.message, request.timestamp, request.fields);
  }

  /**
   * Child handle whose records carry this handle's bound fields followed by
   * `fields`. The prefix is rendered here, once per output format.
   */
  bind(fields: readonly Field[]): DeliveryEngine {
    if (fields.length === 0) {
      return this;
    }
    return new DeliveryEngine(this.core, this.bound.bind(fields, this.core.options, this.core.options.bufferPool));
  }

  stats(): StatsSnapshot {
    return this.core.stats.snapshot();
  }

  resetStats(): void {
    this.core.stats.reset();
  }

  /** Replaces the observer for this engine and all its children */
  setMetricsObserver(observer: MetricsObserver): void {
    this.core.setMetricsObserver(observer);
  }

  /**
   * Waits for queued records and in-flight writes, then flushes transports
   * that can be flushed
   */
  flush(): Promise<void> {
    return this.core.flush();
  }

  /**
   * Drains the queue, settles writes and flushes transports; closes them too
   * when `closeWritersOnClose` is set. Repeated calls share one completion.
   */
  close(): Promise<void> {
    return this.core.close();
  }
}

/**
 * Creates a root engine with no bound fields
 *
 * @throws {TypeError} for invalid options
 */
export function createDeliveryEngine(options: EngineOptions = {}): DeliveryEngine {
  return new DeliveryEngine(new EngineCore(resolveEngineOptions(options)), BoundFields.EMPTY);
}
