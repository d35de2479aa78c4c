/**
 * Delivery engine types
 */

import type { Field } from '../fields/field.js';
import type { LogLevel } from '../fields/level.js';
import type { Timestamp } from '../fields/timestamp.js';
import type { BufferPool } from '../encoding/buffer-pool.js';
import type {
  DurationEncoding,
  LevelEncoding,
  OutputFormat,
  RenderOptions,
  TimeEncoding,
  TimeFormatter
} from '../encoding/render-options.js';
import type { LogWriter, WriterFactory } from '../transports/transport-interface.js';
import type { DeliveryError } from './errors.js';
import type { MetricsObserver } from './metrics.js';

/** Behaviour when the asynchronous queue is full */
export type OverflowPolicy = 'drop-newest' | 'drop-oldest' | 'block';

export const OVERFLOW_POLICIES: readonly OverflowPolicy[] = ['drop-newest', 'drop-oldest', 'block'];

/** Open → Closing → Closed */
export type EngineState = 'open' | 'closing' | 'closed';

export type ErrorHandler = (error: DeliveryError) => void;

/**
 * One log call as handed to the engine. The caller must not mutate it, or its
 * field list, until `log()` returns.
 */
export interface LogRequest {
  readonly level: number;
  readonly message: string;
  readonly timestamp: Timestamp;
  readonly fields: readonly Field[];
}

/**
 * Engine configuration; every option has a default
 */
export interface EngineOptions {
  /** Output format (default: 'text') */
  format?: OutputFormat;

  /**
   * Records below this level are discarded before any work (default: 'info').
   * Only the initial value; the level can be changed on a running engine.
   */
  minLevel?: LogLevel | number;

  /** Deliver through the background worker (default: false) */
  async?: boolean;

  /** Bounded queue capacity; values <= 0 mean the default (default: 1024) */
  queueCapacity?: number;

  /** Behaviour when the queue is full (default: 'drop-newest') */
  overflowPolicy?: OverflowPolicy;

  /** Encoding of the record timestamp and time fields (default: 'rfc3339nano') */
  timeEncoding?: TimeEncoding;

  /** Encoding of duration fields (default: 'string') */
  durationEncoding?: DurationEncoding;

  /** Encoding of the record level (default: 'numeric') */
  levelEncoding?: LevelEncoding;

  /** Custom layout for the text record timestamp (default: none) */
  timeFormat?: TimeFormatter;

  /** Initial render buffer capacity; values <= 0 mean the default (default: 2048) */
  bufferSize?: number;

  /** Receives queue-full, write and render errors (default: console.error) */
  errorHandler?: ErrorHandler;

  /** Observer notified after every write attempt (default: no-op) */
  metrics?: MetricsObserver;

  /** Single destination (default: stdout) */
  writer?: LogWriter;

  /** Per-level routing; takes precedence over `writer` */
  writers?: WriterFactory;

  /** Close closable transports when the engine closes (default: false) */
  closeWritersOnClose?: boolean;

  /** Buffer pool to render into (default: the shared pool) */
  bufferPool?: BufferPool;
}

/**
 * Options after defaults are applied; frozen
 */
export interface ResolvedEngineOptions extends RenderOptions {
  readonly format: OutputFormat;
  readonly minLevel: number;
  readonly async: boolean;
  readonly queueCapacity: number;
  readonly overflowPolicy: OverflowPolicy;
  readonly bufferSize: number;
  readonly errorHandler: ErrorHandler;
  readonly metrics: MetricsObserver;
  readonly writers: WriterFactory;
  readonly closeWritersOnClose: boolean;
  readonly bufferPool: BufferPool;
}
