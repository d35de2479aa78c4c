/**
 * Engine option defaults, merging and validation
 */

import { levelValue } from '../fields/level.js';
import { DEFAULT_BUFFER_CAPACITY, sharedBufferPool } from '../encoding/buffer-pool.js';
import {
  DEFAULT_RENDER_OPTIONS,
  DURATION_ENCODINGS,
  LEVEL_ENCODINGS,
  OUTPUT_FORMATS,
  TIME_ENCODINGS
} from '../encoding/render-options.js';
import { createStdoutTransport } from '../transports/stream-transport.js';
import { SingleWriterFactory, type WriterFactory } from '../transports/transport-interface.js';
import type { DeliveryError } from './errors.js';
import { NoopMetricsObserver } from './metrics.js';
import {
  OVERFLOW_POLICIES,
  type EngineOptions,
  type ResolvedEngineOptions
} from './types.js';

export const DEFAULT_QUEUE_CAPACITY = 1024;

/**
 * Writes delivery errors to the console; the library never logs through
 * itself
 */
export function defaultErrorHandler(error: DeliveryError): void {
  console.error(`[emberlog] ${error.message}`, error);
}

/**
 * Default engine configuration. The writer is left out: the stdout transport
 * is only created when no writer is supplied.
 */
export const DEFAULT_ENGINE_OPTIONS = Object.freeze({
  format: 'text',
  minLevel: 'info',
  async: false,
  queueCapacity: DEFAULT_QUEUE_CAPACITY,
  overflowPolicy: 'drop-newest',
  ...DEFAULT_RENDER_OPTIONS,
  bufferSize: DEFAULT_BUFFER_CAPACITY,
  errorHandler: defaultErrorHandler,
  closeWritersOnClose: false
} satisfies EngineOptions);

/**
 * Merges user options over the defaults and validates them
 *
 * @throws {TypeError} for an unknown format, policy or encoding, an invalid
 * level, or a non-integer size
 */
export function resolveEngineOptions(options: EngineOptions = {}): ResolvedEngineOptions {
  const format = oneOf('format', options.format ?? DEFAULT_ENGINE_OPTIONS.format, OUTPUT_FORMATS);
  const overflowPolicy = oneOf(
    'overflowPolicy',
    options.overflowPolicy ?? DEFAULT_ENGINE_OPTIONS.overflowPolicy,
    OVERFLOW_POLICIES
  );
  const timeEncoding = oneOf(
    'timeEncoding',
    options.timeEncoding ?? DEFAULT_ENGINE_OPTIONS.timeEncoding,
    TIME_ENCODINGS
  );
  const durationEncoding = oneOf(
    'durationEncoding',
    options.durationEncoding ?? DEFAULT_ENGINE_OPTIONS.durationEncoding,
    DURATION_ENCODINGS
  );
  const levelEncoding = oneOf(
    'levelEncoding',
    options.levelEncoding ?? DEFAULT_ENGINE_OPTIONS.levelEncoding,
    LEVEL_ENCODINGS
  );

  return Object.freeze({
    format,
    minLevel: levelValue(options.minLevel ?? DEFAULT_ENGINE_OPTIONS.minLevel),
    async: options.async ?? DEFAULT_ENGINE_OPTIONS.async,
    queueCapacity: sizeOr('queueCapacity', options.queueCapacity, DEFAULT_QUEUE_CAPACITY),
    overflowPolicy,
    timeEncoding,
    durationEncoding,
    levelEncoding,
    timeFormat: options.timeFormat,
    bufferSize: sizeOr('bufferSize', options.bufferSize, DEFAULT_BUFFER_CAPACITY),
    errorHandler: options.errorHandler ?? DEFAULT_ENGINE_OPTIONS.errorHandler,
    metrics: options.metrics ?? new NoopMetricsObserver(),
    writers: resolveWriters(options),
    closeWritersOnClose: options.closeWritersOnClose ?? DEFAULT_ENGINE_OPTIONS.closeWritersOnClose,
    bufferPool: options.bufferPool ?? sharedBufferPool
  });
}

function resolveWriters(options: EngineOptions): WriterFactory {
  if (options.writers !== undefined) {
    return options.writers;
  }
  return new SingleWriterFactory(options.writer ?? createStdoutTransport());
}

function oneOf<T extends string>(name: string, value: string, allowed: readonly T[]): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new TypeError(`Invalid ${name}: "${value}" (expected one of ${allowed.join(', ')})`);
  }
  return match;
}

/** Values <= 0 select the default */
function sizeOr(name: string, value: number | undefined, fallback: number): number {
  if (value === undefined) {
    return fallback;
  }
  if (!Number.isInteger(value)) {
    throw new TypeError(`${name} must be an integer, got ${value}`);
  }
  return value > 0 ? value : fallback;
}
