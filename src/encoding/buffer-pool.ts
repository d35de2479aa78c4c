/**
 * Freelist of reusable byte buffers.
 *
 * Each render checks out one buffer exclusively and returns it after the write
 * settles. Buffers that grew past `maxRetainedCapacity` are dropped instead of
 * pooled, and at most `maxPooled` idle buffers are kept, which bounds the
 * memory the pool can pin.
 *
 * @example
 * ```typescript
 * const pool = new BufferPool({ defaultCapacity: 1024 });
 * const buf = pool.acquire();
 * buf.writeAscii('hello\n');
 * await writer.write(buf.view());
 * pool.release(buf);
 * ```
 */

import { ByteBuffer } from './byte-buffer.js';

export const DEFAULT_BUFFER_CAPACITY = 2048;
export const MAX_RETAINED_BUFFER_CAPACITY = 64 * 1024;
export const MAX_POOLED_BUFFERS = 256;

export interface BufferPoolOptions {
  /** Capacity of freshly allocated buffers (default: 2048) */
  defaultCapacity?: number;
  /** Buffers above this capacity are not pooled (default: 64 KiB) */
  maxRetainedCapacity?: number;
  /** Maximum number of idle buffers kept (default: 256) */
  maxPooled?: number;
}

export class BufferPool {
  private readonly free: ByteBuffer[] = [];
  private readonly defaultCapacity: number;
  private readonly maxRetainedCapacity: number;
  private readonly maxPooled: number;

  constructor(options: BufferPoolOptions = {}) {
    this.defaultCapacity = positiveOr(options.defaultCapacity, DEFAULT_BUFFER_CAPACITY);
    this.maxRetainedCapacity = positiveOr(options.maxRetainedCapacity, MAX_RETAINED_BUFFER_CAPACITY);
    this.maxPooled = options.maxPooled !== undefined && options.maxPooled >= 0
      ? options.maxPooled
      : MAX_POOLED_BUFFERS;
  }

  /** Number of idle buffers currently held */
  get size(): number {
    return this.free.length;
  }

  /**
   * Checks out an empty buffer with capacity of at least `minCapacity`
   */
  acquire(minCapacity: number = this.defaultCapacity): ByteBuffer {
    const capacity = minCapacity > 0 ? minCapacity : this.defaultCapacity;
    const buf = this.free.pop();
    if (buf === undefined) {
      return new ByteBuffer(capacity);
    }
    buf.reset();
    buf.ensureCapacity(capacity);
    return buf;
  }

  /**
   * Returns a buffer to the pool. The caller must not touch it afterwards.
   *
   * @returns false when the buffer was dropped instead of pooled
   */
  release(buf: ByteBuffer): boolean {
    if (buf.capacity > this.maxRetainedCapacity || this.free.length >= this.maxPooled) {
      return false;
    }
    buf.reset();
    this.free.push(buf);
    return true;
  }

  /** Drops every idle buffer */
  clear(): void {
    this.free.length = 0;
  }
}

function positiveOr(value: number | undefined, fallback: number): number {
  return value !== undefined && value > 0 ? value : fallback;
}

/** Pool shared by engines that are not given one */
export const sharedBufferPool = new BufferPool();
