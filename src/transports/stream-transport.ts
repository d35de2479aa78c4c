/**
 * Node.js stream transport
 *
 * Writes records to any `Writable` (stdout, a file stream, a socket). Each
 * write resolves when the stream has handed the chunk off, so the engine can
 * reuse the record buffer afterwards.
 *
 * @example
 * ```typescript
 * import { createWriteStream } from 'node:fs';
 * import { StreamTransport } from 'emberlog/transports';
 *
 * const file = new StreamTransport(createWriteStream('app.log', { flags: 'a' }), {
 *   name: 'file',
 *   endOnClose: true
 * });
 * ```
 */

import { once } from 'node:events';
import type { Writable } from 'node:stream';
import { BaseTransport } from './transport-interface.js';

export interface StreamTransportConfig {
  /** Transport name (default: 'stream') */
  name?: string;
  /** End the stream when the transport is closed (default: false) */
  endOnClose?: boolean;
}

export class StreamTransport extends BaseTransport {
  private readonly endOnClose: boolean;
  private readonly pending = new Set<(error: unknown) => void>();
  private failure: unknown = undefined;
  private failed = false;

  private readonly onError = (error: unknown): void => {
    this.failed = true;
    this.failure = error;
    for (const reject of this.pending) {
      reject(error);
    }
    this.pending.clear();
  };

  constructor(private readonly stream: Writable, config: StreamTransportConfig = {}) {
    super(config.name ?? 'stream');
    this.endOnClose = config.endOnClose ?? false;
    // a stream that errors is destroyed; every later write fails with the same error
    stream.on('error', this.onError);
  }

  write(chunk: Uint8Array): Promise<void> {
    if (this.failed) {
      return Promise.reject(this.failure);
    }
    return new Promise<void>((resolve, reject) => {
      this.pending.add(reject);
      this.stream.write(chunk, (error) => {
        this.pending.delete(reject);
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  /** Waits until the stream has drained its internal buffer */
  async flush(): Promise<void> {
    if (this.failed || this.stream.destroyed) {
      return;
    }
    if (this.stream.writableNeedDrain) {
      await once(this.stream, 'drain');
    }
  }

  /**
   * Ends the stream when configured. A transport that ends its stream also
   * stops listening for its errors; a shared stream keeps the listener.
   */
  async close(): Promise<void> {
    if (!this.endOnClose) {
      return;
    }
    if (!this.failed && !this.stream.writableEnded) {
      await new Promise<void>((resolve) => {
        this.stream.end(() => resolve());
      });
    }
    this.stream.off('error', this.onError);
  }
}

let stdoutTransport: StreamTransport | undefined;
let stderrTransport: StreamTransport | undefined;

/** Process-wide transport over `process.stdout` that never ends the stream */
export function createStdoutTransport(): StreamTransport {
  stdoutTransport ??= new StreamTransport(process.stdout, { name: 'stdout' });
  return stdoutTransport;
}

/** Process-wide transport over `process.stderr` that never ends the stream */
export function createStderrTransport(): StreamTransport {
  stderrTransport ??= new StreamTransport(process.stderr, { name: 'stderr' });
  return stderrTransport;
}
