/**
 * Transport interfaces for emberlog
 *
 * A transport receives complete, newline-terminated records as bytes. Flush
 * and close are optional capabilities: the engine detects them once, when it
 * is constructed, through the type guards below.
 */

/**
 * Destination for rendered records.
 *
 * `write` gets a view into a pooled buffer. The view stays valid until the
 * returned promise settles (or until `write` returns, for synchronous
 * transports); a transport that keeps the bytes longer must copy them.
 */
export interface LogWriter {
  /** Transport name for identification in errors */
  readonly name: string;

  /** Write one record; reject or throw to report a failed write */
  write(chunk: Uint8Array): void | Promise<void>;
}

/** Transport that buffers and can be asked to push pending output */
export interface FlushableWriter extends LogWriter {
  flush(): void | Promise<void>;
}

/** Transport that owns a resource to release */
export interface ClosableWriter extends LogWriter {
  close(): void | Promise<void>;
}

export function isFlushable(writer: LogWriter): writer is FlushableWriter {
  return 'flush' in writer && typeof writer.flush === 'function';
}

export function isClosable(writer: LogWriter): writer is ClosableWriter {
  return 'close' in writer && typeof writer.close === 'function';
}

/**
 * Routes records to a transport by level
 */
export interface WriterFactory {
  /** Transport for records of `level`, or undefined to skip them */
  writerFor(level: number): LogWriter | undefined;

  /** Every distinct transport this factory can return */
  writers(): readonly LogWriter[];
}

/**
 * Sends every level to one transport
 */
export class SingleWriterFactory implements WriterFactory {
  constructor(private readonly writer: LogWriter) {}

  writerFor(_level: number): LogWriter {
    return this.writer;
  }

  writers(): readonly LogWriter[] {
    return [this.writer];
  }
}

/**
 * Per-level transports with a fallback for unlisted levels
 *
 * @example
 * ```typescript
 * const writers = new LevelWriterFactory(stdout, new Map([
 *   [LOG_LEVEL_VALUES.error, stderr],
 *   [LOG_LEVEL_VALUES.fatal, stderr]
 * ]));
 * ```
 */
export class LevelWriterFactory implements WriterFactory {
  private readonly byLevel: ReadonlyMap<number, LogWriter>;

  constructor(
    private readonly fallback: LogWriter | undefined,
    byLevel: ReadonlyMap<number, LogWriter> = new Map()
  ) {
    this.byLevel = new Map(byLevel);
  }

  writerFor(level: number): LogWriter | undefined {
    return this.byLevel.get(level) ?? this.fallback;
  }

  writers(): readonly LogWriter[] {
    const all = new Set<LogWriter>(this.byLevel.values());
    if (this.fallback !== undefined) {
      all.add(this.fallback);
    }
    return [...all];
  }
}

/**
 * Base transport class with no-op flush and close
 */
export abstract class BaseTransport implements FlushableWriter, ClosableWriter {
  public readonly name: string;

  constructor(name: string) {
    this.name = name;
  }

  abstract write(chunk: Uint8Array): void | Promise<void>;

  /**
   * Flush any pending output (default: no-op)
   */
  flush(): void | Promise<void> {
    // Default implementation - no buffering
  }

  /**
   * Release resources (default: no-op)
   */
  close(): void | Promise<void> {
    // Default implementation - nothing to release
  }
}
