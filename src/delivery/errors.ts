/**
 * Errors reported to the engine's error handler. None of them is ever thrown
 * out of `log()`.
 */

import type { OverflowPolicy } from './types.js';

export type DeliveryErrorCode = 'QUEUE_FULL' | 'WRITE_FAILED' | 'RENDER_FAILED';

export class DeliveryError extends Error {
  override readonly name: string = 'DeliveryError';

  constructor(
    readonly code: DeliveryErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** The asynchronous queue was full and a record was discarded */
export class QueueFullError extends DeliveryError {
  override readonly name = 'QueueFullError' as const;

  constructor(readonly policy: OverflowPolicy) {
    super('QUEUE_FULL', `async queue full, dropping log entry (policy: ${policy})`);
  }
}

/** The transport rejected a write; the record is lost */
export class WriteError extends DeliveryError {
  override readonly name = 'WriteError' as const;

  constructor(readonly writerName: string, cause: unknown) {
    super('WRITE_FAILED', `write to transport "${writerName}" failed: ${describe(cause)}`, { cause });
  }
}

/** Encoding a record faulted; the record is lost */
export class RenderError extends DeliveryError {
  override readonly name = 'RenderError' as const;

  constructor(cause: unknown) {
    super('RENDER_FAILED', `fault during log formatting: ${describe(cause)}`, { cause });
  }
}

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
