/**
 * Bound-prefix cache.
 *
 * Fields bound to a logging context are rendered once per output format when
 * the context is created, and the resulting bytes are spliced verbatim into
 * every record emitted through it. Binding re-renders the whole bound list,
 * so `bind(bind(ctx, a), b)` and `bind(ctx, [...a, ...b])` yield identical
 * bytes. Key collisions are not deduplicated: the later field appears later.
 *
 * @example
 * ```typescript
 * const root = BoundFields.EMPTY;
 * const svc = root.bind([str('svc', 'api')], DEFAULT_RENDER_OPTIONS);
 * svc.prefix('text'); // bytes of " svc=api"
 * svc.prefix('json'); // bytes of ',"svc":"api"'
 * ```
 */

import type { Field } from '../fields/field.js';
import { BufferPool, sharedBufferPool } from './buffer-pool.js';
import type { OutputFormat, RenderOptions } from './render-options.js';
import { rendererFor } from './renderer.js';

const EMPTY_BYTES = new Uint8Array(0);

export interface BindResult {
  readonly fields: readonly Field[];
  readonly prefixes: Readonly<Record<OutputFormat, Uint8Array>>;
}

export class BoundFields {
  static readonly EMPTY = new BoundFields(Object.freeze([]), { text: EMPTY_BYTES, json: EMPTY_BYTES });

  private constructor(
    readonly fields: readonly Field[],
    private readonly prefixes: Readonly<Record<OutputFormat, Uint8Array>>
  ) {}

  get size(): number {
    return this.fields.length;
  }

  /** Pre-encoded bytes of every bound field, in the given format */
  prefix(format: OutputFormat): Uint8Array {
    return this.prefixes[format];
  }

  /**
   * Appends `fields` after the inherited ones and renders the complete bound
   * list once for each output format
   */
  bind(fields: readonly Field[], options: RenderOptions, pool: BufferPool = sharedBufferPool): BoundFields {
    if (fields.length === 0) {
      return this;
    }
    const bound = bind(this.fields, fields, options, pool);
    return new BoundFields(bound.fields, bound.prefixes);
  }
}

/**
 * Renders `fields` as a standalone prefix fragment in one format
 */
export function encodePrefix(
  format: OutputFormat,
  fields: readonly Field[],
  options: RenderOptions,
  pool: BufferPool = sharedBufferPool
): Uint8Array {
  if (fields.length === 0) {
    return EMPTY_BYTES;
  }
  const renderer = rendererFor(format);
  const buf = pool.acquire();
  try {
    for (const field of fields) {
      renderer.appendField(buf, field, options);
    }
    return buf.copy();
  } finally {
    pool.release(buf);
  }
}

/**
 * Binds `newFields` to an existing bound list, returning the combined list and
 * its pre-encoded prefix for every output format
 */
export function bind(
  existing: readonly Field[],
  newFields: readonly Field[],
  options: RenderOptions,
  pool: BufferPool = sharedBufferPool
): BindResult {
  const fields = Object.freeze([...existing, ...newFields]);
  return {
    fields,
    prefixes: {
      text: encodePrefix('text', fields, options, pool),
      json: encodePrefix('json', fields, options, pool)
    }
  };
}
