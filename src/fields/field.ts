/**
 * Typed key/value fields for structured log records.
 *
 * A field is a closed tagged union: `kind` selects the payload type and the
 * renderers switch on it, so no reflection is needed to encode the common
 * cases. Constructors are O(1) and reference their payload (strings, byte
 * arrays, errors) instead of copying it. There is no validation step; empty
 * keys and nullish errors or values are legal and render as documented
 * placeholders.
 *
 * @example
 * ```typescript
 * import { str, int64, dur, err, Duration } from 'emberlog';
 *
 * const fields = [
 *   str('route', '/users'),
 *   int64('status', 200),
 *   dur('elapsed', Duration.ms(12)),
 *   err('cause', null)
 * ];
 * ```
 */

import { Duration } from './duration.js';
import type { Timestamp } from './timestamp.js';

export type FieldKind =
  | 'string'
  | 'int64'
  | 'uint64'
  | 'float64'
  | 'bool'
  | 'duration'
  | 'time'
  | 'error'
  | 'bytes'
  | 'any';

interface FieldOf<K extends FieldKind, V> {
  readonly key: string;
  readonly kind: K;
  readonly value: V;
}

export type StringField = FieldOf<'string', string>;
export type Int64Field = FieldOf<'int64', number | bigint>;
export type Uint64Field = FieldOf<'uint64', number | bigint>;
export type Float64Field = FieldOf<'float64', number>;
export type BoolField = FieldOf<'bool', boolean>;
/** Payload is a nanosecond count */
export type DurationField = FieldOf<'duration', number>;
export type TimeField = FieldOf<'time', Timestamp>;
export type ErrorField = FieldOf<'error', Error | null | undefined>;
export type BytesField = FieldOf<'bytes', Uint8Array>;
export type AnyField = FieldOf<'any', unknown>;

/**
 * One typed key/value pair. Fields are values: once handed to the engine they
 * are never mutated.
 */
export type Field =
  | StringField
  | Int64Field
  | Uint64Field
  | Float64Field
  | BoolField
  | DurationField
  | TimeField
  | ErrorField
  | BytesField
  | AnyField;

/**
 * Pre-encoded JSON spliced verbatim into JSON output (no quoting, no escaping).
 * The content must already be valid JSON.
 */
export class RawJSON {
  constructor(readonly json: string | Uint8Array) {}

  get isEmpty(): boolean {
    return this.json.length === 0;
  }
}

export function str(key: string, value: string): StringField {
  return { key, kind: 'string', value };
}

export function int64(key: string, value: number | bigint): Int64Field {
  return { key, kind: 'int64', value };
}

/** Alias of {@link int64} for plain integers */
export const int = int64;

export function uint64(key: string, value: number | bigint): Uint64Field {
  return { key, kind: 'uint64', value };
}

export function float64(key: string, value: number): Float64Field {
  return { key, kind: 'float64', value };
}

export function bool(key: string, value: boolean): BoolField {
  return { key, kind: 'bool', value };
}

/** Duration field from a `Duration` or a raw nanosecond count */
export function dur(key: string, value: Duration | number): DurationField {
  return { key, kind: 'duration', value: value instanceof Duration ? value.nanoseconds : value };
}

export function time(key: string, value: Timestamp): TimeField {
  return { key, kind: 'time', value };
}

export function err(key: string, value: Error | null | undefined): ErrorField {
  return { key, kind: 'error', value };
}

export function bytes(key: string, value: Uint8Array): BytesField {
  return { key, kind: 'bytes', value };
}

export function any(key: string, value: unknown): AnyField {
  return { key, kind: 'any', value };
}
