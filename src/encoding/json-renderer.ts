/**
 * JSON record renderer.
 *
 * Produces one object per record followed by a newline:
 *
 * ```
 * {"ts":<value>,"level":<int>,"msg":<value>[,"key":<value>]*}\n
 * ```
 *
 * Fields are encoded by switching on their kind; opaque values are matched
 * against the known primitive shapes before `JSON.stringify` is tried, and
 * anything that cannot be encoded becomes `null`.
 */

import { Duration } from '../fields/duration.js';
import { RawJSON, type Field } from '../fields/field.js';
import { levelName } from '../fields/level.js';
import type { Timestamp } from '../fields/timestamp.js';
import type { ByteBuffer } from './byte-buffer.js';
import { appendJSONString, appendJSONText } from './escape.js';
import {
  appendBase64,
  appendBool,
  appendDuration,
  appendInt64,
  appendJSONFloat,
  appendTimestamp,
  appendUint64
} from './primitives.js';
import type { RenderOptions } from './render-options.js';

/** Placeholder for values with no JSON encoding */
export const JSON_PLACEHOLDER = 'null';

/**
 * Renders one complete, newline-terminated JSON record into `buf`
 */
export function renderJSON(
  buf: ByteBuffer,
  level: number,
  message: string,
  timestamp: Timestamp,
  boundPrefix: Uint8Array | undefined,
  fields: readonly Field[],
  options: RenderOptions
): void {
  buf.writeAscii('{"ts":');
  appendTimestamp(buf, timestamp, options.timeEncoding, true);

  buf.writeAscii(',"level":');
  if (options.levelEncoding === 'name') {
    appendJSONString(buf, levelName(level));
  } else {
    buf.writeAscii(String(level));
  }

  buf.writeAscii(',"msg":');
  appendJSONString(buf, message);

  if (boundPrefix !== undefined && boundPrefix.length > 0) {
    buf.writeBytes(boundPrefix);
  }
  for (let i = 0; i < fields.length; i++) {
    appendJSONField(buf, fields[i], options);
  }

  buf.writeAscii('}\n');
}

/**
 * Appends `,"key":value` for one field
 */
export function appendJSONField(buf: ByteBuffer, field: Field, options: RenderOptions): void {
  buf.writeByte(0x2c);
  appendJSONString(buf, field.key);
  buf.writeByte(0x3a);

  switch (field.kind) {
    case 'string':
      appendJSONString(buf, field.value);
      return;
    case 'int64':
      appendInt64(buf, field.value, true);
      return;
    case 'uint64':
      appendUint64(buf, field.value, true);
      return;
    case 'float64':
      appendJSONFloat(buf, field.value);
      return;
    case 'bool':
      appendBool(buf, field.value);
      return;
    case 'duration':
      appendDuration(buf, field.value, options.durationEncoding, true);
      return;
    case 'time':
      appendTimestamp(buf, field.value, options.timeEncoding, true);
      return;
    case 'error':
      if (field.value === null || field.value === undefined) {
        buf.writeAscii(JSON_PLACEHOLDER);
      } else {
        appendJSONString(buf, errorMessage(field.value));
      }
      return;
    case 'bytes':
      appendBase64(buf, field.value);
      return;
    case 'any':
      appendJSONAny(buf, field.value, options);
      return;
    default:
      buf.writeAscii(JSON_PLACEHOLDER);
  }
}

function appendJSONAny(buf: ByteBuffer, value: unknown, options: RenderOptions): void {
  if (value === null || value === undefined) {
    buf.writeAscii(JSON_PLACEHOLDER);
    return;
  }
  switch (typeof value) {
    case 'string':
      appendJSONString(buf, value);
      return;
    case 'boolean':
      appendBool(buf, value);
      return;
    case 'number':
      if (Number.isInteger(value)) {
        appendInt64(buf, value, true);
      } else {
        appendJSONFloat(buf, value);
      }
      return;
    case 'bigint':
      buf.writeAscii(value.toString());
      return;
    case 'function':
    case 'symbol':
      buf.writeAscii(JSON_PLACEHOLDER);
      return;
  }

  if (value instanceof RawJSON) {
    if (value.isEmpty) {
      buf.writeAscii('""');
    } else if (typeof value.json === 'string') {
      buf.writeString(value.json);
    } else {
      buf.writeBytes(value.json);
    }
    return;
  }
  if (value instanceof Uint8Array) {
    appendBase64(buf, value);
    return;
  }
  if (value instanceof Date) {
    appendTimestamp(buf, value, options.timeEncoding, true);
    return;
  }
  if (value instanceof Duration) {
    appendDuration(buf, value.nanoseconds, options.durationEncoding, true);
    return;
  }
  if (value instanceof Error) {
    appendJSONString(buf, errorMessage(value));
    return;
  }

  const json = stringifyOrUndefined(value);
  if (json === undefined) {
    buf.writeAscii(JSON_PLACEHOLDER);
  } else {
    appendJSONText(buf, json);
  }
}

/**
 * `JSON.stringify` that reports unencodable values (cycles, nested bigints,
 * throwing `toJSON`) as `undefined`
 */
export function stringifyOrUndefined(value: unknown): string | undefined {
  try {
    return JSON.stringify(value);
  } catch {
    return undefined;
  }
}

export function errorMessage(error: Error): string {
  return typeof error.message === 'string' ? error.message : String(error);
}
