/**
 * Text (logfmt-style) record renderer.
 *
 * ```
 * ts=<value> level=<int> msg=<value>[ key=value]*\n
 * ```
 *
 * Values are written raw unless they contain a control character, a space or
 * a double quote, in which case they are quoted and escaped like JSON strings.
 * Error values are always quoted. Keys are written as given. A `timeFormat`
 * option replaces the record timestamp's encoding with a custom layout.
 */

import { Duration } from '../fields/duration.js';
import { RawJSON, type Field } from '../fields/field.js';
import { levelName } from '../fields/level.js';
import { isValidTimestamp, type Timestamp } from '../fields/timestamp.js';
import type { ByteBuffer } from './byte-buffer.js';
import { appendJSONString, appendTextString } from './escape.js';
import { errorMessage, stringifyOrUndefined } from './json-renderer.js';
import {
  appendBool,
  appendDuration,
  appendInt64,
  appendTextFloat,
  appendTimestamp,
  appendUint64
} from './primitives.js';
import type { RenderOptions } from './render-options.js';

/** Written for nullish errors and values */
export const TEXT_NULL = 'null';
/** Written for opaque values that cannot be encoded */
export const TEXT_PLACEHOLDER = 'unknown';

const decoder = new TextDecoder();

/**
 * Renders one complete, newline-terminated text record into `buf`
 */
export function renderText(
  buf: ByteBuffer,
  level: number,
  message: string,
  timestamp: Timestamp,
  boundPrefix: Uint8Array | undefined,
  fields: readonly Field[],
  options: RenderOptions
): void {
  buf.writeAscii('ts=');
  if (options.timeFormat !== undefined && isValidTimestamp(timestamp)) {
    appendTextString(buf, options.timeFormat(timestamp));
  } else {
    appendTimestamp(buf, timestamp, options.timeEncoding, false);
  }

  buf.writeAscii(' level=');
  buf.writeAscii(options.levelEncoding === 'name' ? levelName(level) : String(level));

  buf.writeAscii(' msg=');
  appendTextString(buf, message);

  if (boundPrefix !== undefined && boundPrefix.length > 0) {
    buf.writeBytes(boundPrefix);
  }
  for (let i = 0; i < fields.length; i++) {
    appendTextField(buf, fields[i], options);
  }

  buf.writeByte(0x0a);
}

/**
 * Appends ` key=value` for one field
 */
export function appendTextField(buf: ByteBuffer, field: Field, options: RenderOptions): void {
  buf.writeByte(0x20);
  buf.writeString(field.key);
  buf.writeByte(0x3d);

  switch (field.kind) {
    case 'string':
      appendTextString(buf, field.value);
      return;
    case 'int64':
      appendInt64(buf, field.value, false);
      return;
    case 'uint64':
      appendUint64(buf, field.value, false);
      return;
    case 'float64':
      appendTextFloat(buf, field.value);
      return;
    case 'bool':
      appendBool(buf, field.value);
      return;
    case 'duration':
      appendDuration(buf, field.value, options.durationEncoding, false);
      return;
    case 'time':
      appendTimestamp(buf, field.value, options.timeEncoding, false);
      return;
    case 'error':
      if (field.value === null || field.value === undefined) {
        buf.writeAscii(TEXT_NULL);
      } else {
        appendJSONString(buf, errorMessage(field.value));
      }
      return;
    case 'bytes':
      appendByteLength(buf, field.value);
      return;
    case 'any':
      appendTextAny(buf, field.value, options);
      return;
    default:
      buf.writeAscii(TEXT_NULL);
  }
}

function appendByteLength(buf: ByteBuffer, data: Uint8Array): void {
  buf.writeAscii('len:');
  buf.writeAscii(String(data.length));
}

function appendTextAny(buf: ByteBuffer, value: unknown, options: RenderOptions): void {
  if (value === null || value === undefined) {
    buf.writeAscii(TEXT_NULL);
    return;
  }
  switch (typeof value) {
    case 'string':
      appendTextString(buf, value);
      return;
    case 'boolean':
      appendBool(buf, value);
      return;
    case 'number':
      if (Number.isInteger(value)) {
        appendInt64(buf, value, false);
      } else {
        appendTextFloat(buf, value);
      }
      return;
    case 'bigint':
      buf.writeAscii(value.toString());
      return;
    case 'function':
    case 'symbol':
      buf.writeAscii(TEXT_PLACEHOLDER);
      return;
  }

  if (value instanceof RawJSON) {
    appendTextString(buf, typeof value.json === 'string' ? value.json : decoder.decode(value.json));
    return;
  }
  if (value instanceof Uint8Array) {
    appendByteLength(buf, value);
    return;
  }
  if (value instanceof Date) {
    appendTimestamp(buf, value, options.timeEncoding, false);
    return;
  }
  if (value instanceof Duration) {
    appendDuration(buf, value.nanoseconds, options.durationEncoding, false);
    return;
  }
  if (value instanceof Error) {
    appendJSONString(buf, errorMessage(value));
    return;
  }

  const json = stringifyOrUndefined(value);
  if (json === undefined) {
    buf.writeAscii(TEXT_PLACEHOLDER);
  } else {
    appendTextString(buf, json);
  }
}
