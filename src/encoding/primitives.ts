/**
 * Number, time, duration and byte encoders shared by both renderers.
 */

import { formatDuration, Millisecond } from '../fields/duration.js';
import { epochMillis, epochNanos, formatRFC3339Nano, isValidTimestamp, type Timestamp } from '../fields/timestamp.js';
import type { ByteBuffer } from './byte-buffer.js';
import { appendJSONString } from './escape.js';
import type { DurationEncoding, TimeEncoding } from './render-options.js';

const BASE64 = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789+/';
const QUOTE = 0x22;

/** JSON rendering of a float: non-finite values have no JSON form */
export function appendJSONFloat(buf: ByteBuffer, f: number): void {
  if (!Number.isFinite(f)) {
    buf.writeAscii('null');
    return;
  }
  buf.writeAscii(String(f));
}

/** Text rendering of a float: `NaN`, `+Inf` and `-Inf` are spelled out */
export function appendTextFloat(buf: ByteBuffer, f: number): void {
  if (Number.isNaN(f)) {
    buf.writeAscii('NaN');
  } else if (f === Number.POSITIVE_INFINITY) {
    buf.writeAscii('+Inf');
  } else if (f === Number.NEGATIVE_INFINITY) {
    buf.writeAscii('-Inf');
  } else {
    buf.writeAscii(String(f));
  }
}

/**
 * Signed 64-bit integer. Bigints wrap to 64 bits and fractional numbers
 * truncate; a non-finite number falls back to the float encoder.
 */
export function appendInt64(buf: ByteBuffer, v: number | bigint, json: boolean): void {
  if (typeof v === 'bigint') {
    buf.writeAscii(BigInt.asIntN(64, v).toString());
    return;
  }
  if (!Number.isFinite(v)) {
    appendFloat(buf, v, json);
    return;
  }
  buf.writeAscii(String(Math.trunc(v)));
}

/** Unsigned 64-bit integer; negative inputs wrap like a two's complement cast */
export function appendUint64(buf: ByteBuffer, v: number | bigint, json: boolean): void {
  if (typeof v === 'bigint') {
    buf.writeAscii(BigInt.asUintN(64, v).toString());
    return;
  }
  if (!Number.isFinite(v)) {
    appendFloat(buf, v, json);
    return;
  }
  const n = Math.trunc(v);
  buf.writeAscii(n < 0 ? BigInt.asUintN(64, BigInt(n)).toString() : String(n));
}

function appendFloat(buf: ByteBuffer, f: number, json: boolean): void {
  if (json) {
    appendJSONFloat(buf, f);
  } else {
    appendTextFloat(buf, f);
  }
}

export function appendBool(buf: ByteBuffer, v: boolean): void {
  buf.writeAscii(v ? 'true' : 'false');
}

/**
 * Timestamp in the configured encoding. The RFC 3339 form is quoted in JSON
 * and bare in text; epoch numbers are never quoted. Invalid dates render `null`.
 */
export function appendTimestamp(buf: ByteBuffer, t: Timestamp, encoding: TimeEncoding, json: boolean): void {
  if (!isValidTimestamp(t)) {
    buf.writeAscii('null');
    return;
  }
  switch (encoding) {
    case 'unix-millis':
      buf.writeAscii(String(epochMillis(t)));
      return;
    case 'unix-nanos':
      buf.writeAscii(epochNanos(t).toString());
      return;
    default:
      if (json) {
        buf.writeByte(QUOTE);
        buf.writeAscii(formatRFC3339Nano(t));
        buf.writeByte(QUOTE);
      } else {
        buf.writeAscii(formatRFC3339Nano(t));
      }
  }
}

/**
 * Duration (nanoseconds) in the configured encoding. The human form is a JSON
 * string in JSON and bare in text.
 */
export function appendDuration(buf: ByteBuffer, nanoseconds: number, encoding: DurationEncoding, json: boolean): void {
  if (!Number.isFinite(nanoseconds)) {
    appendFloat(buf, nanoseconds, json);
    return;
  }
  switch (encoding) {
    case 'millis':
      buf.writeAscii(String(Math.trunc(nanoseconds / Millisecond)));
      return;
    case 'nanos':
      buf.writeAscii(String(Math.trunc(nanoseconds)));
      return;
    default:
      if (json) {
        appendJSONString(buf, formatDuration(nanoseconds));
      } else {
        buf.writeString(formatDuration(nanoseconds));
      }
  }
}

/**
 * Standard base64 (with padding) as a JSON string; `""` for an empty array
 */
export function appendBase64(buf: ByteBuffer, data: Uint8Array): void {
  buf.writeByte(QUOTE);
  buf.grow(Math.ceil(data.length / 3) * 4 + 1);
  let i = 0;
  for (; i + 2 < data.length; i += 3) {
    const n = (data[i] << 16) | (data[i + 1] << 8) | data[i + 2];
    buf.writeByte(BASE64.charCodeAt((n >> 18) & 0x3f));
    buf.writeByte(BASE64.charCodeAt((n >> 12) & 0x3f));
    buf.writeByte(BASE64.charCodeAt((n >> 6) & 0x3f));
    buf.writeByte(BASE64.charCodeAt(n & 0x3f));
  }
  const rest = data.length - i;
  if (rest === 1) {
    const n = data[i] << 16;
    buf.writeByte(BASE64.charCodeAt((n >> 18) & 0x3f));
    buf.writeByte(BASE64.charCodeAt((n >> 12) & 0x3f));
    buf.writeAscii('==');
  } else if (rest === 2) {
    const n = (data[i] << 16) | (data[i + 1] << 8);
    buf.writeByte(BASE64.charCodeAt((n >> 18) & 0x3f));
    buf.writeByte(BASE64.charCodeAt((n >> 12) & 0x3f));
    buf.writeByte(BASE64.charCodeAt((n >> 6) & 0x3f));
    buf.writeByte(0x3d);
  }
  buf.writeByte(QUOTE);
}
