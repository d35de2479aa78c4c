/**
 * String escaping for the JSON and text formats.
 */

import type { ByteBuffer } from './byte-buffer.js';

const HEX = '0123456789abcdef';
const QUOTE = 0x22;
const BACKSLASH = 0x5c;

/**
 * Writes `s` as a JSON string literal. Control characters, quote and
 * backslash are escaped, as are U+2028/U+2029; lone surrogates become
 * the escaped replacement character.
 */
export function appendJSONString(buf: ByteBuffer, s: string): void {
  buf.writeByte(QUOTE);
  appendJSONStringContent(buf, s);
  buf.writeByte(QUOTE);
}

export function appendJSONStringContent(buf: ByteBuffer, s: string): void {
  for (let i = 0; i < s.length; i++) {
    const c = s.charCodeAt(i);
    if (c < 0x80) {
      if (c >= 0x20 && c !== QUOTE && c !== BACKSLASH) {
        buf.writeByte(c);
        continue;
      }
      switch (c) {
        case QUOTE:
          buf.writeAscii('\\"');
          break;
        case BACKSLASH:
          buf.writeAscii('\\\\');
          break;
        case 0x0a:
          buf.writeAscii('\\n');
          break;
        case 0x0d:
          buf.writeAscii('\\r');
          break;
        case 0x09:
          buf.writeAscii('\\t');
          break;
        case 0x08:
          buf.writeAscii('\\b');
          break;
        case 0x0c:
          buf.writeAscii('\\f');
          break;
        default:
          buf.writeAscii('\\u00');
          buf.writeByte(HEX.charCodeAt(c >> 4));
          buf.writeByte(HEX.charCodeAt(c & 0xf));
      }
      continue;
    }
    if (c === 0x2028) {
      buf.writeAscii('\\u2028');
      continue;
    }
    if (c === 0x2029) {
      buf.writeAscii('\\u2029');
      continue;
    }
    if (c >= 0xd800 && c <= 0xdbff) {
      const next = i + 1 < s.length ? s.charCodeAt(i + 1) : 0;
      if (next >= 0xdc00 && next <= 0xdfff) {
        buf.writeCodePoint(0x10000 + ((c - 0xd800) << 10) + (next - 0xdc00));
        i++;
        continue;
      }
      buf.writeAscii('\\ufffd');
      continue;
    }
    if (c >= 0xdc00 && c <= 0xdfff) {
      buf.writeAscii('\\ufffd');
      continue;
    }
    buf.writeCodePoint(c);
  }
}

/**
 * Writes JSON text produced elsewhere (e.g. `JSON.stringify`), escaping the
 * raw U+2028/U+2029 characters it leaves inside string literals.
 */
export function appendJSONText(buf: ByteBuffer, json: string): void {
  let start = 0;
  for (let i = 0; i < json.length; i++) {
    const c = json.charCodeAt(i);
    if (c === 0x2028 || c === 0x2029) {
      buf.writeString(json.slice(start, i));
      buf.writeAscii(c === 0x2028 ? '\\u2028' : '\\u2029');
      start = i + 1;
    }
  }
  buf.writeString(start === 0 ? json : json.slice(start));
}

/**
 * True when a text value must be quoted: it contains a control character,
 * a space or a double quote.
 */
export function needsTextQuoting(s: string): boolean {
  for (let i = 0; i < s.length; i++) {
    const c = s.charCodeAt(i);
    if (c <= 0x1f || c === 0x20 || c === QUOTE) {
      return true;
    }
  }
  return false;
}

/**
 * Writes a text-format value: raw when unambiguous, otherwise quoted and
 * escaped exactly like a JSON string.
 */
export function appendTextString(buf: ByteBuffer, s: string): void {
  if (needsTextQuoting(s)) {
    appendJSONString(buf, s);
  } else {
    buf.writeString(s);
  }
}
