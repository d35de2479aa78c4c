/**
 * Growable byte buffer used by the renderers.
 *
 * Strings are UTF-8 encoded directly into the backing array; lone surrogates
 * become U+FFFD. Growth doubles the capacity, with the requested increment as
 * a floor.
 */

const REPLACEMENT_CHARACTER = 0xfffd;
const decoder = new TextDecoder();

export class ByteBuffer {
  private bytes: Uint8Array;
  private used = 0;

  constructor(capacity: number) {
    this.bytes = new Uint8Array(Math.max(0, capacity));
  }

  get length(): number {
    return this.used;
  }

  get capacity(): number {
    return this.bytes.length;
  }

  /** Drops the contents, keeping the backing array */
  reset(): void {
    this.used = 0;
  }

  /** Replaces the backing array when it is smaller than `capacity` */
  ensureCapacity(capacity: number): void {
    if (this.bytes.length < capacity) {
      this.bytes = new Uint8Array(capacity);
      this.used = 0;
    }
  }

  /** Makes room for `n` more bytes */
  grow(n: number): void {
    const need = this.used + n;
    if (need <= this.bytes.length) {
      return;
    }
    const next = new Uint8Array(Math.max(this.bytes.length * 2, need));
    next.set(this.bytes.subarray(0, this.used));
    this.bytes = next;
  }

  writeByte(c: number): void {
    if (this.used === this.bytes.length) {
      this.grow(1);
    }
    this.bytes[this.used++] = c;
  }

  writeBytes(data: Uint8Array): void {
    this.grow(data.length);
    this.bytes.set(data, this.used);
    this.used += data.length;
  }

  /** Writes a string known to contain only ASCII characters */
  writeAscii(s: string): void {
    this.grow(s.length);
    for (let i = 0; i < s.length; i++) {
      this.bytes[this.used++] = s.charCodeAt(i);
    }
  }

  /** Writes a string as UTF-8 */
  writeString(s: string): void {
    this.grow(s.length);
    for (let i = 0; i < s.length; i++) {
      const c = s.charCodeAt(i);
      if (c < 0x80) {
        this.writeByte(c);
        continue;
      }
      if (c >= 0xd800 && c <= 0xdbff) {
        const next = i + 1 < s.length ? s.charCodeAt(i + 1) : 0;
        if (next >= 0xdc00 && next <= 0xdfff) {
          this.writeCodePoint(0x10000 + ((c - 0xd800) << 10) + (next - 0xdc00));
          i++;
          continue;
        }
        this.writeCodePoint(REPLACEMENT_CHARACTER);
        continue;
      }
      if (c >= 0xdc00 && c <= 0xdfff) {
        this.writeCodePoint(REPLACEMENT_CHARACTER);
        continue;
      }
      this.writeCodePoint(c);
    }
  }

  /** Writes one Unicode scalar value as UTF-8 */
  writeCodePoint(cp: number): void {
    if (cp < 0x80) {
      this.writeByte(cp);
    } else if (cp < 0x800) {
      this.grow(2);
      this.bytes[this.used++] = 0xc0 | (cp >> 6);
      this.bytes[this.used++] = 0x80 | (cp & 0x3f);
    } else if (cp < 0x10000) {
      this.grow(3);
      this.bytes[this.used++] = 0xe0 | (cp >> 12);
      this.bytes[this.used++] = 0x80 | ((cp >> 6) & 0x3f);
      this.bytes[this.used++] = 0x80 | (cp & 0x3f);
    } else {
      this.grow(4);
      this.bytes[this.used++] = 0xf0 | (cp >> 18);
      this.bytes[this.used++] = 0x80 | ((cp >> 12) & 0x3f);
      this.bytes[this.used++] = 0x80 | ((cp >> 6) & 0x3f);
      this.bytes[this.used++] = 0x80 | (cp & 0x3f);
    }
  }

  /**
   * View of the written bytes. The view aliases the backing array and is only
   * valid until the buffer is written to again or released.
   */
  view(): Uint8Array {
    return this.bytes.subarray(0, this.used);
  }

  /** Independent copy of the written bytes */
  copy(): Uint8Array {
    return this.bytes.slice(0, this.used);
  }

  toString(): string {
    return decoder.decode(this.view());
  }
}
