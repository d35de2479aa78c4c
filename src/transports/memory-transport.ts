/**
 * In-memory transport that keeps every record it receives.
 *
 * Useful for tests and for capturing output before a real destination is
 * ready. Records are decoded into strings on arrival, so the pooled buffer is
 * never retained.
 */

import { BaseTransport } from './transport-interface.js';

const decoder = new TextDecoder();

export class MemoryTransport extends BaseTransport {
  private readonly records: string[] = [];
  private bytes = 0;

  constructor(name: string = 'memory') {
    super(name);
  }

  write(chunk: Uint8Array): void {
    this.records.push(decoder.decode(chunk));
    this.bytes += chunk.length;
  }

  /** Every record in write order, newline included */
  get lines(): readonly string[] {
    return this.records;
  }

  /** Everything written, concatenated */
  get output(): string {
    return this.records.join('');
  }

  get bytesWritten(): number {
    return this.bytes;
  }

  clear(): void {
    this.records.length = 0;
    this.bytes = 0;
  }
}
