/**
 * Freelist of field arrays used for the copy a request takes when it crosses
 * into the background worker.
 */

import type { Field } from '../fields/field.js';

/** Arrays longer than this are dropped instead of pooled */
export const MAX_POOLED_FIELD_LIST_LENGTH = 1024;
export const MAX_POOLED_FIELD_LISTS = 256;

export class FieldListPool {
  private readonly free: Field[][] = [];

  constructor(private readonly maxPooled: number = MAX_POOLED_FIELD_LISTS) {}

  get size(): number {
    return this.free.length;
  }

  /** Shallow copy of `fields` into a pooled array */
  copy(fields: readonly Field[]): Field[] {
    const list = this.free.pop() ?? [];
    for (const field of fields) {
      list.push(field);
    }
    return list;
  }

  release(list: Field[]): boolean {
    if (list.length > MAX_POOLED_FIELD_LIST_LENGTH || this.free.length >= this.maxPooled) {
      return false;
    }
    list.length = 0;
    this.free.push(list);
    return true;
  }
}
