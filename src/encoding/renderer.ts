/**
 * Renderer strategy selected once per engine from the output format
 */

import type { Field } from '../fields/field.js';
import type { Timestamp } from '../fields/timestamp.js';
import type { ByteBuffer } from './byte-buffer.js';
import { appendJSONField, renderJSON } from './json-renderer.js';
import type { OutputFormat, RenderOptions } from './render-options.js';
import { appendTextField, renderText } from './text-renderer.js';

export interface Renderer {
  readonly format: OutputFormat;

  /** Writes one complete, newline-terminated record */
  render(
    buf: ByteBuffer,
    level: number,
    message: string,
    timestamp: Timestamp,
    boundPrefix: Uint8Array | undefined,
    fields: readonly Field[],
    options: RenderOptions
  ): void;

  /** Writes one field including its leading separator */
  appendField(buf: ByteBuffer, field: Field, options: RenderOptions): void;
}

export const jsonRenderer: Renderer = Object.freeze({
  format: 'json',
  render: renderJSON,
  appendField: appendJSONField
});

export const textRenderer: Renderer = Object.freeze({
  format: 'text',
  render: renderText,
  appendField: appendTextField
});

export function rendererFor(format: OutputFormat): Renderer {
  return format === 'json' ? jsonRenderer : textRenderer;
}
