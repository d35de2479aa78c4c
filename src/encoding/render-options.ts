/**
 * Output format and encoding choices shared by the renderers
 */

import type { Timestamp } from '../fields/timestamp.js';

export type OutputFormat = 'text' | 'json';

/** Encoding of the record timestamp and of `time` fields */
export type TimeEncoding = 'rfc3339nano' | 'unix-millis' | 'unix-nanos';

/** Encoding of `duration` fields */
export type DurationEncoding = 'string' | 'millis' | 'nanos';

/** Encoding of the record level */
export type LevelEncoding = 'numeric' | 'name';

/**
 * Custom layout for the text record timestamp. Called only for valid
 * timestamps; the result is quoted when it contains a space.
 */
export type TimeFormatter = (timestamp: Timestamp) => string;

export interface RenderOptions {
  readonly timeEncoding: TimeEncoding;
  readonly durationEncoding: DurationEncoding;
  readonly levelEncoding: LevelEncoding;
  /** Text format only; replaces `timeEncoding` for the record timestamp */
  readonly timeFormat?: TimeFormatter;
}

export const DEFAULT_RENDER_OPTIONS: RenderOptions = Object.freeze({
  timeEncoding: 'rfc3339nano',
  durationEncoding: 'string',
  levelEncoding: 'numeric'
});

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'json'];
export const TIME_ENCODINGS: readonly TimeEncoding[] = ['rfc3339nano', 'unix-millis', 'unix-nanos'];
export const DURATION_ENCODINGS: readonly DurationEncoding[] = ['string', 'millis', 'nanos'];
export const LEVEL_ENCODINGS: readonly LevelEncoding[] = ['numeric', 'name'];
