/**
 * emberlog - structured event logging for Node.js
 *
 * Typed key/value fields are rendered to newline-terminated text or JSON
 * records without reflection, into pooled buffers, optionally off the calling
 * stack through a bounded queue with an explicit overflow policy.
 *
 * ## Core Features
 *
 * - **Typed fields**: strings, 64-bit integers, floats, durations, timestamps,
 *   errors, byte blobs and arbitrary values, each with a defined rendering
 * - **Text and JSON**: `ts=... level=0 msg=ready port=8080` or
 *   `{"ts":"...","level":0,"msg":"ready","port":8080}`
 * - **Bound fields**: `logger.with(...)` renders attached fields once
 * - **Async delivery**: bounded queue with drop-newest, drop-oldest or block
 * - **Outcome hooks**: error handler, counters and a metrics observer
 *
 * ## Quick Start
 *
 * @example
 * ```typescript
 * import { createLogger, str, int, err, Duration, dur } from 'emberlog';
 *
 * const logger = createLogger({
 *   format: 'json',
 *   minLevel: 'debug',
 *   async: true,
 *   overflowPolicy: 'drop-oldest'
 * });
 *
 * const http = logger.with(str('svc', 'http'));
 * http.info('listening', int('port', 8080));
 * http.error('request failed', err('error', new Error('socket hang up')), dur('elapsed', Duration.ms(37)));
 *
 * await logger.close();
 * ```
 *
 * ## Subpath Exports
 *
 * @example
 * ```typescript
 * import { createLogger } from 'emberlog/logger';
 * import { StreamTransport, LevelWriterFactory } from 'emberlog/transports';
 * ```
 */

export * from './logger/index.js';
export * from './encoding/index.js';
export * from './delivery/index.js';
export * from './transports/index.js';
