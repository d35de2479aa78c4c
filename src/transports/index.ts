/**
 * Transports for emberlog
 *
 * - StreamTransport: any Node.js `Writable` (stdout, files, sockets)
 * - MemoryTransport: keeps records in memory
 * - SingleWriterFactory / LevelWriterFactory: route records by level
 *
 * @example
 * ```typescript
 * import { LevelWriterFactory, createStdoutTransport, createStderrTransport } from 'emberlog/transports';
 * import { LOG_LEVEL_VALUES } from 'emberlog';
 *
 * const writers = new LevelWriterFactory(createStdoutTransport(), new Map([
 *   [LOG_LEVEL_VALUES.error, createStderrTransport()]
 * ]));
 * ```
 */

export * from './transport-interface.js';
export * from './stream-transport.js';
export * from './memory-transport.js';

/** Current version of the transports module */
export const TRANSPORTS_VERSION = '0.1.0';
