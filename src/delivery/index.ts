/**
 * Delivery engine for emberlog
 *
 * - DeliveryEngine: level filter, bounded queue, overflow policy, write lock
 * - DeliveryStats and MetricsObserver: outcome counters and hooks
 * - DeliveryError and subclasses: what the error handler receives
 */

export { DeliveryEngine, createDeliveryEngine, type LogResult } from './delivery-engine.js';
export * from './types.js';
export * from './errors.js';
export * from './stats.js';
export * from './metrics.js';
export * from './engine-options.js';
export { BoundedQueue } from './bounded-queue.js';
export { AsyncWorker } from './async-worker.js';
export { WriteLock, type WriteOutcome, type WriteSettled, type WriteTask } from './write-lock.js';
export { FieldListPool, MAX_POOLED_FIELD_LIST_LENGTH, MAX_POOLED_FIELD_LISTS } from './field-list-pool.js';
