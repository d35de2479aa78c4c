export * from './byte-buffer.js';
export * from './buffer-pool.js';
export * from './escape.js';
export * from './primitives.js';
export * from './render-options.js';
export * from './renderer.js';
export { renderJSON, appendJSONField, JSON_PLACEHOLDER } from './json-renderer.js';
export { renderText, appendTextField, TEXT_NULL, TEXT_PLACEHOLDER } from './text-renderer.js';
export * from './bound-prefix.js';
