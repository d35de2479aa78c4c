export * from './field.js';
export * from './duration.js';
export * from './timestamp.js';
export * from './level.js';
