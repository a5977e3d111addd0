export * from './types.js';
export * from './query-builder.js';
