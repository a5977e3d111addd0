export * from './posted-date.js';
export * from './location-filter.js';
export * from './canonicalizer-agent.js';
export * from './deduplicator-agent.js';
