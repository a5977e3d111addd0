export * from './types.js';
export * from './html-text.js';
export * from './link-filter-agent.js';
export * from './result-parser.js';
export * from './search-executor.js';
export * from './job-detail-extractor-agent.js';
