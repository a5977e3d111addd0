/**
 * @jobscout/agents - pipeline stages
 *
 * - planner/    : search queries from the search configuration
 * - browser/    : search execution, result parsing, link filtering, detail extraction
 * - normalize/  : posted dates, location filter, canonical fields, deduplication
 * - rank/       : match prompt, score parsing, LLM scoring
 * - match/      : on-demand deep analysis of one job
 */

export * from './planner/index.js';
export * from './browser/index.js';
export * from './normalize/index.js';
export * from './rank/index.js';
export * from './match/index.js';
