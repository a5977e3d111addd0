export * from './match-prompt.js';
export * from './score-parser.js';
export * from './llm-scorer-agent.js';
