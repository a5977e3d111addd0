export * from './job-analysis-agent.js';
