/**
 * LLM Scorer Agent - match score for one job against the resume via Ollama
 *
 * Responsibilities:
 * - Build the match prompt
 * - Call the scoring model
 * - Parse the score and reasoning (ScoreParseError when no score)
 *
 * LLM Usage: Heavy (one call per job)
 */

import { complete } from '@jobscout/llm';
import { buildMatchPrompt, type ScorableJob } from './match-prompt.js';
import { parseScoreResponse } from './score-parser.js';

export interface ScoreJobOptions {
  signal?: AbortSignal;
  /** Overrides the configured scoring model. */
  model?: string;
  timeoutMs?: number;
}

export interface JobScore {
  score: number;
  reasoning: string;
  rawResponse: string;
}

export async function scoreJob(
  job: ScorableJob,
  resume: string,
  options: ScoreJobOptions = {},
): Promise<JobScore> {
  const { prompt, system } = buildMatchPrompt(resume, job);
  const response = await complete(prompt, 'SCORING', {
    system,
    signal: options.signal,
    ...(options.model ? { model: options.model } : {}),
    ...(options.timeoutMs ? { timeout: options.timeoutMs } : {}),
  });
  const parsed = parseScoreResponse(response);
  return { ...parsed, rawResponse: response };
}
