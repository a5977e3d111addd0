/**
 * Job Analysis Agent - deeper, on-demand look at one job
 *
 * Responsibilities:
 * - Match score and reasoning (same scale as the batch scorer)
 * - Resume gaps against the job's requirements
 * - Talking points for a cover letter
 *
 * LLM Usage: Heavy (one JSON-mode call). When the model ignores the JSON
 * format, the score is recovered from the text and the lists stay empty.
 */

import { z } from 'zod';
import { complete, createPromptTemplate, defaultFixers, executeTemplate, parseWithRetry } from '@jobscout/llm';
import type { ScorableJob } from '../rank/match-prompt.js';
import { parseScoreResponse } from '../rank/score-parser.js';

export const MAX_ANALYSIS_DESCRIPTION_CHARS = 3000;

export interface JobAnalysis {
  score: number;
  reasoning: string;
  gaps: string[];
  coverLetterPoints: string[];
}

export interface AnalyzeJobOptions {
  signal?: AbortSignal;
  model?: string;
  timeoutMs?: number;
}

const stringList = z
  .union([z.array(z.string()), z.string()])
  .transform((v) => (Array.isArray(v) ? v : v.split(/\n|;/)))
  .transform((items) => items.map((s) => s.replace(/^\s*(?:[-*•]|\d+[.)])\s*/, '').trim()).filter(Boolean))
  .default([]);

const analysisResponseSchema = z.object({
  score: z.coerce.number(),
  reasoning: z.string().default(''),
  gaps: stringList,
  coverLetterPoints: stringList,
});

const ANALYSIS_TEMPLATE = createPromptTemplate(
  `Analyze this job posting against the candidate's resume.

RESUME:
{resume}

JOB POSTING:
Company: {company}
Title: {title}
Location: {location}
Description:
{description}

Return a JSON object with these fields:
- score: overall match 0-100 (integer)
- reasoning: 2-3 sentences on the overall fit
- gaps: array of requirements the resume does not clearly meet, each with how the candidate could address or reframe it; note whether it is a dealbreaker or minor
- coverLetterPoints: array of 3-5 points to emphasize in a cover letter, each connecting a specific requirement to a specific accomplishment from the resume

Be constructive and specific.`,
  { system: 'You are a career coach and job matching expert. Respond with JSON only.' },
);

export async function analyzeJob(
  job: ScorableJob,
  resume: string,
  options: AnalyzeJobOptions = {},
): Promise<JobAnalysis> {
  const { prompt, system } = executeTemplate(ANALYSIS_TEMPLATE, {
    resume: resume.trim(),
    company: job.company || 'Unknown',
    title: job.title || 'Unknown',
    location: job.location || 'Not specified',
    description:
      job.description.slice(0, MAX_ANALYSIS_DESCRIPTION_CHARS) || 'No description available.',
  });

  const response = await complete(prompt, 'ANALYSIS', {
    system,
    format: 'json',
    signal: options.signal,
    ...(options.model ? { model: options.model } : {}),
    ...(options.timeoutMs ? { timeout: options.timeoutMs } : {}),
  });

  const parsed = parseWithRetry(response, analysisResponseSchema, defaultFixers);
  if (parsed.success && Number.isFinite(parsed.data.score)) {
    const { score, reasoning, gaps, coverLetterPoints } = parsed.data;
    return {
      score: Math.round(Math.min(100, Math.max(0, score))),
      reasoning: reasoning.trim() || response.trim(),
      gaps,
      coverLetterPoints,
    };
  }

  const fallback = parseScoreResponse(response);
  return { ...fallback, gaps: [], coverLetterPoints: [] };
}
