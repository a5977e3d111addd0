/**
 * Match prompt: resume text plus the job's descriptive fields, asking for a
 * labelled SCORE / REASONING / KEY_MATCHES / KEY_GAPS answer.
 */

import { createPromptTemplate, executeTemplate } from '@jobscout/llm';
import type { Job } from '@jobscout/schemas';

export const MAX_PROMPT_DESCRIPTION_CHARS = 4000;

export type ScorableJob = Pick<Job, 'title' | 'company' | 'location' | 'description'>;

const MATCH_TEMPLATE = createPromptTemplate(
  `Analyze how well this job posting matches the candidate's resume.

CANDIDATE RESUME:
{resume}

JOB POSTING:
Company: {company}
Title: {title}
Location: {location}

Description:
{description}

Evaluate the match on these criteria:
1. Skills alignment (technical skills, tools, frameworks)
2. Experience level match (years of experience, seniority)
3. Industry/domain fit
4. Certifications/clearances match
5. Location compatibility

Provide your response in this exact format:
SCORE: [number 0-100]
REASONING: [2-3 sentences explaining the match, highlighting key alignments and gaps]
KEY_MATCHES: [comma-separated list of matching qualifications]
KEY_GAPS: [comma-separated list of missing requirements, or "None" if none]`,
  { system: 'You are a job matching expert. Be precise and consistent with your scoring.' },
);

export function buildMatchPrompt(
  resume: string,
  job: ScorableJob,
): { prompt: string; system?: string } {
  return executeTemplate(MATCH_TEMPLATE, {
    resume: resume.trim(),
    company: job.company || 'Unknown',
    title: job.title || 'Unknown',
    location: job.location || 'Not specified',
    description: job.description.slice(0, MAX_PROMPT_DESCRIPTION_CHARS) || 'No description available.',
  });
}
