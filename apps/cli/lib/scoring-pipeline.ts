/**
 * Scoring pipeline: every job without a match score gets one.
 *
 * Jobs move unscored -> scoring-in-flight -> scored | scoring-failed. A
 * failed job keeps no score and is picked up again by the next run. Up to
 * `concurrency` model calls run at once; writes to one job row are serialized.
 */

import {
  KeyedMutex,
  NotFoundError,
  ScoreParseError,
  errorMessage,
  isAbortError,
  isFatal,
  mapWithConcurrency,
  throwIfAborted,
} from '@jobscout/core';
import {
  analyzeJob,
  scoreJob,
  type AnalyzeJobOptions,
  type JobAnalysis,
  type JobScore,
  type ScorableJob,
  type ScoreJobOptions,
} from '@jobscout/agents';
import type { JobStore } from '@jobscout/db';
import type { Job, ScoringState } from '@jobscout/schemas';
import { agentLog } from './agent-logs';
import type { ProgressReporter } from './discovery-pipeline';

const AGENT = 'Scorer';

export type JobScorer = (job: Job, resume: string, options?: ScoreJobOptions) => Promise<JobScore>;

export interface ScoringDeps {
  store: JobStore;
  scorer?: JobScorer;
  reporter?: ProgressReporter;
  /** Shared with other writers of the same store so per-job writes never interleave. */
  writeLock?: KeyedMutex<number>;
}

export interface ScoringOptions {
  resume: string;
  concurrency?: number;
  signal?: AbortSignal;
  /** Scores at or above this are logged as high matches. */
  highMatchThreshold?: number;
}

export interface ScoringReport {
  total: number;
  scored: number;
  failed: number;
  /** Failures where the response carried no usable score. */
  parseFailures: number;
  highMatches: number;
  states: Record<number, ScoringState>;
}

export async function runScoring(deps: ScoringDeps, options: ScoringOptions): Promise<ScoringReport> {
  const { store, reporter } = deps;
  const scorer = deps.scorer ?? scoreJob;
  const writeLock = deps.writeLock ?? new KeyedMutex<number>();
  const { resume, signal } = options;
  const threshold = options.highMatchThreshold ?? 70;

  throwIfAborted(signal);
  const jobs = await store.listUnscored();
  const report: ScoringReport = {
    total: jobs.length,
    scored: 0,
    failed: 0,
    parseFailures: 0,
    highMatches: 0,
    states: Object.fromEntries(jobs.map((j) => [j.id, 'unscored' as const])),
  };
  let done = 0;

  agentLog(AGENT, `Scoring ${jobs.length} unscored jobs`);
  reporter?.reportProgress(0, jobs.length, null);

  const scoreOne = async (job: Job): Promise<void> => {
    throwIfAborted(signal);
    const label = `${job.title || '(untitled)'} at ${job.company || '(unknown)'}`;
    report.states[job.id] = 'scoring-in-flight';

    try {
      const result = await scorer(job, resume, { signal });
      throwIfAborted(signal);
      const updated = await writeLock.runExclusive(job.id, () =>
        store.updateScore(job.id, result.score, result.reasoning),
      );
      if (!updated) throw new Error(`Job ${job.id} no longer exists`);

      report.states[job.id] = 'scored';
      report.scored++;
      if (result.score >= threshold) {
        report.highMatches++;
        agentLog(AGENT, `HIGH MATCH: ${result.score}/100`, { level: 'success', detail: label });
      } else {
        agentLog(AGENT, `Score: ${result.score}/100`, { detail: label });
      }
    } catch (err) {
      if (isAbortError(err)) {
        report.states[job.id] = 'unscored';
        throw err;
      }
      if (isFatal(err)) throw err;
      report.states[job.id] = 'scoring-failed';
      report.failed++;
      if (err instanceof ScoreParseError) report.parseFailures++;
      agentLog(AGENT, 'Error scoring job', { level: 'error', detail: `${label}: ${errorMessage(err)}` });
    } finally {
      reporter?.reportProgress(++done, jobs.length, label);
    }
  };

  await mapWithConcurrency(jobs, options.concurrency ?? 1, scoreOne);

  agentLog(AGENT, `Scoring complete: ${report.scored} scored, ${report.failed} failed`, {
    level: 'success',
  });
  return report;
}

export function summarizeScoring(report: ScoringReport): string {
  return `${report.scored}/${report.total} scored, ${report.failed} failed, ${report.highMatches} high matches`;
}

export type JobAnalyzer = (job: ScorableJob, resume: string, options?: AnalyzeJobOptions) => Promise<JobAnalysis>;

/**
 * Deep analysis of one job. The score and reasoning are persisted like a
 * normal scoring run; gaps and cover letter points go back to the caller.
 */
export async function runAnalysis(
  deps: { store: JobStore; analyzer?: JobAnalyzer; writeLock?: KeyedMutex<number> },
  jobId: number,
  options: { resume: string; signal?: AbortSignal },
): Promise<{ job: Job; analysis: JobAnalysis }> {
  const analyzer = deps.analyzer ?? analyzeJob;
  const writeLock = deps.writeLock ?? new KeyedMutex<number>();
  const job = await deps.store.getById(jobId);
  if (!job) throw new NotFoundError(`Job ${jobId} not found`);

  agentLog(AGENT, 'Analyzing job', { detail: `${job.title} at ${job.company}` });
  const analysis = await analyzer(job, options.resume, { signal: options.signal });
  await writeLock.runExclusive(job.id, () =>
    deps.store.updateScore(job.id, analysis.score, analysis.reasoning),
  );
  return {
    job: { ...job, matchScore: analysis.score, matchReasoning: analysis.reasoning },
    analysis,
  };
}
