import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { complete } from '@jobscout/llm';
import { NotFoundError, StoreError } from '@jobscout/core';
import type { JobAnalysis, JobScore } from '@jobscout/agents';
import { runAnalysis, runScoring, summarizeScoring, type JobScorer } from '@/lib/scoring-pipeline';
import type { ProgressReporter } from '@/lib/discovery-pipeline';
import { MemoryJobStore } from '../helpers/memory-job-store';

vi.mock('@jobscout/llm', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@jobscout/llm')>();
  return { ...actual, complete: vi.fn() };
});

const RESUME = 'Data engineer. Python, SQL, Airflow.';

let store: MemoryJobStore;

beforeEach(() => {
  store = new MemoryJobStore();
  vi.mocked(complete).mockReset();
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

function fixedScore(score: number): JobScorer {
  return async () => ({ score, reasoning: `Scored ${score}`, rawResponse: `SCORE: ${score}` });
}

describe('runScoring', () => {
  it('scores unscored jobs with the model and stores the result', async () => {
    const text = 'This candidate is a strong fit. Score: 87/100. Missing: Kubernetes experience.';
    vi.mocked(complete).mockResolvedValue(text);
    const target = store.seed({ url: 'https://example.com/jobs/1', title: 'Data Engineer', company: 'Acme' });
    store.seed({ url: 'https://example.com/jobs/2', matchScore: 50, matchReasoning: 'Older score' });

    const report = await runScoring({ store }, { resume: RESUME });

    expect(report).toEqual({
      total: 1,
      scored: 1,
      failed: 0,
      parseFailures: 0,
      highMatches: 1,
      states: { [target.id]: 'scored' },
    });
    expect(store.rows.get(target.id)).toMatchObject({ matchScore: 87, matchReasoning: text });
    expect(store.rows.get(2)).toMatchObject({ matchScore: 50, matchReasoning: 'Older score' });
    expect(vi.mocked(complete)).toHaveBeenCalledTimes(1);
    expect(summarizeScoring(report)).toBe('1/1 scored, 0 failed, 1 high matches');
  });

  it('leaves a job unscored when the response has no score, so the next run retries it', async () => {
    vi.mocked(complete).mockResolvedValueOnce('Great candidate overall.');
    const job = store.seed({ url: 'https://example.com/jobs/1', title: 'Data Engineer', company: 'Acme' });

    const first = await runScoring({ store }, { resume: RESUME });

    expect(first).toMatchObject({ scored: 0, failed: 1, parseFailures: 1, states: { [job.id]: 'scoring-failed' } });
    expect(store.rows.get(job.id)).toMatchObject({ matchScore: null, matchReasoning: null });
    expect((await store.listUnscored()).map((j) => j.id)).toEqual([job.id]);

    vi.mocked(complete).mockResolvedValueOnce('SCORE: 64\nREASONING: Partial fit.');
    const second = await runScoring({ store }, { resume: RESUME });

    expect(second).toMatchObject({ scored: 1, failed: 0, highMatches: 0 });
    expect(store.rows.get(job.id)).toMatchObject({ matchScore: 64, matchReasoning: 'Partial fit.' });
  });

  it('reports progress per job and keeps going after a failure', async () => {
    store.seed({ url: 'https://example.com/jobs/1', title: 'Data Engineer', company: 'Acme' });
    store.seed({ url: 'https://example.com/jobs/2', title: 'Analyst', company: '' });
    const scorer: JobScorer = async (job) => {
      if (job.title === 'Data Engineer') throw new Error('Ollama chat failed: 500 - internal error');
      return { score: 72, reasoning: 'Fine', rawResponse: 'SCORE: 72' };
    };
    const calls: Array<[number, number, string | null | undefined]> = [];
    const reporter: ProgressReporter = { reportProgress: (c, t, item) => calls.push([c, t, item]) };

    const report = await runScoring({ store, scorer, reporter }, { resume: RESUME });

    expect(report).toEqual({
      total: 2,
      scored: 1,
      failed: 1,
      parseFailures: 0,
      highMatches: 1,
      states: { 1: 'scoring-failed', 2: 'scored' },
    });
    expect(calls).toEqual([
      [0, 2, null],
      [1, 2, 'Data Engineer at Acme'],
      [2, 2, 'Analyst at (unknown)'],
    ]);
  });

  it('runs at most `concurrency` model calls at once', async () => {
    for (let i = 1; i <= 5; i++) store.seed({ url: `https://example.com/jobs/${i}` });
    let inFlight = 0;
    let peak = 0;
    const scorer: JobScorer = async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 5));
      inFlight--;
      return { score: 60, reasoning: 'ok', rawResponse: 'SCORE: 60' };
    };

    const report = await runScoring({ store, scorer }, { resume: RESUME, concurrency: 2 });

    expect(peak).toBe(2);
    expect(report).toMatchObject({ scored: 5, highMatches: 0 });
  });

  it('uses the configured high-match threshold', async () => {
    store.seed({ url: 'https://example.com/jobs/1' });
    const report = await runScoring(
      { store, scorer: fixedScore(60) },
      { resume: RESUME, highMatchThreshold: 60 },
    );
    expect(report.highMatches).toBe(1);
  });

  it('counts a job deleted mid-run as failed', async () => {
    store.seed({ url: 'https://example.com/jobs/1' });
    vi.spyOn(store, 'updateScore').mockResolvedValue(false);

    const report = await runScoring({ store, scorer: fixedScore(80) }, { resume: RESUME });

    expect(report).toMatchObject({ scored: 0, failed: 1, states: { 1: 'scoring-failed' } });
  });

  it('stops on a lost database connection', async () => {
    store.seed({ url: 'https://example.com/jobs/1' });
    vi.spyOn(store, 'updateScore').mockRejectedValue(new StoreError('Database connection failed', { connection: true }));

    await expect(runScoring({ store, scorer: fixedScore(80) }, { resume: RESUME })).rejects.toThrow(
      'Database connection failed',
    );
  });

  it('starts no further jobs after a lost connection and settles before rejecting', async () => {
    for (let i = 1; i <= 8; i++) store.seed({ url: `https://example.com/jobs/${i}` });
    const scored: number[] = [];
    const scorer: JobScorer = async (job) => {
      scored.push(job.id);
      if (job.id === 2) await new Promise((resolve) => setTimeout(resolve, 20));
      return { score: 60, reasoning: 'ok', rawResponse: 'SCORE: 60' };
    };
    const updateScore = store.updateScore.bind(store);
    vi.spyOn(store, 'updateScore').mockImplementation(async (id, score, reasoning) => {
      if (id === 1) throw new StoreError('Database connection failed', { connection: true });
      return updateScore(id, score, reasoning);
    });

    await expect(runScoring({ store, scorer }, { resume: RESUME, concurrency: 2 })).rejects.toThrow(
      'Database connection failed',
    );
    expect(scored).toEqual([1, 2]);
    expect(store.rows.get(2)?.matchScore).toBe(60);

    await new Promise((resolve) => setTimeout(resolve, 30));
    expect(scored).toEqual([1, 2]);
    expect([...store.rows.values()].filter((r) => r.matchScore !== null).map((r) => r.id)).toEqual([2]);
  });

  it('discards an in-flight result when cancelled', async () => {
    const job = store.seed({ url: 'https://example.com/jobs/1' });
    const controller = new AbortController();
    const scorer: JobScorer = async () => {
      controller.abort();
      return { score: 90, reasoning: 'late', rawResponse: 'SCORE: 90' };
    };

    await expect(
      runScoring({ store, scorer }, { resume: RESUME, signal: controller.signal }),
    ).rejects.toMatchObject({ name: 'AbortError' });
    expect(store.rows.get(job.id)?.matchScore).toBeNull();
  });

  it('does nothing when every job is scored', async () => {
    store.seed({ url: 'https://example.com/jobs/1', matchScore: 40 });
    const scorer = vi.fn<Parameters<JobScorer>, Promise<JobScore>>();

    const report = await runScoring({ store, scorer }, { resume: RESUME });

    expect(report).toEqual({ total: 0, scored: 0, failed: 0, parseFailures: 0, highMatches: 0, states: {} });
    expect(scorer).not.toHaveBeenCalled();
  });
});

describe('runAnalysis', () => {
  const analysis: JobAnalysis = {
    score: 71,
    reasoning: 'Good Python match.',
    gaps: ['Kubernetes: mention container work'],
    coverLetterPoints: ['Led a pipeline migration'],
  };

  it('stores the analysis score and returns the details', async () => {
    const job = store.seed({ url: 'https://example.com/jobs/1', title: 'Data Engineer', company: 'Acme', status: 'reviewed' });

    const result = await runAnalysis({ store, analyzer: async () => analysis }, job.id, { resume: RESUME });

    expect(result.analysis).toEqual(analysis);
    expect(result.job).toEqual({ ...job, matchScore: 71, matchReasoning: 'Good Python match.' });
    expect(store.rows.get(job.id)).toMatchObject({ matchScore: 71, matchReasoning: 'Good Python match.', status: 'reviewed' });
  });

  it('rejects an unknown job id', async () => {
    await expect(
      runAnalysis({ store, analyzer: async () => analysis }, 99, { resume: RESUME }),
    ).rejects.toThrow(new NotFoundError('Job 99 not found'));
  });
});
