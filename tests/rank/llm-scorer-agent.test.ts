import { describe, it, expect, vi, beforeEach } from 'vitest';
import { complete } from '@jobscout/llm';
import { ScoreParseError } from '@jobscout/core';
import { buildMatchPrompt, scoreJob, MAX_PROMPT_DESCRIPTION_CHARS } from '@jobscout/agents';

vi.mock('@jobscout/llm', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@jobscout/llm')>();
  return { ...actual, complete: vi.fn() };
});

const job = {
  title: 'Data Engineer',
  company: 'Acme',
  location: 'Remote - US',
  description: 'Build pipelines in Python.',
};

beforeEach(() => {
  vi.mocked(complete).mockReset();
});

describe('buildMatchPrompt', () => {
  it('includes the resume and job fields', () => {
    const { prompt, system } = buildMatchPrompt('  Resume text  ', job);
    expect(prompt).toContain('CANDIDATE RESUME:\nResume text\n');
    expect(prompt).toContain('Company: Acme\nTitle: Data Engineer\nLocation: Remote - US');
    expect(prompt).toContain('Description:\nBuild pipelines in Python.');
    expect(system).toBe('You are a job matching expert. Be precise and consistent with your scoring.');
  });

  it('fills placeholders for missing fields and truncates long descriptions', () => {
    const { prompt } = buildMatchPrompt('r', { title: '', company: '', location: '', description: '' });
    expect(prompt).toContain('Company: Unknown\nTitle: Unknown\nLocation: Not specified');
    expect(prompt).toContain('Description:\nNo description available.');

    const long = buildMatchPrompt('r', { ...job, description: 'x'.repeat(MAX_PROMPT_DESCRIPTION_CHARS + 50) });
    expect(long.prompt).toContain(`Description:\n${'x'.repeat(MAX_PROMPT_DESCRIPTION_CHARS)}\n`);
    expect(long.prompt).not.toContain('x'.repeat(MAX_PROMPT_DESCRIPTION_CHARS + 1));
  });
});

describe('scoreJob', () => {
  it('calls the scoring model and parses its answer', async () => {
    vi.mocked(complete).mockResolvedValue('SCORE: 88\nREASONING: Great fit.\nKEY_MATCHES: Python\nKEY_GAPS: None');

    const result = await scoreJob(job, 'Resume text');

    expect(result).toEqual({
      score: 88,
      reasoning: 'Great fit.\n\nKey matches: Python',
      rawResponse: 'SCORE: 88\nREASONING: Great fit.\nKEY_MATCHES: Python\nKEY_GAPS: None',
    });
    const [prompt, modelType, options] = vi.mocked(complete).mock.calls[0];
    expect(prompt).toBe(buildMatchPrompt('Resume text', job).prompt);
    expect(modelType).toBe('SCORING');
    expect(options).toMatchObject({ system: buildMatchPrompt('Resume text', job).system });
  });

  it('passes model and timeout overrides', async () => {
    vi.mocked(complete).mockResolvedValue('Score: 40');
    await scoreJob(job, 'r', { model: 'small-model', timeoutMs: 1000 });
    expect(vi.mocked(complete).mock.calls[0][2]).toMatchObject({ model: 'small-model', timeout: 1000 });
  });

  it('propagates ScoreParseError when the answer has no score', async () => {
    vi.mocked(complete).mockResolvedValue('I like this candidate.');
    await expect(scoreJob(job, 'r')).rejects.toBeInstanceOf(ScoreParseError);
  });
});
