#!/usr/bin/env -S npx tsx
/**
 * jobscout - discover job postings and score them against a resume.
 *
 * Run: npm run jobscout -- <command> [options]
 */
import '../../scripts/load-env';

import { parseArgs } from 'node:util';
import {
  ConfigError,
  JobScoutError,
  NotFoundError,
  RateLimiter,
  StoreError,
  errorMessage,
  isAbortError,
} from '@jobscout/core';
import { SearchExecutor } from '@jobscout/agents';
import { DATABASE_ERROR_MESSAGE, closeDb, createPgJobStore, getDb, type JobStore } from '@jobscout/db';
import { jobFilterSchema, jobStatusEnum, type TaskKind } from '@jobscout/schemas';
import { agentLog, setLogLevel } from '@/lib/agent-logs';
import { loadAppConfig, loadSearchConfig, type AppConfig } from '@/lib/config';
import { runDiscovery, summarizeDiscovery } from '@/lib/discovery-pipeline';
import { formatJobDetail, formatJobLine, formatProgress, formatStats, formatTask } from '@/lib/format';
import { loadResume } from '@/lib/resume';
import { runAnalysis, runScoring, summarizeScoring } from '@/lib/scoring-pipeline';
import { createTaskHistoryRecorder, readTaskHistory } from '@/lib/task-history';
import { TaskRegistry, type TaskRunner } from '@/lib/task-registry';

const USAGE = `Usage: jobscout <command> [options]

Commands:
  discover [--start-at n]                 search for new postings and store them
  score [--resume path]                   score every job without a match score
  list [--status s] [--min-score n] [--company text] [--limit n]
  show <id>                               one job in full
  stats                                   totals, status counts, top companies
  analyze <id> [--resume path]            deep match analysis for one job
  status <id> <status> [--notes text]     set tracking status (${jobStatusEnum.options.join(', ')})
  notes <id> <text>                       replace the notes of a job
  tasks                                   recent discovery and scoring runs`;

function parseCliArgs(argv?: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      resume: { type: 'string' },
      status: { type: 'string' },
      'min-score': { type: 'string' },
      company: { type: 'string' },
      limit: { type: 'string' },
      notes: { type: 'string' },
      'start-at': { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  });
}

type CliArgs = ReturnType<typeof parseCliArgs>;

function parseJobId(raw: string | undefined): number {
  const id = Number(raw);
  if (!raw || !Number.isInteger(id) || id <= 0) {
    throw new ConfigError(`Expected a job id, got "${raw ?? ''}"`);
  }
  return id;
}

/** Runs a registered task, printing progress and cancelling on Ctrl-C. */
async function runTask<R>(
  config: AppConfig,
  kind: TaskKind,
  runner: TaskRunner<R>,
  summarize: (result: R) => string,
): Promise<R> {
  const registry = new TaskRegistry({ onChange: createTaskHistoryRecorder(config.tasksFile) });
  const task = registry.create(kind);
  let lastLine = '';
  const timer = setInterval(() => {
    const snapshot = registry.get(task.id);
    if (!snapshot || snapshot.status !== 'running') return;
    const line = formatProgress(snapshot);
    if (line !== lastLine) console.log(line);
    lastLine = line;
  }, 5000);

  const onSigint = () => {
    if (registry.cancel(task.id)) {
      agentLog('CLI', 'Cancelling after the current item (Ctrl-C again to quit now)', { level: 'warn' });
      process.once('SIGINT', () => process.exit(130));
    }
  };
  process.once('SIGINT', onSigint);

  try {
    const result = await registry.start(task.id, runner, { summarize });
    console.log(summarize(result));
    return result;
  } finally {
    clearInterval(timer);
    process.removeListener('SIGINT', onSigint);
    const final = registry.get(task.id);
    if (final) console.log(formatTask(final));
  }
}

async function discover(config: AppConfig, store: JobStore, args: CliArgs): Promise<void> {
  const searchConfig = await loadSearchConfig(config.searchConfigPath);
  const executor = new SearchExecutor({
    apiKey: config.scraperApiKey,
    baseUrl: config.scraperApiBaseUrl,
    limiter: new RateLimiter({ minIntervalMs: config.requestDelayMs }),
  });
  const startAt = args.values['start-at'] === undefined ? 0 : Number(args.values['start-at']);
  if (!Number.isInteger(startAt) || startAt < 0) {
    throw new ConfigError(`--start-at must be a non-negative integer`);
  }

  await runTask(
    config,
    'discovery',
    (ctx) =>
      runDiscovery(
        { store, executor, reporter: ctx },
        { config: searchConfig, signal: ctx.signal, startAt },
      ),
    summarizeDiscovery,
  );
}

async function score(config: AppConfig, store: JobStore, args: CliArgs): Promise<void> {
  const resume = await loadResume(args.values.resume ?? config.resumePath);
  await runTask(
    config,
    'scoring',
    (ctx) =>
      runScoring(
        { store, reporter: ctx },
        {
          resume,
          signal: ctx.signal,
          concurrency: config.scoringConcurrency,
          highMatchThreshold: config.minMatchScore,
        },
      ),
    summarizeScoring,
  );
}

async function list(store: JobStore, args: CliArgs): Promise<void> {
  const parsed = jobFilterSchema.safeParse({
    status: args.values.status,
    minScore: args.values['min-score'],
    company: args.values.company,
    limit: args.values.limit,
  });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid filter: ${issues.join('; ')}`);
  }
  const jobs = await store.listFiltered(parsed.data);
  if (jobs.length === 0) {
    console.log('No jobs match.');
    return;
  }
  for (const job of jobs) console.log(formatJobLine(job));
}

async function show(store: JobStore, args: CliArgs): Promise<void> {
  const id = parseJobId(args.positionals[1]);
  const job = await store.getById(id);
  if (!job) throw new NotFoundError(`Job ${id} not found`);
  console.log(formatJobDetail(job));
}

async function analyze(config: AppConfig, store: JobStore, args: CliArgs): Promise<void> {
  const id = parseJobId(args.positionals[1]);
  const resume = await loadResume(args.values.resume ?? config.resumePath);
  const { job, analysis } = await runAnalysis({ store }, id, { resume });
  console.log(formatJobDetail(job));
  if (analysis.gaps.length > 0) {
    console.log('\nGaps:');
    for (const gap of analysis.gaps) console.log(`  - ${gap}`);
  }
  if (analysis.coverLetterPoints.length > 0) {
    console.log('\nCover letter points:');
    for (const point of analysis.coverLetterPoints) console.log(`  - ${point}`);
  }
}

async function setStatus(store: JobStore, args: CliArgs): Promise<void> {
  const id = parseJobId(args.positionals[1]);
  const status = jobStatusEnum.safeParse(args.positionals[2]);
  if (!status.success) {
    throw new ConfigError(`Status must be one of: ${jobStatusEnum.options.join(', ')}`);
  }
  if (!(await store.updateStatus(id, status.data))) throw new NotFoundError(`Job ${id} not found`);
  if (args.values.notes !== undefined) await store.updateNotes(id, args.values.notes);
  console.log(`Job ${id} is now ${status.data}.`);
}

async function setNotes(store: JobStore, args: CliArgs): Promise<void> {
  const id = parseJobId(args.positionals[1]);
  const text = args.positionals.slice(2).join(' ');
  if (!(await store.updateNotes(id, text))) throw new NotFoundError(`Job ${id} not found`);
  console.log(`Notes saved for job ${id}.`);
}

async function main() {
  const args = parseCliArgs();
  const command = args.positionals[0];
  if (args.values.help || !command) {
    console.log(USAGE);
    return;
  }

  const config = loadAppConfig();
  setLogLevel(config.logLevel);
  if (command === 'tasks') {
    const history = readTaskHistory(config.tasksFile);
    if (history.length === 0) console.log('No tasks recorded.');
    for (const task of history) console.log(formatTask(task));
    return;
  }

  const store = createPgJobStore(getDb(config.databaseUrl));
  try {
    switch (command) {
      case 'discover':
        return await discover(config, store, args);
      case 'score':
        return await score(config, store, args);
      case 'list':
        return await list(store, args);
      case 'show':
        return await show(store, args);
      case 'stats': {
        const stats = await store.aggregateStats({ highMatchThreshold: config.minMatchScore });
        console.log(formatStats(stats, config.minMatchScore));
        return;
      }
      case 'analyze':
        return await analyze(config, store, args);
      case 'status':
        return await setStatus(store, args);
      case 'notes':
        return await setNotes(store, args);
      default:
        console.error(`Unknown command: ${command}\n`);
        console.log(USAGE);
        process.exitCode = 1;
    }
  } finally {
    await closeDb();
  }
}

main().catch((err) => {
  if (err instanceof StoreError && err.connection) console.error(DATABASE_ERROR_MESSAGE);
  else if (err instanceof JobScoutError) console.error(`${err.name}: ${err.message}`);
  else if (isAbortError(err)) console.error('Cancelled.');
  else console.error(errorMessage(err));
  process.exit(1);
});
