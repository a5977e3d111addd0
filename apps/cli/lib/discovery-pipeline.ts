/**
 * Discovery pipeline: search config in, deduplicated job rows out.
 *
 * Queries run one after another through the executor's shared throttle.
 * Per-item failures are logged, counted and skipped; a ConfigError or a lost
 * database connection ends the run. Cancellation is checked between queries
 * and between entries, so every job row is either fully written or untouched.
 */

import {
  ConfigError,
  FetchError,
  ParseError,
  errorMessage,
  isFatal,
  throwIfAborted,
} from '@jobscout/core';
import {
  buildSearchQueries,
  canonicalizeJob,
  countSearchQueries,
  extractJobDetail,
  isLocationMatch,
  parseSearchResults,
  partitionForUpsert,
  type FetchedDocument,
  type SearchPayload,
  type SearchQuery,
  type SearchResultEntry,
} from '@jobscout/agents';
import type { JobStore } from '@jobscout/db';
import type { DiscoveredJob, SearchConfig } from '@jobscout/schemas';
import { agentLog } from './agent-logs';

const AGENT = 'Discovery';

/** The part of SearchExecutor the pipeline depends on. */
export interface DiscoveryExecutor {
  readonly hasCredential: boolean;
  search(query: SearchQuery, signal?: AbortSignal): Promise<SearchPayload>;
  fetchPage(url: string, signal?: AbortSignal): Promise<FetchedDocument>;
}

export interface ProgressReporter {
  reportProgress(current: number, total: number, currentItem?: string | null): void;
}

export interface DiscoveryDeps {
  store: JobStore;
  executor: DiscoveryExecutor;
  reporter?: ProgressReporter;
  now?: () => Date;
}

export interface DiscoveryOptions {
  config: SearchConfig;
  signal?: AbortSignal;
  /** Resume at this query index. */
  startAt?: number;
  /** Drop results outside `included_sites`. Defaults to true when sites are configured. */
  restrictToSites?: boolean;
}

export interface DiscoveryReport {
  queries: number;
  queriesFailed: number;
  /** Candidate entries parsed from search results. */
  discovered: number;
  inserted: number;
  updated: number;
  /** Entries dropped: unrecoverable page, or location outside the targets. */
  skipped: number;
  /** Job writes that failed. */
  failed: number;
  duplicatesMerged: number;
  /** Detail pages that could not be fetched; those jobs were built from the search entry. */
  detailFetchFailed: number;
}

function emptyReport(): DiscoveryReport {
  return {
    queries: 0,
    queriesFailed: 0,
    discovered: 0,
    inserted: 0,
    updated: 0,
    skipped: 0,
    failed: 0,
    duplicatesMerged: 0,
    detailFetchFailed: 0,
  };
}

async function extractEntry(
  executor: DiscoveryExecutor,
  entry: SearchResultEntry,
  scrapedAt: Date,
  report: DiscoveryReport,
  signal?: AbortSignal,
): Promise<DiscoveredJob | null> {
  let html = '';
  try {
    html = (await executor.fetchPage(entry.url, signal)).body;
  } catch (err) {
    if (!(err instanceof FetchError)) throw err;
    report.detailFetchFailed++;
    agentLog(AGENT, 'Detail page unavailable, using search entry', {
      level: 'warn',
      detail: `${entry.url}: ${err.message}`,
    });
  }

  try {
    return canonicalizeJob(extractJobDetail(html, entry, { scrapedAt }));
  } catch (err) {
    if (!(err instanceof ParseError)) throw err;
    agentLog(AGENT, 'Skipped entry', { level: 'debug', detail: err.message });
    return null;
  }
}

async function writeBatch(
  store: JobStore,
  batch: DiscoveredJob[],
  report: DiscoveryReport,
  signal?: AbortSignal,
): Promise<void> {
  if (batch.length === 0) return;
  let existing = new Set<string>();
  try {
    existing = await store.findExistingUrls(batch.map((j) => j.url));
  } catch (err) {
    if (isFatal(err)) throw err;
    // Counts still come from each upsert's `created` flag.
    agentLog(AGENT, 'Existing-URL lookup failed, upserting batch without it', {
      level: 'warn',
      detail: errorMessage(err),
    });
  }
  const { toInsert, toUpdate, duplicatesMerged } = partitionForUpsert(batch, existing);
  report.duplicatesMerged += duplicatesMerged;

  for (const job of [...toInsert, ...toUpdate]) {
    throwIfAborted(signal);
    try {
      const result = await store.upsertByUrl(job);
      if (result.created) report.inserted++;
      else report.updated++;
      agentLog(AGENT, result.created ? 'Inserted job' : 'Updated job', {
        level: result.created ? 'success' : 'info',
        detail: `${job.title || '(untitled)'} @ ${job.company || '(unknown)'}`,
      });
    } catch (err) {
      if (isFatal(err)) throw err;
      report.failed++;
      agentLog(AGENT, 'Failed to store job', { level: 'error', detail: `${job.url}: ${errorMessage(err)}` });
    }
  }
}

export async function runDiscovery(
  deps: DiscoveryDeps,
  options: DiscoveryOptions,
): Promise<DiscoveryReport> {
  const { store, executor, reporter } = deps;
  const { config, signal } = options;
  if (!executor.hasCredential) {
    throw new ConfigError('Search service credential is missing (set SCRAPERAPI_KEY)');
  }

  const scrapedAt = (deps.now ?? (() => new Date()))();
  const filterOptions = {
    includedSites: config.included_sites,
    restrictToSites: options.restrictToSites ?? config.included_sites.length > 0,
  };
  const startAt = Math.max(0, options.startAt ?? 0);
  const total = countSearchQueries(config);
  const report = emptyReport();
  let done = startAt;

  agentLog(AGENT, `Starting discovery: ${total - startAt} queries`, {
    detail: startAt > 0 ? `resuming at query ${startAt}` : undefined,
  });

  for (const query of buildSearchQueries(config, { startAt })) {
    throwIfAborted(signal);
    reporter?.reportProgress(done, total, query.text);
    agentLog(AGENT, `Query ${query.index + 1}/${total}`, { level: 'debug', detail: query.text });
    report.queries++;

    let payload: SearchPayload;
    try {
      payload = await executor.search(query, signal);
    } catch (err) {
      if (!(err instanceof FetchError)) throw err;
      report.queriesFailed++;
      agentLog(AGENT, 'Search failed, continuing', { level: 'warn', detail: `${query.text}: ${err.message}` });
      reporter?.reportProgress(++done, total, query.text);
      continue;
    }

    const entries = parseSearchResults(payload.body, filterOptions);
    report.discovered += entries.length;

    const batch: DiscoveredJob[] = [];
    for (const entry of entries) {
      throwIfAborted(signal);
      const job = await extractEntry(executor, entry, scrapedAt, report, signal);
      if (!job) {
        report.skipped++;
        continue;
      }
      const decision = isLocationMatch(job.location, config.locations);
      if (!decision.include) {
        report.skipped++;
        agentLog(AGENT, 'Skipped (location)', { level: 'debug', detail: `${job.title} - ${job.location}` });
        continue;
      }
      batch.push(job);
    }

    await writeBatch(store, batch, report, signal);
    reporter?.reportProgress(++done, total, query.text);
  }

  agentLog(
    AGENT,
    `Discovery complete: ${report.inserted} inserted, ${report.updated} updated, ${report.skipped} skipped, ${report.failed} failed`,
    { level: 'success' },
  );
  return report;
}

export function summarizeDiscovery(report: DiscoveryReport): string {
  return (
    `${report.discovered} discovered, ${report.inserted} inserted, ${report.updated} updated, ` +
    `${report.skipped} skipped, ${report.failed} failed`
  );
}
