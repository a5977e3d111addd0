/**
 * JobStore: the persistence boundary both pipelines write through.
 * The Postgres implementation maps every driver failure to StoreError.
 */

import { StoreError, errorMessage } from '@jobscout/core';
import type { DiscoveredJob, Job, JobFilter, JobStats, JobStatus } from '@jobscout/schemas';
import { getDb, type Db } from './client';
import { isDatabaseConnectionError } from './db-error';
import { toJob } from './job-fields';
import {
  getExistingJobUrls,
  getJobById,
  getJobStats,
  listJobs,
  listUnscoredJobs,
  updateJobNotes,
  updateJobScore,
  updateJobStatus,
  upsertJobByUrl,
} from './jobs';

export const DEFAULT_HIGH_MATCH_THRESHOLD = 70;

export interface UpsertResult {
  id: number;
  created: boolean;
}

export interface JobStore {
  /** Insert, or refresh descriptive fields of the row with the same URL. */
  upsertByUrl(job: DiscoveredJob): Promise<UpsertResult>;
  listUnscored(): Promise<Job[]>;
  /** The update methods resolve false when no job has the id. */
  updateScore(id: number, score: number, reasoning: string): Promise<boolean>;
  updateStatus(id: number, status: JobStatus): Promise<boolean>;
  updateNotes(id: number, notes: string): Promise<boolean>;
  listFiltered(filter?: JobFilter): Promise<Job[]>;
  aggregateStats(options?: { highMatchThreshold?: number }): Promise<JobStats>;
  getById(id: number): Promise<Job | null>;
  findExistingUrls(urls: readonly string[]): Promise<Set<string>>;
}

async function guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    throw new StoreError(`${operation} failed: ${errorMessage(err)}`, {
      connection: isDatabaseConnectionError(err),
      cause: err,
    });
  }
}

export function createPgJobStore(db: Db = getDb()): JobStore {
  return {
    upsertByUrl: (job) => guard('upsertByUrl', () => upsertJobByUrl(db, job)),
    listUnscored: () => guard('listUnscored', async () => (await listUnscoredJobs(db)).map(toJob)),
    updateScore: (id, score, reasoning) =>
      guard('updateScore', () => updateJobScore(db, id, score, reasoning)),
    updateStatus: (id, status) => guard('updateStatus', () => updateJobStatus(db, id, status)),
    updateNotes: (id, notes) => guard('updateNotes', () => updateJobNotes(db, id, notes)),
    listFiltered: (filter) => guard('listFiltered', async () => (await listJobs(db, filter)).map(toJob)),
    aggregateStats: (options) =>
      guard('aggregateStats', () =>
        getJobStats(db, options?.highMatchThreshold ?? DEFAULT_HIGH_MATCH_THRESHOLD),
      ),
    getById: (id) =>
      guard('getById', async () => {
        const row = await getJobById(db, id);
        return row ? toJob(row) : null;
      }),
    findExistingUrls: (urls) => guard('findExistingUrls', () => getExistingJobUrls(db, urls)),
  };
}
