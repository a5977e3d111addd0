/**
 * Deduplicator Agent - one record per canonical URL
 *
 * Responsibilities:
 * - Collapse in-batch duplicates (first non-empty value per field wins)
 * - Split the batch into rows to insert and rows to refresh
 *
 * Refreshing never touches status, notes or the score; that rule is enforced
 * by the store's upsert.
 *
 * Code-only, no LLM.
 */

import { canonicalizeJobUrl } from '@jobscout/core';
import type { DiscoveredJob } from '@jobscout/schemas';

export interface UpsertPartition {
  /** URL not yet in the store. */
  toInsert: DiscoveredJob[];
  /** URL already stored; descriptive fields will be refreshed. */
  toUpdate: DiscoveredJob[];
  /** Batch entries folded into an earlier entry with the same URL. */
  duplicatesMerged: number;
}

/** Fill empty fields of `primary` from `secondary`. */
export function mergeDiscovered(primary: DiscoveredJob, secondary: DiscoveredJob): DiscoveredJob {
  const pick = (a: string, b: string) => (a.trim() ? a : b);
  return {
    ...primary,
    title: pick(primary.title, secondary.title),
    company: pick(primary.company, secondary.company),
    location: pick(primary.location, secondary.location),
    description: pick(primary.description, secondary.description),
    postedDate: primary.postedDate ?? secondary.postedDate,
  };
}

export function dedupeBatch(batch: readonly DiscoveredJob[]): {
  jobs: DiscoveredJob[];
  duplicatesMerged: number;
} {
  const byUrl = new Map<string, DiscoveredJob>();
  let duplicatesMerged = 0;
  for (const job of batch) {
    const url = canonicalizeJobUrl(job.url);
    const existing = byUrl.get(url);
    if (existing) {
      byUrl.set(url, mergeDiscovered(existing, job));
      duplicatesMerged++;
    } else {
      byUrl.set(url, { ...job, url });
    }
  }
  return { jobs: Array.from(byUrl.values()), duplicatesMerged };
}

export function partitionForUpsert(
  batch: readonly DiscoveredJob[],
  existingUrls: ReadonlySet<string>,
): UpsertPartition {
  const { jobs, duplicatesMerged } = dedupeBatch(batch);
  const toInsert: DiscoveredJob[] = [];
  const toUpdate: DiscoveredJob[] = [];
  for (const job of jobs) {
    if (existingUrls.has(job.url)) toUpdate.push(job);
    else toInsert.push(job);
  }
  return { toInsert, toUpdate, duplicatesMerged };
}
