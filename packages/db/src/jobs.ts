import { eq, and, gte, ilike, inArray, isNull, asc, desc, sql, type SQL } from 'drizzle-orm';
import {
  DEFAULT_LIST_LIMIT,
  MAX_LIST_LIMIT,
  emptyStatusCounts,
  type DiscoveredJob,
  type JobFilter,
  type JobStats,
  type JobStatus,
} from '@jobscout/schemas';
import type { Db } from './client';
import { jobs as jobsTable, type JobRow } from './schema';
import { refreshedJobFields } from './job-fields';

export async function getJobById(db: Db, id: number): Promise<JobRow | null> {
  const [row] = await db.select().from(jobsTable).where(eq(jobsTable.id, id)).limit(1);
  return row ?? null;
}

export async function getExistingJobUrls(db: Db, urls: readonly string[]): Promise<Set<string>> {
  if (urls.length === 0) return new Set();
  const rows = await db
    .select({ url: jobsTable.url })
    .from(jobsTable)
    .where(inArray(jobsTable.url, [...urls]));
  return new Set(rows.map((r) => r.url));
}

/**
 * Insert a job, or refresh the descriptive fields of the row with the same URL.
 * Runs in one transaction so the row is written all-or-nothing.
 */
export async function upsertJobByUrl(
  db: Db,
  job: DiscoveredJob,
): Promise<{ id: number; created: boolean }> {
  return db.transaction(async (tx) => {
    const [existing] = await tx
      .select({ id: jobsTable.id })
      .from(jobsTable)
      .where(eq(jobsTable.url, job.url))
      .limit(1);

    if (existing) {
      await tx
        .update(jobsTable)
        .set({ ...refreshedJobFields(job), updatedAt: new Date() })
        .where(eq(jobsTable.id, existing.id));
      return { id: existing.id, created: false };
    }

    const [inserted] = await tx
      .insert(jobsTable)
      .values({
        url: job.url,
        title: job.title,
        company: job.company,
        location: job.location,
        description: job.description,
        postedDate: job.postedDate,
        scrapedAt: job.scrapedAt,
      })
      .returning({ id: jobsTable.id });
    return { id: inserted.id, created: true };
  });
}

export async function listUnscoredJobs(db: Db): Promise<JobRow[]> {
  return db
    .select()
    .from(jobsTable)
    .where(isNull(jobsTable.matchScore))
    .orderBy(asc(jobsTable.id));
}

export async function updateJobScore(
  db: Db,
  id: number,
  score: number,
  reasoning: string,
): Promise<boolean> {
  const rows = await db
    .update(jobsTable)
    .set({ matchScore: score, matchReasoning: reasoning, updatedAt: new Date() })
    .where(eq(jobsTable.id, id))
    .returning({ id: jobsTable.id });
  return rows.length > 0;
}

export async function updateJobStatus(db: Db, id: number, status: JobStatus): Promise<boolean> {
  const rows = await db
    .update(jobsTable)
    .set({ status, updatedAt: new Date() })
    .where(eq(jobsTable.id, id))
    .returning({ id: jobsTable.id });
  return rows.length > 0;
}

export async function updateJobNotes(db: Db, id: number, notes: string): Promise<boolean> {
  const rows = await db
    .update(jobsTable)
    .set({ notes, updatedAt: new Date() })
    .where(eq(jobsTable.id, id))
    .returning({ id: jobsTable.id });
  return rows.length > 0;
}

export function clampListLimit(limit: number | undefined): number {
  if (limit === undefined) return DEFAULT_LIST_LIMIT;
  return Math.min(Math.max(1, Math.floor(limit)), MAX_LIST_LIMIT);
}

/** Best match first; unscored jobs last. */
export async function listJobs(db: Db, filter: JobFilter = {}): Promise<JobRow[]> {
  const conditions: SQL[] = [];
  if (filter.status) conditions.push(eq(jobsTable.status, filter.status));
  if (filter.minScore !== undefined) conditions.push(gte(jobsTable.matchScore, filter.minScore));
  if (filter.company) conditions.push(ilike(jobsTable.company, `%${filter.company}%`));

  return db
    .select()
    .from(jobsTable)
    .where(conditions.length > 0 ? and(...conditions) : undefined)
    .orderBy(sql`${jobsTable.matchScore} desc nulls last`, desc(jobsTable.scrapedAt), asc(jobsTable.id))
    .limit(clampListLimit(filter.limit));
}

export async function getJobStats(db: Db, highMatchThreshold: number): Promise<JobStats> {
  const [totals] = await db
    .select({
      total: sql<number>`count(*)`.mapWith(Number),
      scored: sql<number>`count(${jobsTable.matchScore})`.mapWith(Number),
      average: sql<string | null>`avg(${jobsTable.matchScore})`,
      highMatch: sql<number>`count(*) filter (where ${jobsTable.matchScore} >= ${highMatchThreshold})`.mapWith(
        Number,
      ),
    })
    .from(jobsTable);

  const statusRows = await db
    .select({ status: jobsTable.status, count: sql<number>`count(*)`.mapWith(Number) })
    .from(jobsTable)
    .groupBy(jobsTable.status);

  const companyRows = await db
    .select({ company: jobsTable.company, count: sql<number>`count(*)`.mapWith(Number) })
    .from(jobsTable)
    .groupBy(jobsTable.company)
    .orderBy(desc(sql`count(*)`), asc(jobsTable.company));

  const byStatus = emptyStatusCounts();
  for (const row of statusRows) byStatus[row.status] = row.count;

  const total = totals?.total ?? 0;
  const scored = totals?.scored ?? 0;
  const average = totals?.average == null ? null : Math.round(Number(totals.average) * 10) / 10;

  return {
    total,
    byStatus,
    averageScore: average,
    byCompany: companyRows,
    scored,
    unscored: total - scored,
    highMatchCount: totals?.highMatch ?? 0,
  };
}

