import type { DiscoveredJob, Job } from '@jobscout/schemas';
import type { JobRow } from './schema';

/** Descriptive columns a re-discovery may refresh. */
export interface RefreshedJobFields {
  title?: string;
  company?: string;
  location?: string;
  description?: string;
  postedDate?: string;
  scrapedAt: Date;
}

/**
 * Fields written when a known URL is discovered again. Only non-empty incoming
 * values replace stored ones; status, notes and the score are never part of it.
 */
export function refreshedJobFields(incoming: DiscoveredJob): RefreshedJobFields {
  return {
    scrapedAt: incoming.scrapedAt,
    ...(incoming.title.trim() ? { title: incoming.title } : {}),
    ...(incoming.company.trim() ? { company: incoming.company } : {}),
    ...(incoming.location.trim() ? { location: incoming.location } : {}),
    ...(incoming.description.trim() ? { description: incoming.description } : {}),
    ...(incoming.postedDate ? { postedDate: incoming.postedDate } : {}),
  };
}

export function toJob(row: JobRow): Job {
  return {
    id: row.id,
    url: row.url,
    title: row.title,
    company: row.company,
    location: row.location,
    description: row.description,
    postedDate: row.postedDate,
    scrapedAt: row.scrapedAt,
    matchScore: row.matchScore,
    matchReasoning: row.matchReasoning,
    status: row.status,
    notes: row.notes,
  };
}
