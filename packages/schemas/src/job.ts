import { z } from 'zod';
import { jobStatusEnum, type JobStatus } from './enums';

/** Calendar date as stored for `postedDate`. */
export const isoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');

/** Column widths of the bounded text fields. */
export const JOB_FIELD_LIMITS = { title: 512, company: 255, location: 255 } as const;

export const jobSchema = z.object({
  id: z.number().int().positive(),
  url: z.string().url(),
  title: z.string(),
  company: z.string(),
  location: z.string(),
  description: z.string(),
  postedDate: isoDateSchema.nullable(),
  scrapedAt: z.coerce.date(),
  matchScore: z.number().int().min(0).max(100).nullable(),
  matchReasoning: z.string().nullable(),
  status: jobStatusEnum,
  notes: z.string().nullable(),
});

export type Job = z.infer<typeof jobSchema>;

/**
 * A job as produced by the discovery pipeline, before the store assigns an id.
 * Carries descriptive fields only; tracking and scoring fields belong to the store.
 */
export const discoveredJobSchema = jobSchema.pick({
  url: true,
  title: true,
  company: true,
  location: true,
  description: true,
  postedDate: true,
  scrapedAt: true,
});

export type DiscoveredJob = z.infer<typeof discoveredJobSchema>;

/** Fields the pipelines never overwrite on re-discovery. */
export const PROTECTED_JOB_FIELDS = ['status', 'notes', 'matchScore', 'matchReasoning'] as const;

export const DEFAULT_LIST_LIMIT = 100;
export const MAX_LIST_LIMIT = 500;

export const jobFilterSchema = z.object({
  status: jobStatusEnum.optional(),
  minScore: z.coerce.number().int().min(0).max(100).optional(),
  company: z.string().trim().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(MAX_LIST_LIMIT).optional(),
});

export type JobFilter = z.infer<typeof jobFilterSchema>;

export interface CompanyCount {
  company: string;
  count: number;
}

export interface JobStats {
  total: number;
  byStatus: Record<JobStatus, number>;
  /** Mean match score rounded to one decimal, null when nothing is scored. */
  averageScore: number | null;
  byCompany: CompanyCount[];
  scored: number;
  unscored: number;
  highMatchCount: number;
}

export function emptyStatusCounts(): Record<JobStatus, number> {
  return { new: 0, reviewed: 0, applied: 0, interviewing: 0, rejected: 0 };
}
