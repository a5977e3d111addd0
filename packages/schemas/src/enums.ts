import { z } from 'zod';

export const JOB_STATUSES = ['new', 'reviewed', 'applied', 'interviewing', 'rejected'] as const;
export const jobStatusEnum = z.enum(JOB_STATUSES);
export type JobStatus = z.infer<typeof jobStatusEnum>;

export const dateRangeEnum = z.enum(['past_day', 'past_week', 'past_month', 'any']);
export type DateRange = z.infer<typeof dateRangeEnum>;

export const taskKindEnum = z.enum(['discovery', 'scoring']);
export type TaskKind = z.infer<typeof taskKindEnum>;

export const taskStatusEnum = z.enum(['not-started', 'running', 'completed', 'failed', 'cancelled']);
export type TaskStatus = z.infer<typeof taskStatusEnum>;

/** Per-job state inside a scoring run. */
export const scoringStateEnum = z.enum(['unscored', 'scoring-in-flight', 'scored', 'scoring-failed']);
export type ScoringState = z.infer<typeof scoringStateEnum>;
