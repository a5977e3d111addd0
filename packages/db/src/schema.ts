import {
  pgTable,
  serial,
  text,
  varchar,
  timestamp,
  integer,
  pgEnum,
  uniqueIndex,
  index,
} from 'drizzle-orm/pg-core';
import { JOB_FIELD_LIMITS, JOB_STATUSES } from '@jobscout/schemas';

export const jobStatusEnum = pgEnum('job_status', JOB_STATUSES);

export const jobs = pgTable(
  'jobs',
  {
    id: serial('id').primaryKey(),
    url: text('url').notNull(),
    title: varchar('title', { length: JOB_FIELD_LIMITS.title }).notNull(),
    company: varchar('company', { length: JOB_FIELD_LIMITS.company }).notNull(),
    location: varchar('location', { length: JOB_FIELD_LIMITS.location }).notNull().default(''),
    description: text('description').notNull().default(''),
    /** YYYY-MM-DD as parsed from the source; null when the page gave none. */
    postedDate: varchar('posted_date', { length: 10 }),
    scrapedAt: timestamp('scraped_at').notNull(),
    matchScore: integer('match_score'),
    matchReasoning: text('match_reasoning'),
    status: jobStatusEnum('status').notNull().default('new'),
    notes: text('notes'),
    createdAt: timestamp('created_at').defaultNow().notNull(),
    updatedAt: timestamp('updated_at').defaultNow().notNull(),
  },
  (table) => ({
    jobsUrlIdx: uniqueIndex('jobs_url_idx').on(table.url),
    jobsMatchScoreIdx: index('jobs_match_score_idx').on(table.matchScore),
    jobsStatusIdx: index('jobs_status_idx').on(table.status),
    jobsCompanyIdx: index('jobs_company_idx').on(table.company),
  }),
);

export type JobRow = typeof jobs.$inferSelect;
export type NewJobRow = typeof jobs.$inferInsert;
