/**
 * Types for the query planner
 */

import type { DateRange } from '@jobscout/schemas';

/** One outbound search: a (keyword, location) pair with its filter fragments. */
export interface SearchQuery {
  /** Position in the deterministic keyword-major ordering; resumable by this index. */
  index: number;
  keyword: string;
  location: string;
  isRemote: boolean;
  siteFilter: string | null;
  experienceFilter: string | null;
  salaryFilter: string | null;
  dateRange: DateRange;
  resultLimit: number;
  /** Full query string as sent to the search engine. */
  text: string;
}

export interface BuildQueriesOptions {
  /** Skip queries before this index (resume a partial run). */
  startAt?: number;
}
