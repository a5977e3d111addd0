/**
 * Types for the browser stage (search results and fetched pages)
 */

import { z } from 'zod';
import type { SearchQuery } from '../planner/types.js';

export const SearchResultEntrySchema = z.object({
  url: z.string().url(),
  title: z.string(),
  snippet: z.string().default(''),
  /** 1-based rank in the parsed result list. */
  position: z.number().int().positive(),
});

export type SearchResultEntry = z.infer<typeof SearchResultEntrySchema>;

export interface ResultFilterOptions {
  includedSites: readonly string[];
  /** When true, results outside `includedSites` are dropped. */
  restrictToSites: boolean;
}

export interface FetchedDocument {
  /** The URL that was requested (not the proxy URL). */
  url: string;
  body: string;
  contentType: string | null;
}

export interface SearchPayload extends FetchedDocument {
  query: SearchQuery;
}
