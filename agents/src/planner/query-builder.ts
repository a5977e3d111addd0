/**
 * Query Builder - turns a SearchConfig into search engine queries
 *
 * Responsibilities:
 * - One query per (keyword, location), keywords outer, locations inner
 * - Site restriction, experience and salary fragments
 * - Date range and result cap carried for the executor
 *
 * Code-only, no LLM. No I/O.
 */

import type { DateRange, SearchConfig } from '@jobscout/schemas';
import type { BuildQueriesOptions, SearchQuery } from './types.js';

/** Google `tbs` values for each date range. */
export const DATE_RANGE_TBS: Record<DateRange, string | null> = {
  past_day: 'qdr:d',
  past_week: 'qdr:w',
  past_month: 'qdr:m',
  any: null,
};

export function isRemoteSentinel(location: string): boolean {
  return location.trim().toLowerCase() === 'remote';
}

/** `https://www.Indeed.com/jobs/` -> `indeed.com/jobs` */
export function normalizeSiteDomain(site: string): string {
  return site
    .trim()
    .toLowerCase()
    .replace(/^[a-z]+:\/\//, '')
    .replace(/^www\./, '')
    .replace(/\/+$/, '');
}

function orGroup(terms: string[]): string | null {
  if (terms.length === 0) return null;
  if (terms.length === 1) return terms[0];
  return `(${terms.join(' OR ')})`;
}

export function buildSiteFilter(sites: readonly string[]): string | null {
  const domains = Array.from(new Set(sites.map(normalizeSiteDomain).filter(Boolean)));
  return orGroup(domains.map((d) => `site:${d}`));
}

export function buildExperienceFilter(levels: readonly string[]): string | null {
  return orGroup(levels.map((l) => `"${l.trim()}"`).filter((l) => l !== '""'));
}

/** Google numeric range operator; open-ended when only one bound is set. */
export function buildSalaryFilter(
  minSalary: number | null | undefined,
  maxSalary: number | null | undefined,
): string | null {
  if (minSalary == null && maxSalary == null) return null;
  const min = minSalary == null ? '' : `$${minSalary}`;
  const max = maxSalary == null ? '' : `$${maxSalary}`;
  return `${min}..${max}`;
}

export function formatQueryText(
  query: Pick<
    SearchQuery,
    'keyword' | 'location' | 'isRemote' | 'siteFilter' | 'experienceFilter' | 'salaryFilter'
  >,
): string {
  const locationTerm = query.isRemote ? '"remote"' : `"${query.location}"`;
  return [
    `"${query.keyword}"`,
    locationTerm,
    query.experienceFilter,
    query.salaryFilter,
    query.siteFilter,
  ]
    .filter((part): part is string => Boolean(part))
    .join(' ');
}

export function countSearchQueries(config: Pick<SearchConfig, 'keywords' | 'locations'>): number {
  return config.keywords.length * config.locations.length;
}

/**
 * Lazily yields one query per (keyword, location). The same config always
 * yields the same sequence, so `startAt` resumes a run at a known position.
 */
export function* buildSearchQueries(
  config: SearchConfig,
  options: BuildQueriesOptions = {},
): Generator<SearchQuery> {
  const startAt = Math.max(0, options.startAt ?? 0);
  const siteFilter = buildSiteFilter(config.included_sites);
  const experienceFilter = buildExperienceFilter(config.experience_levels);
  const salaryFilter = buildSalaryFilter(config.min_salary, config.max_salary);

  let index = 0;
  for (const keyword of config.keywords) {
    for (const location of config.locations) {
      if (index >= startAt) {
        const isRemote = isRemoteSentinel(location);
        const parts = { keyword, location, isRemote, siteFilter, experienceFilter, salaryFilter };
        yield {
          index,
          ...parts,
          dateRange: config.date_range,
          resultLimit: config.results_per_search,
          text: formatQueryText(parts),
        };
      }
      index++;
    }
  }
}
