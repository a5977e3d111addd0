/**
 * Canonicalizer Agent - tidies extracted job fields before they are stored
 *
 * Responsibilities:
 * - Canonical URL (tracking parameters, fragment, ordering)
 * - Strip job-board decorations from titles ("| Indeed", "Job Application for")
 * - Normalize company suffixes and location separators, uppercase state codes
 * - Cut title, company and location to their column widths
 *
 * Code-only, no LLM.
 */

import { canonicalizeJobUrl } from '@jobscout/core';
import { JOB_FIELD_LIMITS, type DiscoveredJob } from '@jobscout/schemas';
import { truncate } from '../browser/html-text.js';
import { stateCodeForName, stateNameForCode } from './location-filter.js';

const TITLE_DECORATIONS = [
  /^job application for\s+/i,
  /^apply (?:now|today)?\s*[:-]?\s*/i,
  /\s*[|–—-]\s*(?:indeed(?:\.com)?|linkedin|glassdoor|ziprecruiter|careers?|jobs?)\s*$/i,
  /\s*\((?:m|f|d|w)\/(?:m|f|d|w)(?:\/(?:m|f|d|w))?\)\s*$/i,
];

const COUNTRY_SUFFIXES = new Set(['united states', 'united states of america', 'usa', 'us']);

export function canonicalizeTitle(title: string): string {
  let normalized = title.replace(/\s+/g, ' ').trim();
  for (const pattern of TITLE_DECORATIONS) {
    normalized = normalized.replace(pattern, '').trim();
  }
  return normalized;
}

/** `Acme Corp, Inc.` -> `Acme Corp` */
export function canonicalizeCompany(company: string): string {
  return company
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/,?\s+(?:inc|llc|ltd)\.?$/i, '')
    .replace(/[,;:]+$/, '')
    .trim();
}

/**
 * `arlington ,  va, United States` -> `arlington, VA`; state names after a
 * comma become their two-letter code so the same place reads the same way.
 */
export function canonicalizeLocation(location: string): string {
  const segments = location
    .split(',')
    .map((s) => s.replace(/\s+/g, ' ').trim())
    .filter(Boolean);

  const out = segments.map((segment, i) => {
    if (i === 0) return segment;
    if (/^[a-z]{2}$/i.test(segment) && stateNameForCode(segment)) return segment.toUpperCase();
    return stateCodeForName(segment) ?? segment;
  });

  const hasState = out.some((s) => /^[A-Z]{2}$/.test(s) && stateNameForCode(s));
  if (hasState && out.length > 1 && COUNTRY_SUFFIXES.has(out[out.length - 1].toLowerCase())) {
    out.pop();
  }
  return out.join(', ');
}

export function canonicalizeJob(job: DiscoveredJob): DiscoveredJob {
  return {
    ...job,
    url: canonicalizeJobUrl(job.url),
    title: truncate(canonicalizeTitle(job.title), JOB_FIELD_LIMITS.title),
    company: truncate(canonicalizeCompany(job.company), JOB_FIELD_LIMITS.company),
    location: truncate(canonicalizeLocation(job.location), JOB_FIELD_LIMITS.location),
    description: job.description.trim(),
  };
}
