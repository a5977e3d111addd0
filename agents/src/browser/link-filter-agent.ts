/**
 * Link Filter Agent - decides whether a search result link can be a job posting.
 *
 * Drops search-engine navigation, social and asset links, job-board listing
 * pages and, when site restriction is on, domains outside the configured set.
 * A predicate only: rejected links are skipped, never raised.
 *
 * Code-only, no LLM. Deterministic and fast.
 */

import type { ResultFilterOptions } from './types.js';
import { normalizeSiteDomain } from '../planner/query-builder.js';

const SEARCH_ENGINE_HOSTS = [
  'google.com',
  'googleusercontent.com',
  'googleadservices.com',
  'bing.com',
  'duckduckgo.com',
  'yahoo.com',
  'search.brave.com',
];

const SOCIAL_HOSTS = [
  'facebook.com',
  'twitter.com',
  'x.com',
  'instagram.com',
  'youtube.com',
  'tiktok.com',
  'pinterest.com',
  'reddit.com',
];

/**
 * Paths that are definitely NOT job postings.
 */
const BLOCKLIST_EXACT_PREFIXES = [
  '/api/',
  '/static/',
  '/assets/',
  '/images/',
  '/wp-content/',
  '/wp-admin/',
  '/feed/',
  '/cdn-cgi/',
  '/_next/',
];

/**
 * Paths blocked only when they are the FULL path.
 * e.g. /login is blocked, but /company/login-startup would NOT be.
 */
const BLOCKLIST_EXACT_PATHS = [
  '/',
  '/login',
  '/signin',
  '/signup',
  '/register',
  '/privacy',
  '/terms',
  '/about',
  '/contact',
];

/** Markers of job-board result listings rather than a single posting. */
const LISTING_PAGE_MARKERS = [
  '/search',
  'searchjobs',
  'offset=',
  'page=',
  '/results',
  'login',
  'referral',
];

function hostMatches(host: string, domain: string): boolean {
  return host === domain || host.endsWith(`.${domain}`);
}

function siteMatches(parsed: URL, site: string): boolean {
  const [domain, ...pathParts] = normalizeSiteDomain(site).split('/');
  if (!domain || !hostMatches(parsed.hostname.toLowerCase(), domain)) return false;
  if (pathParts.length === 0) return true;
  return parsed.pathname.toLowerCase().startsWith(`/${pathParts.join('/')}`);
}

export function isJobResultLink(url: string, options: ResultFilterOptions): boolean {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return false;
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') return false;

  const host = parsed.hostname.toLowerCase();
  if (SEARCH_ENGINE_HOSTS.some((d) => hostMatches(host, d))) return false;
  if (SOCIAL_HOSTS.some((d) => hostMatches(host, d))) return false;

  if (options.restrictToSites && options.includedSites.length > 0) {
    if (!options.includedSites.some((site) => siteMatches(parsed, site))) return false;
  }

  const pathLower = parsed.pathname.toLowerCase();
  if (BLOCKLIST_EXACT_PREFIXES.some((bp) => pathLower.startsWith(bp))) return false;
  if (BLOCKLIST_EXACT_PATHS.some((bp) => pathLower === bp || pathLower === `${bp}/`)) return false;
  if (/\.(js|css|png|jpg|jpeg|gif|svg|ico|woff2?|xml|json|zip)$/i.test(pathLower)) return false;

  const pathAndQuery = `${pathLower}${parsed.search.toLowerCase()}`;
  return !LISTING_PAGE_MARKERS.some((marker) => pathAndQuery.includes(marker));
}
