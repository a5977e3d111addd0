/**
 * ATS fingerprinting from a posting URL, used to recover the hiring company
 * when the page itself does not name it. URL pattern matching only, no HTTP.
 */

export type AtsType =
  | 'GREENHOUSE'
  | 'LEVER'
  | 'ASHBY'
  | 'WORKABLE'
  | 'SMARTRECRUITERS'
  | 'WORKDAY'
  | 'ICIMS'
  | 'UNKNOWN';

export interface FingerprintResult {
  atsType: AtsType;
  /** Company token from the board path or subdomain, e.g. `acme-corp`. */
  companySlug: string | null;
}

/** Hosts of job boards and aggregators; their name is never the employer. */
const BOARD_HOSTS = [
  'linkedin.com',
  'indeed.com',
  'glassdoor.com',
  'ziprecruiter.com',
  'monster.com',
  'dice.com',
  'simplyhired.com',
  'careerbuilder.com',
  'usajobs.gov',
  'clearancejobs.com',
  'builtin.com',
  'wellfound.com',
];

const ATS_HOST_SUFFIXES = [
  'greenhouse.io',
  'lever.co',
  'ashbyhq.com',
  'workable.com',
  'smartrecruiters.com',
  'myworkdayjobs.com',
  'icims.com',
];

const GENERIC_SUBDOMAINS = new Set(['www', 'careers', 'jobs', 'boards', 'job-boards', 'apply', 'hire']);

const SECOND_LEVEL_SUFFIXES = new Set(['co', 'com', 'org', 'net', 'ac', 'gov']);

function parseUrl(url: string): URL | null {
  try {
    const s = url.trim();
    const withProtocol = /^https?:\/\//i.test(s) ? s : `https://${s}`;
    return new URL(withProtocol);
  } catch {
    return null;
  }
}

function hostMatches(host: string, domain: string): boolean {
  return host === domain || host.endsWith(`.${domain}`);
}

function firstSegment(pathname: string): string | null {
  return pathname.split('/').filter(Boolean)[0] ?? null;
}

function decodeSlug(slug: string): string {
  try {
    return decodeURIComponent(slug);
  } catch {
    return slug;
  }
}

function result(atsType: AtsType, companySlug: string | null | undefined): FingerprintResult {
  return { atsType, companySlug: companySlug ? decodeSlug(companySlug) : null };
}

export function fingerprintFromUrl(jobUrl: string): FingerprintResult {
  const url = parseUrl(jobUrl);
  if (!url) return result('UNKNOWN', null);

  const host = url.hostname.toLowerCase();
  const pathname = url.pathname.replace(/\/+$/, '') || '/';

  // boards.greenhouse.io/acme/jobs/123, job-boards.greenhouse.io/acme, boards.greenhouse.io/embed/job_app?for=acme
  if (host === 'boards.greenhouse.io' || host === 'job-boards.greenhouse.io') {
    const segment = firstSegment(pathname);
    if (segment === 'embed') return result('GREENHOUSE', url.searchParams.get('for'));
    return result('GREENHOUSE', segment);
  }
  if (host.endsWith('.greenhouse.io')) {
    return result('GREENHOUSE', host.slice(0, -'.greenhouse.io'.length));
  }

  if (host === 'jobs.lever.co' || host === 'jobs.eu.lever.co') {
    return result('LEVER', firstSegment(pathname));
  }

  if (hostMatches(host, 'ashbyhq.com')) {
    return result('ASHBY', firstSegment(pathname));
  }

  // apply.workable.com/acme/j/ABC123 or acme.workable.com
  if (host === 'apply.workable.com') {
    const segment = firstSegment(pathname);
    return result('WORKABLE', segment === 'j' ? null : segment);
  }
  if (host.endsWith('.workable.com') && host !== 'www.workable.com') {
    return result('WORKABLE', host.slice(0, -'.workable.com'.length));
  }

  if (host === 'jobs.smartrecruiters.com' || host === 'careers.smartrecruiters.com') {
    return result('SMARTRECRUITERS', firstSegment(pathname));
  }

  // acme.wd5.myworkdayjobs.com
  if (host.endsWith('.myworkdayjobs.com')) {
    return result('WORKDAY', host.split('.')[0]);
  }

  // careers-acme.icims.com
  if (host.endsWith('.icims.com')) {
    return result('ICIMS', host.split('.')[0].replace(/^careers-/, ''));
  }

  return result('UNKNOWN', null);
}

/** `acme-corp` -> `Acme Corp` */
export function humanizeSlug(slug: string): string {
  return slug
    .replace(/[-_+]+/g, ' ')
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/\b\w/g, (c) => c.toUpperCase());
}

/**
 * Best-effort company name for a posting URL: the ATS board slug when the URL
 * is an ATS link, otherwise the registrable host name. Null for job boards,
 * ATS hosts without a company token, and unparseable URLs.
 */
export function companyFromUrl(jobUrl: string): string | null {
  const url = parseUrl(jobUrl);
  if (!url) return null;

  const { companySlug } = fingerprintFromUrl(jobUrl);
  if (companySlug) return humanizeSlug(companySlug);

  const host = url.hostname.toLowerCase();
  if (BOARD_HOSTS.some((d) => hostMatches(host, d))) return null;
  if (ATS_HOST_SUFFIXES.some((d) => hostMatches(host, d))) return null;

  const labels = host.split('.').filter((l) => !GENERIC_SUBDOMAINS.has(l));
  if (labels.length < 2) return null;
  let nameIndex = labels.length - 2;
  if (labels.length >= 3 && SECOND_LEVEL_SUFFIXES.has(labels[nameIndex])) nameIndex -= 1;
  return humanizeSlug(labels[nameIndex]);
}
