/**
 * Job Detail Extractor Agent - extracts one job posting from its page.
 *
 * An ordered list of strategies, each returning whatever fields it can find;
 * the results are merged first-non-empty-wins. Structured metadata (JSON-LD,
 * microdata) comes first, then ATS page conventions, DOM selectors, the
 * search result entry itself and finally the URL. A page is rejected only
 * when neither a title nor a company can be recovered.
 *
 * Code-only, no LLM.
 */

import { parse, type HTMLElement } from 'node-html-parser';
import { ParseError, canonicalizeJobUrl, companyFromUrl } from '@jobscout/core';
import type { DiscoveredJob } from '@jobscout/schemas';
import { parsePostedDate } from '../normalize/posted-date.js';
import { collapseWhitespace, htmlToText, truncate } from './html-text.js';
import type { SearchResultEntry } from './types.js';

export const MAX_DESCRIPTION_CHARS = 5000;
const MAX_TITLE_CHARS = 200;
const MAX_SHORT_FIELD_CHARS = 120;

export interface ExtractedFields {
  title?: string;
  company?: string;
  location?: string;
  description?: string;
  /** Raw date text as found on the page; normalized after merging. */
  postedDate?: string;
}

export interface ExtractionInput {
  root: HTMLElement;
  url: string;
  entry: SearchResultEntry;
}

export interface ExtractionStrategy {
  name: string;
  extract(input: ExtractionInput): ExtractedFields;
}

type JsonRecord = Record<string, unknown>;

const FIELD_NAMES = ['title', 'company', 'location', 'description', 'postedDate'] as const;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asText(value: unknown): string | undefined {
  if (typeof value === 'string') return collapseWhitespace(value) || undefined;
  if (typeof value === 'number') return String(value);
  return undefined;
}

function nameOf(value: unknown): string | undefined {
  return asText(value) ?? (isRecord(value) ? asText(value.name) : undefined);
}

function bounded(value: string | undefined, maxChars: number): string | undefined {
  if (!value) return undefined;
  const text = collapseWhitespace(value);
  return text.length >= 2 && text.length <= maxChars ? text : undefined;
}

/** `Data Engineer at Acme` -> title + company */
export function splitTitleAtCompany(text: string): ExtractedFields | null {
  const m = collapseWhitespace(text).match(/^(?:job application for\s+)?(.+?)\s+at\s+(.+)$/i);
  if (!m) return null;
  return { title: m[1], company: m[2].replace(/\s*[|–—-]\s*.*$/, '') };
}

function hostOf(url: string): string {
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    return '';
  }
}

// --- JSON-LD -------------------------------------------------------------

function findJobPosting(data: unknown): JsonRecord | null {
  const queue: unknown[] = Array.isArray(data) ? [...data] : [data];
  while (queue.length > 0) {
    const item = queue.shift();
    if (!isRecord(item)) continue;
    const type = item['@type'];
    if (type === 'JobPosting' || (Array.isArray(type) && type.includes('JobPosting'))) return item;
    const graph = item['@graph'];
    if (Array.isArray(graph)) queue.push(...graph);
  }
  return null;
}

function jsonLdLocation(posting: JsonRecord): string | undefined {
  const places: unknown[] = Array.isArray(posting.jobLocation)
    ? posting.jobLocation
    : [posting.jobLocation];
  const names: string[] = [];
  for (const place of places) {
    if (!isRecord(place)) continue;
    const address = place.address;
    if (isRecord(address)) {
      const parts = [
        asText(address.addressLocality),
        asText(address.addressRegion),
        nameOf(address.addressCountry),
      ].filter((p): p is string => Boolean(p));
      if (parts.length > 0) names.push(parts.join(', '));
    } else {
      const name = asText(address) ?? asText(place.name);
      if (name) names.push(name);
    }
  }

  const remote = asText(posting.jobLocationType)?.toUpperCase() === 'TELECOMMUTE';
  const unique = Array.from(new Set(names));
  if (unique.length === 0) return remote ? 'Remote' : undefined;
  return remote ? `${unique.join('; ')} (Remote)` : unique.join('; ');
}

const jsonLdStrategy: ExtractionStrategy = {
  name: 'json-ld',
  extract({ root }) {
    for (const script of root.querySelectorAll('script[type="application/ld+json"]')) {
      let data: unknown;
      try {
        data = JSON.parse(script.rawText);
      } catch {
        continue; // malformed block; try the next one
      }
      const posting = findJobPosting(data);
      if (!posting) continue;
      return {
        title: asText(posting.title) ?? asText(posting.name),
        company: nameOf(posting.hiringOrganization),
        location: jsonLdLocation(posting),
        description:
          typeof posting.description === 'string' ? htmlToText(posting.description) : undefined,
        postedDate: asText(posting.datePosted),
      };
    }
    return {};
  },
};

// --- Microdata -----------------------------------------------------------

function itemValue(el: HTMLElement | null): string | undefined {
  if (!el) return undefined;
  return asText(el.getAttribute('content') ?? el.getAttribute('datetime') ?? el.text);
}

const microdataStrategy: ExtractionStrategy = {
  name: 'microdata',
  extract({ root }) {
    const scope = root.querySelector('[itemtype*="schema.org/JobPosting"]');
    if (!scope) return {};
    const prop = (name: string) => scope.querySelector(`[itemprop="${name}"]`);

    const organization = prop('hiringOrganization');
    const company = organization
      ? itemValue(organization.querySelector('[itemprop="name"]')) ?? itemValue(organization)
      : undefined;
    const locationParts = [itemValue(prop('addressLocality')), itemValue(prop('addressRegion'))].filter(
      (p): p is string => Boolean(p),
    );
    const descriptionEl = prop('description');

    return {
      title: itemValue(prop('title')),
      company,
      location: locationParts.length > 0 ? locationParts.join(', ') : undefined,
      description: descriptionEl ? htmlToText(descriptionEl.innerHTML) : undefined,
      postedDate: itemValue(prop('datePosted')),
    };
  },
};

// --- ATS page conventions ------------------------------------------------

/**
 * Greenhouse: <title>Job Application for {title} at {company}</title>
 * Lever: <title>{company} - {title}</title>, location under .posting-categories
 */
const atsPageStrategy: ExtractionStrategy = {
  name: 'ats-page',
  extract({ root, url }) {
    const pageTitle = collapseWhitespace(root.querySelector('title')?.text ?? '');
    const host = hostOf(url);

    if (host.endsWith('greenhouse.io') && /^job application for /i.test(pageTitle)) {
      return splitTitleAtCompany(pageTitle) ?? {};
    }

    if (host.endsWith('lever.co')) {
      const m = pageTitle.match(/^(.+?)\s+-\s+(.+)$/);
      return {
        company: m?.[1],
        title: bounded(root.querySelector('.posting-headline h2')?.text, MAX_TITLE_CHARS) ?? m?.[2],
        location: bounded(
          root.querySelector('.posting-categories .location')?.text,
          MAX_SHORT_FIELD_CHARS,
        ),
      };
    }

    return {};
  },
};

// --- Open Graph / meta ---------------------------------------------------

function metaContent(root: HTMLElement, key: string): string | undefined {
  const el =
    root.querySelector(`meta[property="${key}"]`) ?? root.querySelector(`meta[name="${key}"]`);
  return asText(el?.getAttribute('content'));
}

const openGraphStrategy: ExtractionStrategy = {
  name: 'open-graph',
  extract({ root }) {
    const ogTitle = metaContent(root, 'og:title') ?? metaContent(root, 'twitter:title');
    if (!ogTitle) return {};
    return splitTitleAtCompany(ogTitle) ?? { title: bounded(ogTitle, MAX_TITLE_CHARS) };
  },
};

const metaDescriptionStrategy: ExtractionStrategy = {
  name: 'meta-description',
  extract({ root }) {
    return {
      description: metaContent(root, 'og:description') ?? metaContent(root, 'description'),
    };
  },
};

// --- DOM selectors -------------------------------------------------------

function firstText(
  root: HTMLElement,
  selectors: readonly string[],
  maxChars: number,
): string | undefined {
  for (const selector of selectors) {
    for (const el of root.querySelectorAll(selector)) {
      const text = bounded(el.text, maxChars);
      if (text) return text;
    }
  }
  return undefined;
}

const TITLE_SELECTORS = ['h1', '.job-title', '[class*="title"]'];
const COMPANY_SELECTORS = ['.company-name', '.company', '[class*="companyName"]'];
const LOCATION_SELECTORS = ['.location', '[class*="location"]'];
const DESCRIPTION_SELECTORS = [
  '.job-description',
  '#job-description',
  '.description',
  '[class*="description"]',
  'article',
  'main',
];

const domSelectorStrategy: ExtractionStrategy = {
  name: 'dom-selectors',
  extract({ root }) {
    let description: string | undefined;
    for (const selector of DESCRIPTION_SELECTORS) {
      const el = root.querySelector(selector);
      const text = el ? htmlToText(el.innerHTML) : '';
      if (text) {
        description = text;
        break;
      }
    }
    return {
      title: firstText(root, TITLE_SELECTORS, MAX_TITLE_CHARS),
      company: firstText(root, COMPANY_SELECTORS, MAX_SHORT_FIELD_CHARS),
      location: firstText(root, LOCATION_SELECTORS, MAX_SHORT_FIELD_CHARS),
      description,
    };
  },
};

// --- Search result entry -------------------------------------------------

const BOARD_SUFFIX =
  /\s*(?:\||-|–|—)\s*(?:indeed(?:\.com)?|linkedin|glassdoor|ziprecruiter|dice|monster|usajobs|clearancejobs|built ?in\b.*)$/i;

/**
 * Parse a result title such as `Data Engineer - Acme - Arlington, VA | Indeed.com`
 * or LinkedIn's `Acme hiring Data Engineer in Arlington, VA | LinkedIn`.
 */
export function parseResultTitle(rawTitle: string): ExtractedFields {
  let text = collapseWhitespace(rawTitle).replace(BOARD_SUFFIX, '');
  const truncated = /(?:\.\.\.|…)$/.test(text);
  text = text.replace(/\s*(?:\.\.\.|…)$/, '');
  if (!text) return {};

  const linkedIn = text.match(/^(.+?) hiring (.+?) in (.+)$/i);
  if (linkedIn) return { company: linkedIn[1], title: linkedIn[2], location: linkedIn[3] };

  const parts = text
    .split(/\s+(?:-|–|—|\|)\s+/)
    .map((p) => p.trim())
    .filter(Boolean);
  if (truncated && parts.length > 1) parts.pop();

  if (parts.length >= 3) {
    return { title: parts[0], company: parts[1], location: parts.slice(2).join(', ') };
  }
  if (parts.length === 2) return { title: parts[0], company: parts[1] };
  return splitTitleAtCompany(text) ?? { title: text };
}

/** Google prefixes snippets with the posting age: `3 days ago — ...` */
const SNIPPET_DATE_PREFIX = /^(.{3,30}?\bago|[a-z]{3,9}\.? \d{1,2}, \d{4})\s*(?:—|-|·|\.\.\.)\s*/i;

const searchEntryStrategy: ExtractionStrategy = {
  name: 'search-entry',
  extract({ entry }) {
    const snippet = collapseWhitespace(entry.snippet);
    return {
      ...parseResultTitle(entry.title),
      description: snippet.replace(SNIPPET_DATE_PREFIX, '') || undefined,
      postedDate: snippet.match(SNIPPET_DATE_PREFIX)?.[1],
    };
  },
};

// --- URL -----------------------------------------------------------------

const urlStrategy: ExtractionStrategy = {
  name: 'url',
  extract({ url }) {
    return { company: companyFromUrl(url) ?? undefined };
  },
};

/** Strategy order is the precedence order when merging. */
export const EXTRACTION_STRATEGIES: readonly ExtractionStrategy[] = [
  jsonLdStrategy,
  microdataStrategy,
  atsPageStrategy,
  openGraphStrategy,
  domSelectorStrategy,
  metaDescriptionStrategy,
  searchEntryStrategy,
  urlStrategy,
];

/** First non-empty value per field wins. */
export function mergeExtracted(parts: readonly ExtractedFields[]): ExtractedFields {
  const merged: ExtractedFields = {};
  for (const field of FIELD_NAMES) {
    for (const part of parts) {
      const value = part[field]?.trim();
      if (value) {
        merged[field] = value;
        break;
      }
    }
  }
  return merged;
}

export interface ExtractOptions {
  scrapedAt: Date;
  strategies?: readonly ExtractionStrategy[];
}

/**
 * Extract a job from a fetched detail page. Throws ParseError when neither a
 * title nor a company is recoverable; other missing fields are left empty.
 */
export function extractJobDetail(
  html: string,
  entry: SearchResultEntry,
  options: ExtractOptions,
): DiscoveredJob {
  const root = parse(html);
  const input: ExtractionInput = { root, url: entry.url, entry };
  const parts = (options.strategies ?? EXTRACTION_STRATEGIES).map((s) => s.extract(input));
  const merged = mergeExtracted(parts);

  const title = merged.title ?? '';
  const company = merged.company ?? '';
  if (!title && !company) {
    throw new ParseError(`No title or company recoverable from ${entry.url}`, { url: entry.url });
  }

  // Earliest strategy whose date text actually parses.
  let postedDate: string | null = null;
  for (const part of parts) {
    postedDate = parsePostedDate(part.postedDate, options.scrapedAt);
    if (postedDate) break;
  }

  return {
    url: canonicalizeJobUrl(entry.url),
    title,
    company,
    location: merged.location ?? '',
    description: truncate(merged.description ?? '', MAX_DESCRIPTION_CHARS),
    postedDate,
    scrapedAt: options.scrapedAt,
  };
}
