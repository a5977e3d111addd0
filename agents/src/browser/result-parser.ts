/**
 * Result Parser - turns a raw search payload into candidate result entries.
 *
 * Accepts either the search service's structured JSON (`organic_results`)
 * or a Google results page. Entries without a resolvable URL are dropped,
 * the rest pass through the link filter and are de-duplicated by canonical URL.
 */

import { parse, type HTMLElement } from 'node-html-parser';
import { z } from 'zod';
import { canonicalizeJobUrl } from '@jobscout/core';
import { collapseWhitespace } from './html-text.js';
import { isJobResultLink } from './link-filter-agent.js';
import type { ResultFilterOptions, SearchResultEntry } from './types.js';

interface RawResult {
  url: string | null;
  title: string;
  snippet: string;
}

const organicResultSchema = z
  .object({
    link: z.string().optional(),
    url: z.string().optional(),
    title: z.string().optional(),
    snippet: z.string().optional(),
  })
  .passthrough();

const structuredPayloadSchema = z.union([
  z.object({ organic_results: z.array(organicResultSchema) }).passthrough(),
  z.array(organicResultSchema),
]);

const SNIPPET_SELECTORS = ['.VwiC3b', '[data-sncf]', '.IsZvec', '.st', '.aCOpRe'];

/**
 * Google wraps result links as `/url?q=<target>&sa=...`; unwrap those and
 * reject any other relative or non-http href.
 */
export function resolveResultHref(href: string | undefined): string | null {
  if (!href) return null;
  const trimmed = href.trim();
  if (trimmed.startsWith('/url?') || trimmed.startsWith('https://www.google.com/url?')) {
    const target = new URL(trimmed, 'https://www.google.com').searchParams;
    return resolveResultHref(target.get('q') ?? target.get('url') ?? undefined);
  }
  if (!/^https?:\/\//i.test(trimmed)) return null;
  try {
    return new URL(trimmed).toString();
  } catch {
    return null;
  }
}

function parseStructured(payload: string): RawResult[] | null {
  let json: unknown;
  try {
    json = JSON.parse(payload);
  } catch {
    return null;
  }
  const parsed = structuredPayloadSchema.safeParse(json);
  if (!parsed.success) return null;
  const items = Array.isArray(parsed.data) ? parsed.data : parsed.data.organic_results;
  return items.map((item) => ({
    url: resolveResultHref(item.link ?? item.url),
    title: collapseWhitespace(item.title ?? ''),
    snippet: collapseWhitespace(item.snippet ?? ''),
  }));
}

function findSnippet(anchor: HTMLElement): string {
  const container = anchor.closest('div.g') ?? anchor.parentNode?.parentNode ?? null;
  if (!container) return '';
  for (const selector of SNIPPET_SELECTORS) {
    const el = container.querySelector(selector);
    if (el) return collapseWhitespace(el.text);
  }
  return '';
}

function parseHtml(payload: string): RawResult[] {
  const root = parse(payload);
  const results: RawResult[] = [];
  for (const anchor of root.querySelectorAll('a')) {
    const heading = anchor.querySelector('h3');
    if (!heading) continue;
    results.push({
      url: resolveResultHref(anchor.getAttribute('href')),
      title: collapseWhitespace(heading.text),
      snippet: findSnippet(anchor),
    });
  }
  return results;
}

export function parseSearchResults(
  payload: string,
  options: ResultFilterOptions,
): SearchResultEntry[] {
  const trimmed = payload.trim();
  if (!trimmed) return [];

  const looksJson = trimmed.startsWith('{') || trimmed.startsWith('[');
  const raw = (looksJson ? parseStructured(trimmed) : null) ?? parseHtml(trimmed);

  const seen = new Set<string>();
  const entries: SearchResultEntry[] = [];
  for (const result of raw) {
    if (!result.url) continue;
    if (!isJobResultLink(result.url, options)) continue;
    const key = canonicalizeJobUrl(result.url);
    if (seen.has(key)) continue;
    seen.add(key);
    entries.push({
      url: result.url,
      title: result.title,
      snippet: result.snippet,
      position: entries.length + 1,
    });
  }
  return entries;
}
