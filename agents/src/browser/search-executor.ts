/**
 * Search Executor - the single network egress point for discovery.
 *
 * Every request goes through the search/proxy service and through the shared
 * RateLimiter, so search queries and detail page fetches are serialized with
 * a minimum gap between them. Failures surface as FetchError.
 */

import { FetchError, createAbortError, errorMessage, type RateLimiter } from '@jobscout/core';
import { DATE_RANGE_TBS } from '../planner/query-builder.js';
import type { SearchQuery } from '../planner/types.js';
import type { FetchedDocument, SearchPayload } from './types.js';

export const DEFAULT_SCRAPERAPI_BASE_URL = 'https://api.scraperapi.com/';
const DEFAULT_TIMEOUT_MS = 60000;

export interface SearchExecutorOptions {
  /** Search service credential; requests fail with FetchError when absent. */
  apiKey: string | undefined;
  limiter: RateLimiter;
  baseUrl?: string;
  timeoutMs?: number;
}

export function buildGoogleSearchUrl(query: SearchQuery): string {
  const url = new URL('https://www.google.com/search');
  url.searchParams.set('q', query.text);
  url.searchParams.set('num', String(query.resultLimit));
  const tbs = DATE_RANGE_TBS[query.dateRange];
  if (tbs) url.searchParams.set('tbs', tbs);
  return url.toString();
}

export class SearchExecutor {
  private readonly apiKey: string | undefined;
  private readonly limiter: RateLimiter;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(options: SearchExecutorOptions) {
    this.apiKey = options.apiKey?.trim() || undefined;
    this.limiter = options.limiter;
    this.baseUrl = options.baseUrl ?? DEFAULT_SCRAPERAPI_BASE_URL;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  get hasCredential(): boolean {
    return this.apiKey !== undefined;
  }

  async search(query: SearchQuery, signal?: AbortSignal): Promise<SearchPayload> {
    const document = await this.fetchThroughProxy(buildGoogleSearchUrl(query), signal);
    return { ...document, query };
  }

  async fetchPage(url: string, signal?: AbortSignal): Promise<FetchedDocument> {
    return this.fetchThroughProxy(url, signal);
  }

  private proxyUrl(apiKey: string, targetUrl: string): string {
    const url = new URL(this.baseUrl);
    url.searchParams.set('api_key', apiKey);
    url.searchParams.set('url', targetUrl);
    return url.toString();
  }

  private async fetchThroughProxy(targetUrl: string, signal?: AbortSignal): Promise<FetchedDocument> {
    const apiKey = this.apiKey;
    if (!apiKey) {
      throw new FetchError('Search service credential is missing (set SCRAPERAPI_KEY)', {
        url: targetUrl,
      });
    }

    return this.limiter.schedule(async () => {
      const controller = new AbortController();
      let timedOut = false;
      const timeoutId = setTimeout(() => {
        timedOut = true;
        controller.abort();
      }, this.timeoutMs);
      const onAbort = () => controller.abort();
      signal?.addEventListener('abort', onAbort, { once: true });

      try {
        const response = await fetch(this.proxyUrl(apiKey, targetUrl), {
          signal: controller.signal,
        });

        if (response.status === 401 || response.status === 403) {
          throw new FetchError(`Search service rejected the credential (${response.status})`, {
            status: response.status,
            url: targetUrl,
          });
        }
        if (!response.ok) {
          throw new FetchError(`Search service returned ${response.status}`, {
            status: response.status,
            url: targetUrl,
          });
        }

        return {
          url: targetUrl,
          body: await response.text(),
          contentType: response.headers.get('content-type'),
        };
      } catch (err) {
        if (err instanceof FetchError) throw err;
        if (signal?.aborted) throw createAbortError();
        if (timedOut) {
          throw new FetchError(`Request timed out after ${this.timeoutMs}ms`, {
            url: targetUrl,
            cause: err,
          });
        }
        throw new FetchError(`Request failed: ${errorMessage(err)}`, { url: targetUrl, cause: err });
      } finally {
        clearTimeout(timeoutId);
        signal?.removeEventListener('abort', onAbort);
      }
    }, signal);
  }
}
