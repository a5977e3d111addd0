/**
 * Shared throttling and concurrency primitives.
 */

import { createAbortError, throwIfAborted } from './errors';

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(createAbortError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(createAbortError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export interface RateLimiterOptions {
  /** Minimum gap between the start of two consecutive calls. */
  minIntervalMs: number;
  now?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/**
 * Process-wide request throttle. Calls run one at a time in submission order
 * and each starts at least `minIntervalMs` after the previous one started.
 * One instance is owned by the entry point and injected wherever requests go out.
 */
export class RateLimiter {
  private readonly minIntervalMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private tail: Promise<void> = Promise.resolve();
  private lastStartedAt: number | null = null;

  constructor(options: RateLimiterOptions) {
    this.minIntervalMs = Math.max(0, options.minIntervalMs);
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? sleep;
  }

  schedule<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const run = this.tail.then(async () => {
      throwIfAborted(signal);
      if (this.lastStartedAt !== null) {
        const wait = this.lastStartedAt + this.minIntervalMs - this.now();
        if (wait > 0) await this.sleep(wait, signal);
      }
      this.lastStartedAt = this.now();
      return fn();
    });
    // The queue only tracks ordering; callers observe failures through `run`.
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}

/**
 * Runs `fn` over `items` with at most `limit` calls in flight. Results keep input order.
 * After the first rejection no further items start; the returned promise rejects with
 * that error once the calls already in flight have settled.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  let next = 0;
  const errors: unknown[] = [];
  const worker = async () => {
    while (errors.length === 0 && next < items.length) {
      const index = next++;
      try {
        results[index] = await fn(items[index], index);
      } catch (error) {
        errors.push(error);
      }
    }
  };
  const workers = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: workers }, worker));
  if (errors.length > 0) throw errors[0];
  return results;
}

/** Serializes async work per key; different keys run independently. */
export class KeyedMutex<K> {
  private readonly chains = new Map<K, Promise<void>>();

  async runExclusive<T>(key: K, fn: () => Promise<T>): Promise<T> {
    const previous = this.chains.get(key) ?? Promise.resolve();
    const run = previous.then(fn);
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.chains.set(key, tail);
    try {
      return await run;
    } finally {
      if (this.chains.get(key) === tail) this.chains.delete(key);
    }
  }

  isLocked(key: K): boolean {
    return this.chains.has(key);
  }
}
