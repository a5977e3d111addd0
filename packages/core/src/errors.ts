/**
 * Error taxonomy shared by the discovery and scoring pipelines.
 *
 * Per-item errors (fetch, parse, score parse, a single failed write) are
 * counted and skipped. Configuration errors and lost database connections
 * end the run.
 */

export type JobScoutErrorCode =
  | 'FETCH_ERROR'
  | 'PARSE_ERROR'
  | 'SCORE_PARSE_ERROR'
  | 'CONFIG_ERROR'
  | 'STORE_ERROR'
  | 'NOT_FOUND';

export class JobScoutError extends Error {
  readonly code: JobScoutErrorCode;

  constructor(code: JobScoutErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'JobScoutError';
    this.code = code;
  }
}

/** Network failure, non-2xx response or a missing/rejected service credential. */
export class FetchError extends JobScoutError {
  readonly status: number | null;
  readonly url: string | null;

  constructor(message: string, options?: { status?: number; url?: string; cause?: unknown }) {
    super('FETCH_ERROR', message, { cause: options?.cause });
    this.name = 'FetchError';
    this.status = options?.status ?? null;
    this.url = options?.url ?? null;
  }
}

export class ParseError extends JobScoutError {
  readonly url: string | null;

  constructor(message: string, options?: { url?: string; cause?: unknown }) {
    super('PARSE_ERROR', message, { cause: options?.cause });
    this.name = 'ParseError';
    this.url = options?.url ?? null;
  }
}

/** The AI response carried no usable numeric score. */
export class ScoreParseError extends JobScoutError {
  readonly rawResponse: string;

  constructor(message: string, rawResponse: string) {
    super('SCORE_PARSE_ERROR', message);
    this.name = 'ScoreParseError';
    this.rawResponse = rawResponse;
  }
}

export class ConfigError extends JobScoutError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG_ERROR', message, options);
    this.name = 'ConfigError';
  }
}

export class StoreError extends JobScoutError {
  /** True when the database itself is unreachable, as opposed to one bad write. */
  readonly connection: boolean;

  constructor(message: string, options?: { connection?: boolean; cause?: unknown }) {
    super('STORE_ERROR', message, { cause: options?.cause });
    this.name = 'StoreError';
    this.connection = options?.connection ?? false;
  }
}

/** A job id given on the command line does not exist. */
export class NotFoundError extends JobScoutError {
  constructor(message: string) {
    super('NOT_FOUND', message);
    this.name = 'NotFoundError';
  }
}

export function isFatal(err: unknown): boolean {
  if (err instanceof ConfigError) return true;
  return err instanceof StoreError && err.connection;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function createAbortError(message = 'Cancelled'): Error {
  const err = new Error(message);
  err.name = 'AbortError';
  return err;
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) throw createAbortError();
}
