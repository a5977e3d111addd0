/**
 * @jobscout/core - errors, URL identity and throttling shared by every package
 */

export {
  JobScoutError,
  FetchError,
  ParseError,
  ScoreParseError,
  ConfigError,
  StoreError,
  NotFoundError,
  isFatal,
  errorMessage,
  createAbortError,
  isAbortError,
  throwIfAborted,
  type JobScoutErrorCode,
} from './errors';
export { canonicalizeJobUrl } from './dedupe';
export {
  fingerprintFromUrl,
  companyFromUrl,
  humanizeSlug,
  type AtsType,
  type FingerprintResult,
} from './fingerprint';
export {
  RateLimiter,
  KeyedMutex,
  mapWithConcurrency,
  sleep,
  type RateLimiterOptions,
} from './throttle';
