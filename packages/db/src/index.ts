/**
 * @jobscout/db - jobs table, queries and the JobStore boundary
 */

export { getDb, closeDb, type Db } from './client';
export * from './schema';
export * from './jobs';
export { refreshedJobFields, toJob, type RefreshedJobFields } from './job-fields';
export { isDatabaseConnectionError, DATABASE_ERROR_MESSAGE } from './db-error';
export {
  createPgJobStore,
  DEFAULT_HIGH_MATCH_THRESHOLD,
  type JobStore,
  type UpsertResult,
} from './store';
