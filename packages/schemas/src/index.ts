/**
 * @jobscout/schemas - shared zod schemas and the types inferred from them
 */

export * from './enums';
export * from './job';
export * from './search-config';
export type { TaskSnapshot } from './task';
