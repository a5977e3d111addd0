import { z } from 'zod';
import { dateRangeEnum } from './enums';

export const MAX_RESULTS_PER_SEARCH = 100;

const nonEmptyList = (label: string) =>
  z.array(z.string().trim().min(1)).min(1, `at least one ${label} is required`);

export const searchConfigSchema = z
  .object({
    keywords: nonEmptyList('keyword'),
    locations: nonEmptyList('location'),
    date_range: dateRangeEnum.default('past_week'),
    included_sites: z.array(z.string().trim().min(1)).default([]),
    min_salary: z.number().int().nonnegative().nullish(),
    max_salary: z.number().int().nonnegative().nullish(),
    experience_levels: z.array(z.string().trim().min(1)).default([]),
    results_per_search: z
      .number()
      .int()
      .positive()
      .default(10)
      .transform((n) => Math.min(n, MAX_RESULTS_PER_SEARCH)),
  })
  .refine((c) => c.min_salary == null || c.max_salary == null || c.min_salary <= c.max_salary, {
    message: 'min_salary must not exceed max_salary',
    path: ['min_salary'],
  });

export type SearchConfig = z.infer<typeof searchConfigSchema>;
export type SearchConfigInput = z.input<typeof searchConfigSchema>;
