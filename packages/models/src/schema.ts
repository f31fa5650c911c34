import { z } from 'zod';

const CONTRACT_TYPES = ['permanent', 'contract'] as const;
const CONTRACT_TIMES = ['full_time', 'part_time'] as const;

/**
 * Optional string restricted to a known set. Values outside the set decode to
 * undefined instead of failing the whole job record.
 */
function knownValue<const T extends readonly string[]>(values: T) {
  return z
    .string()
    .optional()
    .transform((value): T[number] | undefined =>
      values.find((candidate): candidate is T[number] => candidate === value),
    );
}

export const apiExceptionSchema = z.object({
  exception: z.string(),
  doc: z.string(),
  display: z.string(),
});

export const versionSchema = z.object({
  api_version: z.number(),
  software_version: z.string(),
});

export const categorySchema = z.object({
  tag: z.string(),
  label: z.string(),
});

export const categoriesSchema = z.object({
  results: z.array(categorySchema),
});

export const companySchema = z.object({
  display_name: z.string().optional(),
  canonical_name: z.string().optional(),
  count: z.number().optional(),
  average_salary: z.number().optional(),
});

export const topCompaniesSchema = z.object({
  leaderboard: z.array(companySchema).optional(),
});

export const historicalSalarySchema = z.object({
  month: z.record(z.string(), z.number()).optional(),
});

export const salaryHistogramSchema = z.object({
  histogram: z.record(z.string(), z.number()).optional(),
});

export const locationDetailSchema = z.object({
  area: z.array(z.string()).optional(),
  display_name: z.string().optional(),
});

export const locationJobsSchema = z.object({
  count: z.number().optional(),
  location: locationDetailSchema.optional(),
});

export const jobGeoDataSchema = z.object({
  locations: z.array(locationJobsSchema).optional(),
});

export const jobSchema = z.object({
  id: z.union([z.string(), z.number().finite()]).transform((value) => String(value)),
  created: z.string(),
  title: z.string(),
  description: z.string(),
  redirect_url: z.string(),
  adref: z.string().optional(),
  latitude: z.number().optional(),
  longitude: z.number().optional(),
  category: categorySchema,
  location: locationDetailSchema,
  company: companySchema,
  salary_min: z.number().optional(),
  salary_max: z.number().optional(),
  // Sent as "1" / "0", not as a JSON boolean.
  salary_is_predicted: z
    .string()
    .optional()
    .transform((value) => (value === undefined ? undefined : value === '1')),
  contract_type: knownValue(CONTRACT_TYPES),
  contract_time: knownValue(CONTRACT_TIMES),
});

export const jobSearchResultsSchema = z.object({
  results: z.array(jobSchema),
  count: z.number(),
  mean: z.number().optional(),
});

export type ApiException = z.infer<typeof apiExceptionSchema>;
export type Version = z.infer<typeof versionSchema>;
export type Category = z.infer<typeof categorySchema>;
export type Categories = z.infer<typeof categoriesSchema>;
export type Company = z.infer<typeof companySchema>;
export type TopCompanies = z.infer<typeof topCompaniesSchema>;
export type HistoricalSalary = z.infer<typeof historicalSalarySchema>;
export type SalaryHistogram = z.infer<typeof salaryHistogramSchema>;
export type LocationDetail = z.infer<typeof locationDetailSchema>;
export type LocationJobs = z.infer<typeof locationJobsSchema>;
export type JobGeoData = z.infer<typeof jobGeoDataSchema>;
export type Job = z.infer<typeof jobSchema>;
export type JobSearchResults = z.infer<typeof jobSearchResultsSchema>;
export type ContractType = (typeof CONTRACT_TYPES)[number];
export type ContractTime = (typeof CONTRACT_TIMES)[number];
