export {
  apiExceptionSchema,
  versionSchema,
  categorySchema,
  categoriesSchema,
  companySchema,
  topCompaniesSchema,
  historicalSalarySchema,
  salaryHistogramSchema,
  locationDetailSchema,
  locationJobsSchema,
  jobGeoDataSchema,
  jobSchema,
  jobSearchResultsSchema,
} from './schema.js';
export type {
  ApiException,
  Version,
  Category,
  Categories,
  Company,
  TopCompanies,
  HistoricalSalary,
  SalaryHistogram,
  LocationDetail,
  LocationJobs,
  JobGeoData,
  Job,
  JobSearchResults,
  ContractType,
  ContractTime,
} from './schema.js';
