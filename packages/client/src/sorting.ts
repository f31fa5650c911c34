export const SORT_BY_VALUES = ['default', 'hybrid', 'date', 'salary', 'relevance'] as const;
export const SORT_DIRECTIONS = ['up', 'down'] as const;

/** Ordering of search results. */
export type SortBy = (typeof SORT_BY_VALUES)[number];

/** Direction applied to the `sort_by` ordering. */
export type SortDirection = (typeof SORT_DIRECTIONS)[number];
