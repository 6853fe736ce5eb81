export const FilterType = {
  All: 'all',
  Pending: 'pending',
  Completed: 'completed',
} as const;

export type FilterType = (typeof FilterType)[keyof typeof FilterType];

export const SortDirection = {
  Ascending: 'asc',
  Descending: 'desc',
} as const;

export type SortDirection = (typeof SortDirection)[keyof typeof SortDirection];

/** Parameters of the visible sequence. Never persisted. */
export interface ViewOptions {
  readonly filter: FilterType;
  readonly searchQuery: string;
  readonly sortDirection: SortDirection;
}

export const DEFAULT_VIEW: ViewOptions = {
  filter: FilterType.All,
  searchQuery: '',
  sortDirection: SortDirection.Ascending,
};
