export interface Page<T> {
  items: T[];
  total: number;
  limit: number;
  offset: number;
}

export interface PageRequest {
  limit: number;
  offset: number;
}

/** Repository result before the caller attaches the paging window. */
export interface PageSlice<T> {
  items: T[];
  total: number;
}
