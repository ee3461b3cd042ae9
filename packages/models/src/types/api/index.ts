/**
 * Query parameters for list endpoints. `undefined`, `null` and empty strings
 * are dropped; arrays are repeated.
 */
export type QueryParams = Record<
  string,
  string | number | boolean | null | undefined | Array<string | number | boolean>
>;

export interface Paging {
  offset?: number;
  limit?: number;
  total?: number;
  page?: number;
  total_pages?: number;
}

/**
 * Response envelope returned by resource endpoints
 */
export interface ApiEnvelope<T> {
  data: T;
  paging?: Paging;
}

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/**
 * Fields every platform record may carry
 */
export interface RecordBase {
  id?: string;
  org?: string;
  user?: string;
  active?: boolean;
  tags?: string[];
  extensors?: Record<string, string>;
  external_id?: string;
}
