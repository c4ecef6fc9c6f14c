import type { CacheStore, HttpTransport, Logger } from '@libs/http-client-core';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type QueryScalar = string | number | boolean;

/**
 * `filter` / `facet` entries keyed by name, e.g. `{ type: 'journal-article',
 * 'has-orcid': true }`. Insertion order is kept in the encoded value.
 */
export interface FieldMap {
  [name: string]: QueryScalar | readonly QueryScalar[] | undefined;
}

export type QueryValue = QueryScalar | readonly QueryScalar[] | FieldMap | null | undefined;

export type QueryParameters = Record<string, QueryValue>;

export interface RateLimitState {
  /** Length of the quota window in milliseconds. */
  intervalMs?: number;
  /** Requests allowed per window. */
  requestAllowance?: number;
  /** Epoch millis of the last request sent through the limiter. */
  lastRequestAt?: number;
  /** Epoch millis when the window values were last observed. */
  lastUpdated: number;
}

export interface RateLimitStateProvider {
  getState(): Promise<RateLimitState | undefined>;
  setState(state: RateLimitState): Promise<void>;
}

export interface RateLimitHeaderNames {
  limit: string;
  interval: string;
}

export interface RequestCallOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface CrossRefClientConfig {
  baseUri?: string;
  version?: string;
  /** Prepended to the client's own product token, e.g. `MyApp/1.0 (mailto:dev@example.org)`. */
  userAgent?: string;
  cache?: CacheStore;
  /** When set, `close()` disconnects `cache`. */
  ownsCache?: boolean;
  cacheTtlSeconds?: number;
  transport?: HttpTransport;
  /** Product token of the transport, appended last in the User-Agent header. */
  transportUserAgent?: string;
  logger?: Logger;
  timeoutMs?: number;
  rateLimitHeaders?: Partial<RateLimitHeaderNames>;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export interface PaginateOptions extends RequestCallOptions {
  maxPages?: number;
  maxItems?: number;
  /** Rows per page; sent as `rows`. */
  rows?: number;
}
