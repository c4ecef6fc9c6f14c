export { CrossRefClient, createCrossRefClientFromEnv } from './crossRefClient';
export type { CrossRefClientSettings } from './crossRefClient';
export { CrossRefError, TransportError, DecodeError, ConfigurationError } from './errors';
export { BASE_URI, buildUri, appendQuery } from './uri';
export { encodeParameters, encodeFieldMap, FIELD_LIST_KEYS } from './parameters';
export {
  CacheRateLimitStateProvider,
  InMemoryRateLimitStateProvider,
  RATE_LIMIT_STATE_KEY,
  DEFAULT_RATE_LIMIT_HEADERS,
  computeDelayMs,
  pacingGapMs,
  parseInterval,
  parseRateLimitHeaders,
} from './rateLimitState';
export type { ParsedRateLimit } from './rateLimitState';
export {
  CACHE_INTERCEPTOR,
  DEFAULT_CACHE_TTL_SECONDS,
  cacheKeyFor,
  createResponseCacheInterceptor,
  parseCacheControl,
} from './interceptors/responseCache';
export type { CachedResponse, ResponseCacheOptions } from './interceptors/responseCache';
export { RATE_LIMIT_INTERCEPTOR, createRateLimitInterceptor } from './interceptors/rateLimit';
export type { RateLimitInterceptorOptions } from './interceptors/rateLimit';
export { USER_AGENT_INTERCEPTOR, composeUserAgent, createUserAgentInterceptor } from './interceptors/userAgent';
export { InMemoryCacheStore, RedisCacheStore, createRedisClient } from './cacheStores';
export type { RedisCommands, RedisCacheStoreOptions, RedisConnectionConfig } from './cacheStores';
export { CLIENT_NAME, CLIENT_VERSION, CLIENT_PRODUCT_TOKEN } from './version';
export type * from './types';
