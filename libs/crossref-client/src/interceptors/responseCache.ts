import { createHash } from 'crypto';
import { z } from 'zod';
import type {
  CacheStore,
  HttpHeaders,
  HttpInterceptor,
  Logger,
  NextHandler,
  PipelineRequest,
  PipelineResponse,
} from '@libs/http-client-core';

export const CACHE_INTERCEPTOR = 'cache';
export const DEFAULT_CACHE_TTL_SECONDS = 1200;
const CACHE_KEY_PREFIX = 'crossref-client:response:';

const cacheEntrySchema = z.object({
  status: z.number().int(),
  headers: z.record(z.string()),
  body: z.string(),
  storedAt: z.number(),
  expiresAt: z.number(),
});

export type CachedResponse = z.infer<typeof cacheEntrySchema>;

export interface ResponseCacheOptions {
  cache: CacheStore;
  ttlSeconds?: number;
  logger?: Logger;
  now?: () => number;
}

/**
 * Cache key for a request: method plus URL with query parameters sorted by
 * name, so parameter order does not split the cache.
 */
export function cacheKeyFor(request: Pick<PipelineRequest, 'method' | 'url'>): string {
  const digest = createHash('sha256')
    .update(`${request.method} ${normalizeUrl(request.url)}`)
    .digest('hex');
  return `${CACHE_KEY_PREFIX}${digest}`;
}

function normalizeUrl(raw: string): string {
  try {
    const url = new URL(raw);
    url.searchParams.sort();
    url.hash = '';
    return url.toString();
  } catch {
    return raw;
  }
}

interface CacheControl {
  noStore: boolean;
  noCache: boolean;
  isPrivate: boolean;
  maxAge?: number;
}

export function parseCacheControl(value: string | undefined): CacheControl {
  const directives: CacheControl = { noStore: false, noCache: false, isPrivate: false };
  if (!value) {
    return directives;
  }
  for (const token of value.split(',')) {
    const [rawName, rawArg] = token.split('=', 2);
    const name = rawName?.trim().toLowerCase();
    if (name === 'no-store') directives.noStore = true;
    else if (name === 'no-cache') directives.noCache = true;
    else if (name === 'private') directives.isPrivate = true;
    else if (name === 'max-age' && rawArg !== undefined) {
      const seconds = Number(rawArg.trim().replace(/^"|"$/g, ''));
      if (Number.isInteger(seconds) && seconds >= 0) {
        directives.maxAge = seconds;
      }
    }
  }
  return directives;
}

function headerValue(headers: HttpHeaders, name: string): string | undefined {
  const lower = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === lower) {
      return value;
    }
  }
  return undefined;
}

/**
 * Greedy response cache for GET requests.
 *
 * Every successful GET is stored for `ttlSeconds` unless the response opts out
 * with `no-store` or `private`; a smaller `max-age` shortens the lifetime.
 * A request sent with `Cache-Control: no-cache` skips the lookup but still
 * refreshes the stored copy.
 */
export function createResponseCacheInterceptor(opts: ResponseCacheOptions): HttpInterceptor {
  const ttlSeconds = opts.ttlSeconds ?? DEFAULT_CACHE_TTL_SECONDS;
  const now = opts.now ?? Date.now;
  const { cache, logger } = opts;

  const lookup = async (key: string, request: PipelineRequest): Promise<PipelineResponse | undefined> => {
    let raw: string | undefined;
    try {
      raw = await cache.get(key);
    } catch (error) {
      logger?.warn?.('crossref.cache.get.error', {
        url: request.url,
        error: error instanceof Error ? error.message : error,
      });
      return undefined;
    }
    if (raw === undefined) {
      return undefined;
    }

    const entry = decodeEntry(raw);
    if (!entry) {
      logger?.warn?.('crossref.cache.entry.corrupt', { url: request.url });
      return undefined;
    }
    if (entry.expiresAt <= now()) {
      return undefined;
    }
    return { status: entry.status, headers: entry.headers, body: entry.body };
  };

  const store = async (key: string, request: PipelineRequest, response: PipelineResponse): Promise<void> => {
    const lifetime = storableLifetime(response, ttlSeconds);
    if (lifetime <= 0) {
      return;
    }
    const storedAt = now();
    const entry: CachedResponse = {
      status: response.status,
      headers: response.headers,
      body: response.body,
      storedAt,
      expiresAt: storedAt + lifetime * 1000,
    };
    try {
      await cache.set(key, JSON.stringify(entry), lifetime);
    } catch (error) {
      logger?.warn?.('crossref.cache.set.error', {
        url: request.url,
        error: error instanceof Error ? error.message : error,
      });
    }
  };

  return {
    name: CACHE_INTERCEPTOR,
    intercept: async (request: PipelineRequest, next: NextHandler): Promise<PipelineResponse> => {
      if (request.method !== 'GET') {
        return next(request);
      }

      const requestDirectives = parseCacheControl(headerValue(request.headers, 'cache-control'));
      const key = cacheKeyFor(request);

      if (!requestDirectives.noCache && !requestDirectives.noStore) {
        const hit = await lookup(key, request);
        if (hit) {
          logger?.debug?.('crossref.cache.hit', { url: request.url });
          return hit;
        }
      }

      const response = await next(request);
      if (!requestDirectives.noStore) {
        await store(key, request, response);
      }
      return response;
    },
  };
}

function storableLifetime(response: PipelineResponse, ttlSeconds: number): number {
  if (response.status < 200 || response.status >= 300) {
    return 0;
  }
  const directives = parseCacheControl(response.headers['cache-control']);
  if (directives.noStore || directives.isPrivate) {
    return 0;
  }
  if (directives.maxAge !== undefined) {
    return Math.min(directives.maxAge, ttlSeconds);
  }
  return ttlSeconds;
}

function decodeEntry(raw: string): CachedResponse | undefined {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return undefined;
  }
  const result = cacheEntrySchema.safeParse(json);
  return result.success ? result.data : undefined;
}
