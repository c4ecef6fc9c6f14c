import { z } from 'zod';
import {
  FETCH_TRANSPORT_USER_AGENT,
  InterceptorChain,
  fetchTransport,
} from '@libs/http-client-core';
import type {
  CacheStore,
  HttpHeaders,
  HttpMethod,
  HttpTransport,
  Logger,
  PipelineRequest,
  PipelineResponse,
} from '@libs/http-client-core';
import { createRedisClient, RedisCacheStore } from './cacheStores';
import { ConfigurationError, DecodeError, TransportError } from './errors';
import {
  CACHE_INTERCEPTOR,
  DEFAULT_CACHE_TTL_SECONDS,
  createResponseCacheInterceptor,
} from './interceptors/responseCache';
import { RATE_LIMIT_INTERCEPTOR, createRateLimitInterceptor } from './interceptors/rateLimit';
import { USER_AGENT_INTERCEPTOR, createUserAgentInterceptor } from './interceptors/userAgent';
import { encodeParameters } from './parameters';
import { CacheRateLimitStateProvider, InMemoryRateLimitStateProvider } from './rateLimitState';
import type {
  CrossRefClientConfig,
  JsonObject,
  JsonValue,
  PaginateOptions,
  QueryParameters,
  RateLimitStateProvider,
  RequestCallOptions,
} from './types';
import { BASE_URI, appendQuery, buildUri } from './uri';

const DEFAULT_TIMEOUT_MS = 30_000;

const versionSchema = z
  .string()
  .regex(/^[A-Za-z0-9._-]+$/, 'version must be a single path segment such as "v1"');
const ttlSecondsSchema = z.number().int('cache TTL must be a whole number of seconds').positive('cache TTL must be positive');
const timeoutMsSchema = z.number().int().nonnegative('timeout must not be negative');
const baseUriSchema = z.string().url('base URI must be an absolute URL');

function validate<T>(schema: z.ZodType<T>, value: unknown, label: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => issue.message);
    throw new ConfigurationError(`Invalid ${label}: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

export interface CrossRefClientSettings {
  baseUri: string;
  version?: string;
  userAgent?: string;
  cacheTtlSeconds: number;
  cacheEnabled: boolean;
  timeoutMs: number;
  interceptors: string[];
}

/**
 * Client for the Crossref REST API.
 *
 * Every call goes through an ordered interceptor chain:
 * `user-agent` → `cache` (when configured) → `rate-limit` → transport.
 *
 * @example
 * ```typescript
 * const client = new CrossRefClient({ userAgent: 'MyApp/1.0 (mailto:dev@example.org)' });
 * client.setCache(new InMemoryCacheStore());
 *
 * const works = await client.request('works', { filter: { type: 'journal-article' }, rows: 5 });
 * const found = await client.exists('works/10.5555/12345678');
 * ```
 *
 * The setters are not synchronised. An instance shared between concurrent
 * callers must not be reconfigured while requests are being issued.
 */
export class CrossRefClient {
  private readonly baseUri: string;
  private readonly transport: HttpTransport;
  private readonly transportUserAgent: string;
  private readonly timeoutMs: number;
  private readonly logger?: Logger;
  private readonly pipeline = new InterceptorChain();
  private readonly memoryRateLimitState = new InMemoryRateLimitStateProvider();

  private version?: string;
  private userAgent?: string;
  private cache?: CacheStore;
  private ownedCache?: CacheStore;
  private cacheTtlSeconds = DEFAULT_CACHE_TTL_SECONDS;

  constructor(private readonly config: CrossRefClientConfig = {}) {
    this.baseUri = validate(baseUriSchema, config.baseUri ?? BASE_URI, 'base URI');
    this.transport = config.transport ?? fetchTransport;
    this.transportUserAgent = config.transportUserAgent ?? FETCH_TRANSPORT_USER_AGENT;
    this.timeoutMs = validate(timeoutMsSchema, config.timeoutMs ?? DEFAULT_TIMEOUT_MS, 'timeout');
    this.logger = config.logger;

    this.setUserAgent(config.userAgent);
    this.setVersion(config.version);
    if (config.cache) {
      this.ownedCache = config.ownsCache ? config.cache : undefined;
      this.setCache(config.cache, config.cacheTtlSeconds);
    } else {
      if (config.cacheTtlSeconds !== undefined) {
        this.cacheTtlSeconds = validate(ttlSecondsSchema, config.cacheTtlSeconds, 'cache TTL');
      }
      this.installRateLimit(this.memoryRateLimitState);
    }
  }

  // ---------------------------------------------------------------------------
  // Configuration
  // ---------------------------------------------------------------------------

  /**
   * Sets the caller's product token, sent ahead of the client's own token.
   * Crossref routes requests that include a `mailto:` contact to its polite pool.
   */
  setUserAgent(value?: string): void {
    this.userAgent = value?.trim() || undefined;
    this.pipeline.use(
      createUserAgentInterceptor({
        userAgent: this.userAgent,
        transportUserAgent: this.transportUserAgent,
      }),
      { before: CACHE_INTERCEPTOR },
    );
  }

  /**
   * Enables response caching through `cache`, replacing any previous cache.
   * The same store then also carries the rate-limit state. Pass `null` to turn
   * caching off; the TTL then reverts to the default.
   */
  setCache(cache: CacheStore | null, ttlSeconds: number = DEFAULT_CACHE_TTL_SECONDS): void {
    const ttl = validate(ttlSecondsSchema, ttlSeconds, 'cache TTL');

    if (cache === null) {
      this.cache = undefined;
      this.cacheTtlSeconds = DEFAULT_CACHE_TTL_SECONDS;
      this.pipeline.remove(CACHE_INTERCEPTOR);
      this.installRateLimit(this.memoryRateLimitState);
      return;
    }

    this.cache = cache;
    this.cacheTtlSeconds = ttl;
    this.pipeline.use(
      createResponseCacheInterceptor({
        cache,
        ttlSeconds: ttl,
        logger: this.logger,
        now: this.config.now,
      }),
      { after: USER_AGENT_INTERCEPTOR },
    );
    this.installRateLimit(new CacheRateLimitStateProvider(cache, { logger: this.logger }));
  }

  /** Sets the version segment prepended to relative paths; `undefined` clears it. */
  setVersion(value?: string): void {
    this.version = value === undefined ? undefined : validate(versionSchema, value, 'API version');
  }

  getSettings(): CrossRefClientSettings {
    return {
      baseUri: this.baseUri,
      version: this.version,
      userAgent: this.userAgent,
      cacheTtlSeconds: this.cacheTtlSeconds,
      cacheEnabled: this.cache !== undefined,
      timeoutMs: this.timeoutMs,
      interceptors: this.pipeline.names(),
    };
  }

  /**
   * Disconnects the cache store the client was created with when it owns it,
   * as `createCrossRefClientFromEnv` does for Redis. Caching is turned off if
   * that store is still in use. Safe to call more than once.
   */
  async close(): Promise<void> {
    const owned = this.ownedCache;
    this.ownedCache = undefined;
    if (!owned) {
      return;
    }
    if (this.cache === owned) {
      this.setCache(null);
    }
    await owned.disconnect?.();
  }

  private installRateLimit(stateProvider: RateLimitStateProvider): void {
    this.pipeline.use(
      createRateLimitInterceptor({
        stateProvider,
        headerNames: this.config.rateLimitHeaders,
        logger: this.logger,
        sleep: this.config.sleep,
        now: this.config.now,
      }),
    );
  }

  // ---------------------------------------------------------------------------
  // Public HTTP helpers
  // ---------------------------------------------------------------------------

  /**
   * GETs `path` and returns the decoded JSON body.
   *
   * @throws {TransportError} on a non-2xx status or when no response arrives
   * @throws {DecodeError} when the body is not valid JSON
   */
  async request(
    path: string,
    parameters: QueryParameters = {},
    options: RequestCallOptions = {},
  ): Promise<JsonValue> {
    const url = appendQuery(buildUri(path, this.version, this.baseUri), encodeParameters(parameters));
    const response = await this.send('GET', url, { Accept: 'application/json' }, options);

    if (!isSuccessStatus(response.status)) {
      throw responseError('GET', url, response);
    }
    return decodeJson(response.body);
  }

  /**
   * HEADs `path`. A 404 answers `false`; every other failure is thrown.
   */
  async exists(path: string, options: RequestCallOptions = {}): Promise<boolean> {
    const url = buildUri(path, this.version, this.baseUri);
    const response = await this.send('HEAD', url, {}, options);

    if (response.status === 404) {
      return false;
    }
    if (!isSuccessStatus(response.status)) {
      throw responseError('HEAD', url, response);
    }
    return response.status === 200;
  }

  /**
   * Walks a list endpoint with deep-paging cursors, yielding each entry of
   * `message.items`. Stops on an empty page, a missing `next-cursor`, or when
   * `maxPages` / `maxItems` is reached.
   */
  async *paginate(
    path: string,
    parameters: QueryParameters = {},
    options: PaginateOptions = {},
  ): AsyncGenerator<JsonValue, void, undefined> {
    const { maxPages, maxItems, rows, ...callOptions } = options;
    let cursor: string | undefined = '*';
    let pages = 0;
    let yielded = 0;

    while (cursor !== undefined) {
      const page = await this.request(
        path,
        { ...parameters, ...(rows !== undefined ? { rows } : undefined), cursor },
        callOptions,
      );
      pages += 1;

      const message = isJsonObject(page) ? page.message : undefined;
      const items = isJsonObject(message) && Array.isArray(message.items) ? message.items : [];
      for (const item of items) {
        yield item;
        yielded += 1;
        if (maxItems !== undefined && yielded >= maxItems) {
          return;
        }
      }

      if (items.length === 0 || (maxPages !== undefined && pages >= maxPages)) {
        return;
      }
      const next = isJsonObject(message) ? message['next-cursor'] : undefined;
      cursor = typeof next === 'string' && next.length > 0 ? next : undefined;
    }
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private send(
    method: HttpMethod,
    url: string,
    headers: HttpHeaders,
    options: RequestCallOptions,
  ): Promise<PipelineResponse> {
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    this.logger?.debug?.('crossref.request', { method, url });

    const request: PipelineRequest = { method, url, headers, signal: options.signal };
    return this.pipeline.execute(request, (prepared) => this.executeHttp(prepared, timeoutMs));
  }

  private async executeHttp(request: PipelineRequest, timeoutMs: number): Promise<PipelineResponse> {
    const controller = new AbortController();
    const upstream = request.signal;
    const abortHandler = () => controller.abort(upstream?.reason);

    if (upstream) {
      if (upstream.aborted) {
        controller.abort(upstream.reason);
      } else {
        upstream.addEventListener('abort', abortHandler);
      }
    }

    let timedOut = false;
    const timeoutId =
      timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true;
            controller.abort();
          }, timeoutMs)
        : undefined;

    try {
      const raw = await this.transport(
        { method: request.method, url: request.url, headers: request.headers },
        controller.signal,
      );
      return {
        status: raw.status,
        // Injected transports may use any header case.
        headers: lowerCaseHeaders(raw.headers),
        body: new TextDecoder().decode(raw.body),
      };
    } catch (error) {
      const reason = timedOut
        ? `timed out after ${timeoutMs}ms`
        : error instanceof Error
          ? error.message
          : 'network error';
      this.logger?.warn?.('crossref.transport.error', { method: request.method, url: request.url, reason });
      throw new TransportError(`Crossref ${request.method} ${request.url} failed: ${reason}`, {
        status: 0,
        cause: error,
      });
    } finally {
      clearTimeout(timeoutId);
      upstream?.removeEventListener('abort', abortHandler);
    }
  }
}

function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function lowerCaseHeaders(headers: HttpHeaders): HttpHeaders {
  const result: HttpHeaders = {};
  for (const [key, value] of Object.entries(headers)) {
    result[key.toLowerCase()] = value;
  }
  return result;
}

function responseError(method: HttpMethod, url: string, response: PipelineResponse): TransportError {
  return new TransportError(`Crossref ${method} ${url} responded with status ${response.status}`, {
    status: response.status,
    body: response.body,
    headers: response.headers,
  });
}

function decodeJson(body: string): JsonValue {
  try {
    return JSON.parse(body);
  } catch (error) {
    throw new DecodeError(
      `Failed to parse JSON response: ${error instanceof Error ? error.message : String(error)}`,
      body,
      { cause: error },
    );
  }
}

function parseOptionalNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Builds a client from `CROSSREF_*` environment variables, with `overrides`
 * applied last. When `REDIS_HOST` is set and no cache is passed in, responses
 * are cached in Redis; call `close()` on the client to release the connection.
 */
export function createCrossRefClientFromEnv(
  overrides: CrossRefClientConfig = {},
  env: NodeJS.ProcessEnv = process.env,
): CrossRefClient {
  let cache = overrides.cache;
  let ownsCache = overrides.ownsCache;
  const redisHost = nonEmpty(env.REDIS_HOST);
  if (!cache && redisHost) {
    const redis = createRedisClient(
      {
        host: redisHost,
        port: parseOptionalNumber(env.REDIS_PORT) ?? 6379,
        password: nonEmpty(env.REDIS_PASSWORD),
      },
      overrides.logger,
    );
    cache = new RedisCacheStore(redis, { namespace: 'crossref', logger: overrides.logger });
    ownsCache = true;
  }

  return new CrossRefClient({
    ...overrides,
    baseUri: overrides.baseUri ?? nonEmpty(env.CROSSREF_BASE_URL) ?? BASE_URI,
    version: overrides.version ?? nonEmpty(env.CROSSREF_API_VERSION),
    userAgent: overrides.userAgent ?? nonEmpty(env.CROSSREF_USER_AGENT),
    cache,
    ownsCache,
    cacheTtlSeconds:
      overrides.cacheTtlSeconds ??
      parseOptionalNumber(env.CROSSREF_CACHE_TTL_SECONDS) ??
      DEFAULT_CACHE_TTL_SECONDS,
    timeoutMs: overrides.timeoutMs ?? parseOptionalNumber(env.CROSSREF_TIMEOUT_MS) ?? DEFAULT_TIMEOUT_MS,
  });
}
