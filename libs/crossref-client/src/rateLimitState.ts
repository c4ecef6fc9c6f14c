import { z } from 'zod';
import type { CacheStore, HttpHeaders, Logger } from '@libs/http-client-core';
import type { RateLimitHeaderNames, RateLimitState, RateLimitStateProvider } from './types';

export const RATE_LIMIT_STATE_KEY = 'crossref-client:rate-limit-state';
const DEFAULT_STATE_TTL_SECONDS = 24 * 60 * 60;

export const DEFAULT_RATE_LIMIT_HEADERS: RateLimitHeaderNames = {
  limit: 'x-rate-limit-limit',
  interval: 'x-rate-limit-interval',
};

const rateLimitStateSchema = z.object({
  intervalMs: z.number().nonnegative().optional(),
  requestAllowance: z.number().int().positive().optional(),
  lastRequestAt: z.number().optional(),
  lastUpdated: z.number(),
});

export class InMemoryRateLimitStateProvider implements RateLimitStateProvider {
  private state: RateLimitState | undefined;

  async getState(): Promise<RateLimitState | undefined> {
    return this.state;
  }

  async setState(state: RateLimitState): Promise<void> {
    this.state = { ...state };
  }
}

interface CacheRateLimitStateProviderOptions {
  logger?: Logger;
  key?: string;
  ttlSeconds?: number;
}

/**
 * Shares the last observed quota window through a {@link CacheStore}, so every
 * process using the same store paces against the same numbers.
 *
 * Keeping the hint is best-effort: a failing or corrupt store falls back to the
 * copy held in memory and never fails the request.
 */
export class CacheRateLimitStateProvider implements RateLimitStateProvider {
  private readonly fallback = new InMemoryRateLimitStateProvider();
  private readonly key: string;
  private readonly ttlSeconds: number;
  private readonly logger?: Logger;

  constructor(
    private readonly cache: CacheStore,
    options: CacheRateLimitStateProviderOptions = {},
  ) {
    this.key = options.key ?? RATE_LIMIT_STATE_KEY;
    this.ttlSeconds = options.ttlSeconds ?? DEFAULT_STATE_TTL_SECONDS;
    this.logger = options.logger;
  }

  async getState(): Promise<RateLimitState | undefined> {
    let raw: string | undefined;
    try {
      raw = await this.cache.get(this.key);
    } catch (error) {
      this.logger?.warn?.('crossref.rate_limit.state.read_failed', {
        key: this.key,
        error: error instanceof Error ? error.message : error,
      });
      return this.fallback.getState();
    }

    if (raw === undefined) {
      return this.fallback.getState();
    }

    const parsed = parseStoredState(raw);
    if (!parsed) {
      this.logger?.warn?.('crossref.rate_limit.state.corrupt', { key: this.key });
      return this.fallback.getState();
    }
    return parsed;
  }

  async setState(state: RateLimitState): Promise<void> {
    await this.fallback.setState(state);
    try {
      await this.cache.set(this.key, JSON.stringify(state), this.ttlSeconds);
    } catch (error) {
      this.logger?.warn?.('crossref.rate_limit.state.write_failed', {
        key: this.key,
        error: error instanceof Error ? error.message : error,
      });
    }
  }
}

function parseStoredState(raw: string): RateLimitState | undefined {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return undefined;
  }
  const result = rateLimitStateSchema.safeParse(json);
  return result.success ? result.data : undefined;
}

export interface ParsedRateLimit {
  intervalMs?: number;
  requestAllowance?: number;
}

const INTERVAL_UNITS_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
};

/**
 * Parses an interval header value such as `1s`, `500ms` or `2m`.
 * A bare number is read as seconds.
 */
export function parseInterval(value: string): number | undefined {
  const match = /^\s*(\d+(?:\.\d+)?)\s*(ms|s|m|h)?\s*$/i.exec(value);
  if (!match) {
    return undefined;
  }
  const amount = Number(match[1]);
  const unit = (match[2] ?? 's').toLowerCase();
  const factor = INTERVAL_UNITS_MS[unit];
  if (factor === undefined) {
    return undefined;
  }
  return Math.round(amount * factor);
}

export function parseRateLimitHeaders(
  headers: HttpHeaders,
  names: RateLimitHeaderNames = DEFAULT_RATE_LIMIT_HEADERS,
): ParsedRateLimit | undefined {
  const result: ParsedRateLimit = {};

  const limitHeader = headers[names.limit.toLowerCase()];
  if (limitHeader !== undefined) {
    const limit = Number(limitHeader.trim());
    if (Number.isInteger(limit) && limit > 0) {
      result.requestAllowance = limit;
    }
  }

  const intervalHeader = headers[names.interval.toLowerCase()];
  if (intervalHeader !== undefined) {
    const intervalMs = parseInterval(intervalHeader);
    if (intervalMs !== undefined) {
      result.intervalMs = intervalMs;
    }
  }

  if (result.requestAllowance === undefined && result.intervalMs === undefined) {
    return undefined;
  }
  return result;
}

/** Minimum spacing between requests for the known window, if any. */
export function pacingGapMs(state: RateLimitState | undefined): number | undefined {
  if (!state || state.intervalMs === undefined || state.requestAllowance === undefined) {
    return undefined;
  }
  return state.intervalMs / state.requestAllowance;
}

/**
 * Milliseconds to wait before the next request so consecutive requests are at
 * least `intervalMs / requestAllowance` apart.
 */
export function computeDelayMs(state: RateLimitState | undefined, now: number): number {
  const gapMs = pacingGapMs(state);
  if (gapMs === undefined || state?.lastRequestAt === undefined) {
    return 0;
  }
  return Math.max(0, Math.ceil(state.lastRequestAt + gapMs - now));
}
