import { setTimeout as sleep } from 'timers/promises';
import type {
  HttpInterceptor,
  Logger,
  NextHandler,
  PipelineRequest,
  PipelineResponse,
} from '@libs/http-client-core';
import {
  DEFAULT_RATE_LIMIT_HEADERS,
  computeDelayMs,
  pacingGapMs,
  parseRateLimitHeaders,
} from '../rateLimitState';
import type { RateLimitHeaderNames, RateLimitStateProvider } from '../types';

export const RATE_LIMIT_INTERCEPTOR = 'rate-limit';

export interface RateLimitInterceptorOptions {
  stateProvider: RateLimitStateProvider;
  headerNames?: Partial<RateLimitHeaderNames>;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

/**
 * Paces outbound requests against the quota window the API last advertised
 * and records the window from each response.
 *
 * Each call reserves its send slot before waiting, so requests issued
 * concurrently through the same interceptor queue up one gap apart instead of
 * leaving together.
 */
export function createRateLimitInterceptor(opts: RateLimitInterceptorOptions): HttpInterceptor {
  const { stateProvider, logger } = opts;
  const headerNames: RateLimitHeaderNames = { ...DEFAULT_RATE_LIMIT_HEADERS, ...opts.headerNames };
  const wait = opts.sleep ?? ((ms: number) => sleep(ms));
  const now = opts.now ?? Date.now;
  let nextSlotAt = 0;

  return {
    name: RATE_LIMIT_INTERCEPTOR,
    intercept: async (request: PipelineRequest, next: NextHandler): Promise<PipelineResponse> => {
      const state = await stateProvider.getState();
      const current = now();
      let delayMs = computeDelayMs(state, current);
      const gapMs = pacingGapMs(state);
      if (gapMs !== undefined) {
        // No await between reading and moving the reservation.
        const slotAt = Math.max(current + delayMs, nextSlotAt);
        nextSlotAt = slotAt + gapMs;
        delayMs = Math.ceil(slotAt - current);
      }
      if (delayMs > 0) {
        logger?.debug?.('crossref.rate_limit.wait', { url: request.url, delayMs });
        await wait(delayMs);
      }

      const sentAt = now();
      const response = await next(request);

      const observed = parseRateLimitHeaders(response.headers, headerNames);
      if (observed) {
        await stateProvider.setState({
          ...state,
          ...observed,
          lastRequestAt: sentAt,
          lastUpdated: now(),
        });
      } else if (state) {
        await stateProvider.setState({ ...state, lastRequestAt: sentAt });
      }

      return response;
    },
  };
}
