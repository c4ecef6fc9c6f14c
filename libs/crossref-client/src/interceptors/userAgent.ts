import type { HttpInterceptor, NextHandler, PipelineRequest, PipelineResponse } from '@libs/http-client-core';
import { CLIENT_PRODUCT_TOKEN } from '../version';

export const USER_AGENT_INTERCEPTOR = 'user-agent';

export function composeUserAgent(
  callerUserAgent: string | undefined,
  transportUserAgent: string | undefined,
): string {
  return [callerUserAgent, CLIENT_PRODUCT_TOKEN, transportUserAgent]
    .map((part) => part?.trim() ?? '')
    .filter((part) => part.length > 0)
    .join(' ');
}

export function createUserAgentInterceptor(opts: {
  userAgent?: string;
  transportUserAgent?: string;
}): HttpInterceptor {
  const value = composeUserAgent(opts.userAgent, opts.transportUserAgent);

  return {
    name: USER_AGENT_INTERCEPTOR,
    intercept: (request: PipelineRequest, next: NextHandler): Promise<PipelineResponse> => {
      const headers = Object.fromEntries(
        Object.entries(request.headers).filter(([key]) => key.toLowerCase() !== 'user-agent'),
      );
      return next({ ...request, headers: { ...headers, 'User-Agent': value } });
    },
  };
}
