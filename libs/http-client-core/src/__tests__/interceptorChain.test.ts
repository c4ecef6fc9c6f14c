import { describe, expect, it, vi } from 'vitest';
import { InterceptorChain } from '../interceptorChain';
import type { HttpInterceptor, PipelineRequest, PipelineResponse } from '../types';

const baseRequest: PipelineRequest = {
  method: 'GET',
  url: 'https://api.example.com/items',
  headers: {},
};

const okResponse: PipelineResponse = { status: 200, headers: {}, body: '{}' };

const recording = (name: string, log: string[]): HttpInterceptor => ({
  name,
  intercept: async (request, next) => {
    log.push(`${name}:before`);
    const response = await next(request);
    log.push(`${name}:after`);
    return response;
  },
});

describe('InterceptorChain', () => {
  it('runs interceptors in registration order and unwinds in reverse', async () => {
    const log: string[] = [];
    const chain = new InterceptorChain().use(recording('a', log)).use(recording('b', log));

    const terminal = vi.fn(async () => {
      log.push('terminal');
      return okResponse;
    });

    await expect(chain.execute(baseRequest, terminal)).resolves.toEqual(okResponse);
    expect(log).toEqual(['a:before', 'b:before', 'terminal', 'b:after', 'a:after']);
  });

  it('passes the request as modified by earlier interceptors', async () => {
    const chain = new InterceptorChain().use({
      name: 'header',
      intercept: (request, next) => next({ ...request, headers: { ...request.headers, 'X-Test': '1' } }),
    });
    const terminal = vi.fn(async (_request: PipelineRequest) => okResponse);

    await chain.execute(baseRequest, terminal);

    expect(terminal).toHaveBeenCalledWith({ ...baseRequest, headers: { 'X-Test': '1' } });
  });

  it('lets an interceptor short-circuit the terminal handler', async () => {
    const cached: PipelineResponse = { status: 200, headers: {}, body: '"cached"' };
    const chain = new InterceptorChain().use({ name: 'cache', intercept: async () => cached });
    const terminal = vi.fn(async () => okResponse);

    await expect(chain.execute(baseRequest, terminal)).resolves.toBe(cached);
    expect(terminal).not.toHaveBeenCalled();
  });

  it('replaces an interceptor with the same name in its original slot', async () => {
    const log: string[] = [];
    const chain = new InterceptorChain()
      .use(recording('user-agent', log))
      .use(recording('cache', log))
      .use(recording('rate-limit', log));

    const replacement: HttpInterceptor = {
      name: 'cache',
      intercept: async (request, next) => {
        log.push('cache-v2');
        return next(request);
      },
    };
    chain.use(replacement);
    chain.use(replacement);

    expect(chain.names()).toEqual(['user-agent', 'cache', 'rate-limit']);

    await chain.execute(baseRequest, async () => okResponse);
    expect(log).toEqual([
      'user-agent:before',
      'cache-v2',
      'rate-limit:before',
      'rate-limit:after',
      'user-agent:after',
    ]);
  });

  it('inserts relative to an anchor and falls back to appending', () => {
    const log: string[] = [];
    const chain = new InterceptorChain().use(recording('first', log)).use(recording('last', log));

    chain.use(recording('middle', log), { before: 'last' });
    chain.use(recording('after-first', log), { after: 'first' });
    chain.use(recording('orphan', log), { before: 'missing' });

    expect(chain.names()).toEqual(['first', 'after-first', 'middle', 'last', 'orphan']);
  });

  it('removes interceptors by name', () => {
    const chain = new InterceptorChain().use(recording('a', [])).use(recording('b', []));

    expect(chain.remove('a')).toBe(true);
    expect(chain.remove('a')).toBe(false);
    expect(chain.has('a')).toBe(false);
    expect(chain.names()).toEqual(['b']);
  });

  it('does not apply changes made during a request to that request', async () => {
    const log: string[] = [];
    const chain = new InterceptorChain();
    chain.use({
      name: 'reconfigure',
      intercept: (request, next) => {
        chain.use(recording('late', log));
        return next(request);
      },
    });

    await chain.execute(baseRequest, async () => okResponse);
    expect(log).toEqual([]);

    await chain.execute(baseRequest, async () => okResponse);
    expect(log).toEqual(['late:before', 'late:after']);
  });
});
