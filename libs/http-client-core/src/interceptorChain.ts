import type {
  HttpInterceptor,
  InterceptorPlacement,
  NextHandler,
  PipelineRequest,
  PipelineResponse,
} from './types';

/**
 * Ordered list of named interceptors.
 *
 * Registering an interceptor under a name that is already present replaces the
 * existing entry in its slot, so reconfiguring a client never stacks the same
 * behavior twice.
 *
 * @example
 * ```typescript
 * const chain = new InterceptorChain();
 * chain.use(userAgentInterceptor);
 * chain.use(rateLimitInterceptor);
 * chain.use(cacheInterceptor, { before: 'rate-limit' });
 *
 * const response = await chain.execute(request, sendOverTransport);
 * ```
 */
export class InterceptorChain {
  private interceptors: HttpInterceptor[] = [];

  use(interceptor: HttpInterceptor, placement: InterceptorPlacement = {}): this {
    const existing = this.indexOf(interceptor.name);
    if (existing !== -1) {
      this.interceptors.splice(existing, 1, interceptor);
      return this;
    }

    if (placement.before !== undefined) {
      const anchor = this.indexOf(placement.before);
      if (anchor !== -1) {
        this.interceptors.splice(anchor, 0, interceptor);
        return this;
      }
    }

    if (placement.after !== undefined) {
      const anchor = this.indexOf(placement.after);
      if (anchor !== -1) {
        this.interceptors.splice(anchor + 1, 0, interceptor);
        return this;
      }
    }

    this.interceptors.push(interceptor);
    return this;
  }

  remove(name: string): boolean {
    const index = this.indexOf(name);
    if (index === -1) {
      return false;
    }
    this.interceptors.splice(index, 1);
    return true;
  }

  has(name: string): boolean {
    return this.indexOf(name) !== -1;
  }

  names(): string[] {
    return this.interceptors.map((interceptor) => interceptor.name);
  }

  /**
   * Runs `request` through every interceptor and finally `terminal`.
   * The list is snapshotted first; changes made while a request is in flight
   * apply to the next call.
   */
  execute(request: PipelineRequest, terminal: NextHandler): Promise<PipelineResponse> {
    const snapshot = [...this.interceptors];

    const dispatch = (index: number, current: PipelineRequest): Promise<PipelineResponse> => {
      const interceptor = snapshot[index];
      if (!interceptor) {
        return terminal(current);
      }
      return interceptor.intercept(current, (next) => dispatch(index + 1, next));
    };

    return dispatch(0, request);
  }

  private indexOf(name: string): number {
    return this.interceptors.findIndex((interceptor) => interceptor.name === name);
  }
}
