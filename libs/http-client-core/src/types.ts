export type HttpMethod = 'GET' | 'HEAD';

export type HttpHeaders = Record<string, string>;

/**
 * Key/value store used for response caching and shared client state.
 * Values are opaque strings; `ttlSeconds` is an upper bound on how long the
 * store keeps them.
 */
export interface CacheStore {
  get(key: string): Promise<string | undefined>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  delete?(key: string): Promise<void>;
  /** Releases any connection the store holds. */
  disconnect?(): Promise<void>;
}

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug?(message: string, meta?: LogMeta): void;
  info?(message: string, meta?: LogMeta): void;
  warn?(message: string, meta?: LogMeta): void;
  error?(message: string, meta?: LogMeta): void;
}

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: HttpHeaders;
}

export interface RawHttpResponse {
  status: number;
  headers: HttpHeaders;
  body: ArrayBuffer;
}

/**
 * Performs a single HTTP exchange. Implementations must honour `signal`.
 */
export interface HttpTransport {
  (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse>;
}

export interface PipelineRequest {
  method: HttpMethod;
  url: string;
  headers: HttpHeaders;
  signal?: AbortSignal;
}

/**
 * Response as seen by interceptors. Header names are lower-cased and the body
 * is decoded text, so a response can be stored and replayed as-is.
 */
export interface PipelineResponse {
  status: number;
  headers: HttpHeaders;
  body: string;
}

export type NextHandler = (request: PipelineRequest) => Promise<PipelineResponse>;

/**
 * A named step wrapped around the outbound call.
 *
 * Interceptors run in registration order on the way out and unwind in reverse.
 * An interceptor may short-circuit by returning without calling `next`.
 */
export interface HttpInterceptor {
  readonly name: string;
  intercept(request: PipelineRequest, next: NextHandler): Promise<PipelineResponse>;
}

export interface InterceptorPlacement {
  before?: string;
  after?: string;
}
