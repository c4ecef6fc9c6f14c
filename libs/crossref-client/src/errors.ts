import type { HttpHeaders } from '@libs/http-client-core';

export class CrossRefError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CrossRefError';
  }
}

/**
 * The HTTP exchange failed: either the API answered with a non-2xx status, or
 * no response arrived at all (network failure, timeout, abort), in which case
 * `status` is 0 and `cause` carries the underlying error.
 */
export class TransportError extends CrossRefError {
  readonly status: number;
  readonly body?: string;
  readonly headers?: HttpHeaders;

  constructor(
    message: string,
    options: { status: number; body?: string; headers?: HttpHeaders; cause?: unknown },
  ) {
    super(message, { cause: options.cause });
    this.name = 'TransportError';
    this.status = options.status;
    this.body = options.body;
    this.headers = options.headers;
  }
}

export class DecodeError extends CrossRefError {
  constructor(
    message: string,
    public readonly body: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'DecodeError';
  }
}

export class ConfigurationError extends CrossRefError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
