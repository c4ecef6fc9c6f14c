import type { HttpHeaders, HttpTransport } from '../types';

/** Product token of the Node runtime, sent after the client's own token. */
export const FETCH_TRANSPORT_USER_AGENT = `node/${process.versions.node}`;

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

/**
 * Transport over a WHATWG `fetch`. Header names come back lower-cased and the
 * body is read in full, so callers never touch the `Response` object.
 */
export function createFetchTransport(fetchFn: FetchFn = (url, init) => fetch(url, init)): HttpTransport {
  return async (req, signal) => {
    const response = await fetchFn(req.url, { method: req.method, headers: req.headers, signal });
    const body = await response.arrayBuffer();

    const headers: HttpHeaders = {};
    response.headers.forEach((value, name) => {
      headers[name.toLowerCase()] = value;
    });

    return { status: response.status, headers, body };
  };
}

/** Default transport, bound to the global `fetch` at call time. */
export const fetchTransport: HttpTransport = createFetchTransport();
