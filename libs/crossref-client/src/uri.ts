import type { FieldMap, QueryParameters, QueryScalar, QueryValue } from './types';

export const BASE_URI = 'https://api.crossref.org';

/**
 * Resolves `path` against the API root.
 *
 * Relative paths get the configured version prepended; absolute paths
 * (`/v1/works`) are taken as-is, so callers can pin a version per call.
 */
export function buildUri(path: string, version?: string, baseUri: string = BASE_URI): string {
  let target = path;
  if (version && !target.startsWith('/')) {
    target = `${version}/${target}`;
  }
  return `${baseUri.replace(/\/+$/, '')}/${target.replace(/^\/+/, '')}`;
}

/**
 * Serialises already-encoded parameters onto `uri`, keeping caller order.
 * `null`/`undefined` values are dropped, arrays repeat the key and a mapping
 * under an ordinary key becomes `key[name]=value`.
 */
export function appendQuery(uri: string, query: QueryParameters): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    appendValue(search, key, value);
  }

  const serialized = search.toString();
  if (!serialized) {
    return uri;
  }
  return `${uri}${uri.includes('?') ? '&' : '?'}${serialized}`;
}

function appendValue(search: URLSearchParams, key: string, value: QueryValue): void {
  if (value === undefined || value === null) {
    return;
  }
  if (isScalarList(value)) {
    for (const item of value) {
      search.append(key, String(item));
    }
    return;
  }
  if (isFieldMap(value)) {
    for (const [name, nested] of Object.entries(value)) {
      appendValue(search, `${key}[${name}]`, nested);
    }
    return;
  }
  search.append(key, String(value));
}

export function isScalarList(value: QueryValue): value is readonly QueryScalar[] {
  return Array.isArray(value);
}

export function isFieldMap(value: QueryValue): value is FieldMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
