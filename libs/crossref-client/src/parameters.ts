import type { FieldMap, QueryParameters, QueryScalar } from './types';
import { isFieldMap, isScalarList } from './uri';

/** Query keys whose mapping values use the `name:value,name:value` form. */
export const FIELD_LIST_KEYS = ['filter', 'facet'] as const;

/**
 * Encodes `filter` and `facet` mappings into Crossref's flat string form.
 *
 * ```typescript
 * encodeParameters({ filter: { 'has-orcid': true, type: ['book', 'journal-article'] } });
 * // => { filter: 'has-orcid:true,type:book,type:journal-article' }
 * ```
 *
 * Any other key, and a `filter`/`facet` value that is not a mapping (such as a
 * pre-encoded string), is returned unchanged. The input is not mutated.
 */
export function encodeParameters(parameters: QueryParameters): QueryParameters {
  const encoded: QueryParameters = { ...parameters };
  for (const key of FIELD_LIST_KEYS) {
    const value = encoded[key];
    if (value !== undefined && isFieldMap(value)) {
      encoded[key] = encodeFieldMap(value);
    }
  }
  return encoded;
}

export function encodeFieldMap(fields: FieldMap): string {
  const parts: string[] = [];
  for (const [name, value] of Object.entries(fields)) {
    if (value === undefined) {
      continue;
    }
    const elements: readonly QueryScalar[] = isScalarList(value) ? value : [value];
    for (const element of elements) {
      parts.push(`${name}:${renderScalar(element)}`);
    }
  }
  return parts.join(',');
}

function renderScalar(value: QueryScalar): string {
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }
  return String(value);
}
