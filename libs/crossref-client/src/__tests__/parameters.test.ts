import { describe, expect, it } from 'vitest';
import { encodeFieldMap, encodeParameters } from '../parameters';
import type { QueryParameters } from '../types';

describe('encodeParameters', () => {
  it('encodes filter mappings as name:value pairs joined by commas', () => {
    expect(encodeParameters({ filter: { a: 1, b: [true, false] } })).toEqual({
      filter: 'a:1,b:true,b:false',
    });
  });

  it('encodes facet mappings the same way', () => {
    expect(encodeParameters({ facet: { 'type-name': '*', published: 10 } })).toEqual({
      facet: 'type-name:*,published:10',
    });
  });

  it('keeps the caller order of names and values', () => {
    const encoded = encodeParameters({
      filter: { 'from-pub-date': '2020-01-01', type: ['posted-content', 'book'], 'has-orcid': true },
    });

    expect(encoded.filter).toBe('from-pub-date:2020-01-01,type:posted-content,type:book,has-orcid:true');
  });

  it('passes pre-encoded filter strings through', () => {
    expect(encodeParameters({ filter: 'already:encoded' })).toEqual({ filter: 'already:encoded' });
  });

  it('leaves other keys untouched', () => {
    const parameters: QueryParameters = {
      query: 'crossref',
      rows: 0,
      select: ['DOI'],
      filter: { type: 'book' },
    };

    expect(encodeParameters(parameters)).toEqual({
      query: 'crossref',
      rows: 0,
      select: ['DOI'],
      filter: 'type:book',
    });
  });

  it('does not mutate its input', () => {
    const parameters: QueryParameters = { filter: { type: 'book' } };

    encodeParameters(parameters);

    expect(parameters).toEqual({ filter: { type: 'book' } });
  });

  it('skips undefined entries and yields an empty string for an empty mapping', () => {
    expect(encodeFieldMap({ type: undefined, member: 98 })).toBe('member:98');
    expect(encodeParameters({ filter: {} })).toEqual({ filter: '' });
  });

  it('does not add reserved keys that were not given', () => {
    expect(encodeParameters({ rows: 5 })).toEqual({ rows: 5 });
  });
});
