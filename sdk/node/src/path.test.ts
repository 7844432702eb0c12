import { describe, expect, it } from 'vitest';
import { MissingPrefixParamError } from './errors';
import { buildPath, idFromLocation, prefixParameters, splitOptions, toQueryString } from './path';

describe('buildPath', () => {
  it('builds element paths', () => {
    expect(buildPath({ collection: 'people', id: 1 })).toBe('/people/1.json');
  });

  it('builds collection paths with ordered query', () => {
    expect(buildPath({ collection: 'people', query: { page: 30, member: true } })).toBe('/people.json?page=30&member=true');
  });

  it('renders false in lowercase', () => {
    expect(buildPath({ collection: 'people', query: { member: false } })).toBe('/people.json?member=false');
  });

  it('omits the suffix when there is no extension', () => {
    expect(buildPath({ collection: 'people', id: 1, extension: null })).toBe('/people/1');
  });

  it('uses a configured extension', () => {
    expect(buildPath({ collection: 'people', extension: 'xml' })).toBe('/people.xml');
  });

  it('fills placeholders from prefix options', () => {
    expect(buildPath({
      collection: 'people/:person_id/addresses',
      id: 5,
      prefixOptions: { person_id: 1 },
    })).toBe('/people/1/addresses/5.json');
  });

  it('fails when a placeholder has no value', () => {
    let err: unknown;
    try {
      buildPath({ collection: 'people/:person_id/addresses' });
    } catch (e) {
      err = e;
    }
    expect(err).toBeInstanceOf(MissingPrefixParamError);
    expect(err instanceof MissingPrefixParamError && err.param).toBe('person_id');
  });

  it('prepends the site path', () => {
    expect(buildPath({ collection: 'people', prefix: '/api/v1/' })).toBe('/api/v1/people.json');
    expect(buildPath({ collection: 'people', prefix: '/' })).toBe('/people.json');
  });

  it('appends custom actions', () => {
    expect(buildPath({ collection: 'people', action: 'managers' })).toBe('/people/managers.json');
    expect(buildPath({ collection: 'people', id: 1, action: 'promote' })).toBe('/people/1/promote.json');
  });

  it('encodes path values', () => {
    expect(buildPath({ collection: 'files', id: 'a/b c' })).toBe('/files/a%2Fb%20c.json');
  });
});

describe('toQueryString', () => {
  it('is empty without params', () => {
    expect(toQueryString({})).toBe('');
    expect(toQueryString({ skipped: undefined })).toBe('');
  });

  it('expands arrays and nested mappings', () => {
    expect(toQueryString({ ids: [1, 2], filter: { state: 'CA' } }))
      .toBe('?ids%5B%5D=1&ids%5B%5D=2&filter%5Bstate%5D=CA');
  });

  it('form-encodes values', () => {
    expect(toQueryString({ q: 'a b&c' })).toBe('?q=a+b%26c');
  });
});

describe('prefix options', () => {
  it('lists placeholders in order', () => {
    expect(prefixParameters('/api/:account_id/people/:person_id/addresses')).toEqual(['account_id', 'person_id']);
    expect(prefixParameters('people')).toEqual([]);
  });

  it('splits prefix options from query options', () => {
    expect(splitOptions({ person_id: 1, page: 2 }, ['person_id'])).toEqual({
      prefixOptions: { person_id: 1 },
      query: { page: 2 },
    });
  });
});

describe('idFromLocation', () => {
  it('takes the trailing segment', () => {
    expect(idFromLocation('http://host/people/2')).toBe(2);
    expect(idFromLocation('/people/abc.json')).toBe('abc');
    expect(idFromLocation('http://host/people/2.json?include=all')).toBe(2);
  });

  it('keeps numeric segments beyond the safe integer range as strings', () => {
    expect(idFromLocation('/people/12345678901234567890.json')).toBe('12345678901234567890');
    expect(idFromLocation('/people/9007199254740991')).toBe(9007199254740991);
  });

  it('returns undefined when there is no segment', () => {
    expect(idFromLocation(undefined)).toBeUndefined();
    expect(idFromLocation('')).toBeUndefined();
    expect(idFromLocation('http://host/')).toBeUndefined();
  });
});
