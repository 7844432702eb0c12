import { describe, expect, it } from 'vitest';
import { JsonFormat, isMapping, isScalar, isSequence, parseDocument } from './document';
import { DecodeError } from './errors';

describe('JsonFormat', () => {
  it('decodes nested documents', () => {
    const doc = JsonFormat.decode('{"id":1,"tags":["a","b"],"address":{"state":"CA"},"nickname":null}');
    expect(doc).toEqual({ id: 1, tags: ['a', 'b'], address: { state: 'CA' }, nickname: null });
  });

  it('fails with DecodeError on malformed text', () => {
    expect(() => JsonFormat.decode('{"id":')).toThrow(DecodeError);
  });

  it('keeps the raw text on the error', () => {
    let err: unknown;
    try {
      JsonFormat.decode('nope');
    } catch (e) {
      err = e;
    }
    expect(err).toBeInstanceOf(DecodeError);
    expect(err instanceof DecodeError && err.body).toBe('nope');
  });

  it('rejects a __proto__ key instead of dropping it', () => {
    expect(() => JsonFormat.decode('{"__proto__":{"a":1},"b":2}')).toThrow(DecodeError);
    expect(() => JsonFormat.decode('{"items":[{"__proto__":null}]}'))
      .toThrow('Value is not a document: "__proto__" cannot be used as a key');
  });

  it('round-trips documents', () => {
    const doc = { first: 'Tyler', age: 30, member: true, pets: [], address: { street: 'Paper St.', zip: null } };
    expect(JsonFormat.decode(JsonFormat.encode(doc))).toEqual(doc);
  });

  it('preserves key order on re-encode', () => {
    const text = '{"last":"Durden","first":"Tyler","id":1}';
    expect(JsonFormat.encode(JsonFormat.decode(text))).toBe(text);
  });
});

describe('document guards', () => {
  it('tells mappings, sequences and scalars apart', () => {
    expect(isMapping({ a: 1 })).toBe(true);
    expect(isMapping([])).toBe(false);
    expect(isMapping(null)).toBe(false);
    expect(isSequence([1])).toBe(true);
    expect(isScalar('x')).toBe(true);
    expect(isScalar(null)).toBe(true);
    expect(isScalar({})).toBe(false);
  });

  it('rejects values that are not documents', () => {
    expect(() => parseDocument(undefined)).toThrow(DecodeError);
    expect(() => parseDocument({ when: new Date(0) })).toThrow(DecodeError);
    expect(parseDocument([1, 'a', null])).toEqual([1, 'a', null]);
  });
});
