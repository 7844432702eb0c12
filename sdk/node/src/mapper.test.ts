import { describe, expect, it } from 'vitest';
import { defineResource } from './config';
import { DecodeError } from './errors';
import { decodeResource, encodeResource } from './mapper';
import { GenericResource, Resource } from './resource';

class Person extends Resource {}

class Address extends Resource {}

class Customer extends Resource {
  static config = defineResource({ nested: { address: Address }, transient: ['password'] });
}

class Residence extends Resource {
  static config = defineResource({ collectionName: 'people/:person_id/residences' });
}

function one<R>(value: R | R[]): R {
  if (Array.isArray(value)) throw new Error('expected a single resource');
  return value;
}

function many<R>(value: R | R[]): R[] {
  if (!Array.isArray(value)) throw new Error('expected a sequence');
  return value;
}

function nested(resource: Resource, key: string): Resource {
  const value = resource.get(key);
  if (!(value instanceof Resource)) throw new Error(`${key} is not a resource`);
  return value;
}

describe('decodeResource', () => {
  it('decodes a mapping into a persisted resource', () => {
    const tyler = one(decodeResource({ id: 1, first: 'Tyler', last: 'Durden' }, Person));
    expect(tyler).toBeInstanceOf(Person);
    expect(tyler.attributes['first']).toBe('Tyler');
    expect(tyler.id).toBe(1);
    expect(tyler.persisted).toBe(true);
  });

  it('names unregistered nested mappings after their key', () => {
    const tyler = one(decodeResource({ id: 1, first: 'Tyler', address: { street: 'Paper St.', state: 'CA' } }, Person));
    const address = nested(tyler, 'address');
    expect(address).toBeInstanceOf(GenericResource);
    expect(address.typeName).toBe('Address');
    expect(address.attributes['street']).toBe('Paper St.');
  });

  it('instantiates registered nested types', () => {
    const customer = one(decodeResource({ id: 3, address: { id: 8, street: 'Paper St.' } }, Customer));
    const address = nested(customer, 'address');
    expect(address).toBeInstanceOf(Address);
    expect(address.typeName).toBe('Address');
    expect(address.persisted).toBe(true);
  });

  it('leaves nested resources without id unpersisted', () => {
    const tyler = one(decodeResource({ id: 1, address: { street: 'Paper St.' } }, Person));
    expect(nested(tyler, 'address').state).toBe('new');
  });

  it('decodes sequences of mappings under the singular name', () => {
    const tyler = one(decodeResource({ id: 1, addresses: [{ street: 'A' }, { street: 'B' }], tags: ['x', 'y'] }, Person));
    const addresses = tyler.get('addresses');
    expect(Array.isArray(addresses)).toBe(true);
    if (!Array.isArray(addresses)) return;
    expect(addresses).toHaveLength(2);
    const [first, second] = addresses;
    expect(first instanceof Resource && first.typeName).toBe('Address');
    expect(first instanceof Resource && first.get('street')).toBe('A');
    expect(second instanceof Resource && second.get('street')).toBe('B');
    expect(tyler.get('tags')).toEqual(['x', 'y']);
  });

  it('keeps null values and omits absent keys', () => {
    const tyler = one(decodeResource({ id: 1, nickname: null }, Person));
    expect(tyler.has('nickname')).toBe(true);
    expect(tyler.get('nickname')).toBeNull();
    expect(tyler.has('middle')).toBe(false);
  });

  it('decodes collections in order', () => {
    const people = many(decodeResource([{ id: 1, first: 'Tyler' }, { id: 2, first: 'Marla' }], Person));
    expect(people.map((p) => p.get('first'))).toEqual(['Tyler', 'Marla']);
  });

  it('decodes an empty collection', () => {
    expect(decodeResource([], Person)).toEqual([]);
  });

  it('produces fresh objects on every decode', () => {
    const a = one(decodeResource({ id: 1 }, Person));
    const b = one(decodeResource({ id: 1 }, Person));
    expect(a).not.toBe(b);
    expect(a.equals(b)).toBe(true);
  });

  it('rejects scalars', () => {
    expect(() => decodeResource('Tyler', Person)).toThrow(DecodeError);
    expect(() => decodeResource([1], Person)).toThrow(DecodeError);
  });
});

describe('encodeResource', () => {
  it('inverts decoding', () => {
    const doc = { id: 1, first: 'Tyler', address: { street: 'Paper St.' }, tags: ['a'], friends: [{ first: 'Marla' }] };
    expect(encodeResource(one(decodeResource(doc, Person)))).toEqual(doc);
  });

  it('leaves out excluded attributes', () => {
    const tyler = new Person({ id: 1, first: 'Tyler' });
    expect(encodeResource(tyler, { exclude: ['id'] })).toEqual({ first: 'Tyler' });
  });

  it('leaves out prefix parameters', () => {
    const residence = new Residence({ person_id: 1, street: 'Paper St.' });
    expect(residence.prefixOptions).toEqual({ person_id: 1 });
    expect(residence.get('person_id')).toBe(1);
    expect(encodeResource(residence)).toEqual({ street: 'Paper St.' });
  });

  it('leaves out transient attributes', () => {
    const customer = new Customer({ name: 'Tyler', password: 'test-secret' });
    expect(encodeResource(customer)).toEqual({ name: 'Tyler' });
  });

  it('keeps resources passed in as values', () => {
    const address = new Address({ street: 'Paper St.' });
    const tyler = new Person({ address });
    expect(tyler.get('address')).toBe(address);
    expect(encodeResource(tyler)).toEqual({ address: { street: 'Paper St.' } });
  });
});
