/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 *
 * Resource Mapper: documents to resource graphs and back.
 */

import { Document, DocumentMapping, Scalar, isMapping } from './document';
import { DecodeError } from './errors';
import { nestedTypeName } from './naming';
import type { PrefixOptions } from './path';
import { GenericResource, Resource } from './resource';
import type { ResourceClass } from './resource';

/** Value held in a resource's attribute container. */
export type AttributeValue = Scalar | Resource | AttributeValue[];

export type Attributes = Record<string, AttributeValue>;

/** What callers may pass in: documents, resources, or any mix of them. */
export type InputValue = Scalar | Resource | InputValue[] | { [key: string]: InputValue };

export type AttributeInput = Record<string, InputValue>;

export type NestedRegistry = Readonly<Record<string, ResourceClass>>;

function decodeValue(key: string, value: InputValue, registry: NestedRegistry, inSequence: boolean): AttributeValue {
  if (value instanceof Resource) return value;
  if (Array.isArray(value)) {
    return value.map((item) => decodeValue(key, item, registry, true));
  }
  if (typeof value === 'object' && value !== null) {
    const registered = registry[key];
    if (registered) return new registered(value);
    return new GenericResource(nestedTypeName(key, inSequence), value, registry);
  }
  return value;
}

/**
 * Convert input attributes into attribute values.
 *
 * Mappings become nested resources: the class registered for the key when
 * there is one, otherwise a `GenericResource` named after the key.
 */
export function decodeAttributes(input: AttributeInput, registry: NestedRegistry): Attributes {
  const attributes: Attributes = {};
  for (const [key, value] of Object.entries(input)) {
    attributes[key] = decodeValue(key, value, registry, false);
  }
  return attributes;
}

function markLoaded(value: AttributeValue): void {
  if (value instanceof Resource) {
    value._restore(value.id === undefined ? 'new' : 'persisted');
    for (const nested of Object.values(value.attributes)) markLoaded(nested);
  } else if (Array.isArray(value)) {
    value.forEach(markLoaded);
  }
}

/** Build one persisted resource of `type` from a mapping the server returned. */
export function decodeOne<R extends Resource>(document: DocumentMapping, type: ResourceClass<R>, prefixOptions?: PrefixOptions): R {
  const resource = new type(document, prefixOptions);
  resource._restore('persisted');
  for (const value of Object.values(resource.attributes)) markLoaded(value);
  return resource;
}

export function decodeResource<R extends Resource>(document: Document, type: ResourceClass<R>, prefixOptions?: PrefixOptions): R | R[] {
  if (Array.isArray(document)) {
    return document.map((element) => {
      if (!isMapping(element)) {
        throw new DecodeError(`Expected ${type.name} elements to be mappings`);
      }
      return decodeOne(element, type, prefixOptions);
    });
  }
  if (isMapping(document)) return decodeOne(document, type, prefixOptions);
  throw new DecodeError(`Cannot build ${type.name} from a scalar document`);
}

function encodeValue(value: AttributeValue): Document {
  if (value instanceof Resource) return encodeResource(value);
  if (Array.isArray(value)) return value.map(encodeValue);
  return value;
}

/**
 * Flatten a resource graph into a document. Prefix parameters and
 * transient attributes are never included.
 */
export function encodeResource(resource: Resource, options: { exclude?: readonly string[] } = {}): DocumentMapping {
  const skip = new Set([...(options.exclude ?? []), ...resource.prefixParameterNames(), ...resource.transientNames()]);
  const out: DocumentMapping = {};
  for (const [key, value] of Object.entries(resource.attributes)) {
    if (skip.has(key)) continue;
    out[key] = encodeValue(value);
  }
  return out;
}
