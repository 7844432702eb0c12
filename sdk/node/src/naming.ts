/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 *
 * Naming conventions between class names, URL segments and attribute keys.
 */

import { camelize, pluralize, singularize, underscore } from 'inflected';

/** `Person` -> `person`, `LineItem` -> `line_item`. */
export function elementNameFor(className: string): string {
  return underscore(className);
}

/** `person` -> `people`. */
export function collectionNameFor(elementName: string): string {
  return pluralize(elementName);
}

/**
 * Type name for a resource decoded under an attribute key.
 *
 * A mapping keeps the key's number (`address` -> `Address`); elements of a
 * sequence are named after the singular (`line_items` -> `LineItem`).
 */
export function nestedTypeName(key: string, inSequence: boolean): string {
  return camelize(inSequence ? singularize(key) : key);
}

/** Attribute key a validation message such as `"First name can't be blank"` refers to. */
export function attributeKeyFor(word: string): string {
  return underscore(word);
}
