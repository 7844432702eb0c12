/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 *
 * Document model and wire formats.
 */

import { z } from 'zod';
import { DecodeError } from './errors';

// ---------------------------------------------------------------------------
// Document
// ---------------------------------------------------------------------------

export type Scalar = string | number | boolean | null;

export interface DocumentMapping {
  [key: string]: Document;
}

export type Document = Scalar | Document[] | DocumentMapping;

const scalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const documentSchema: z.ZodType<Document> = z.lazy(() =>
  z.union([scalarSchema, z.array(documentSchema), z.record(documentSchema)]),
);

export function isScalar(value: unknown): value is Scalar {
  return value === null || ['string', 'number', 'boolean'].includes(typeof value);
}

export function isSequence(value: Document): value is Document[] {
  return Array.isArray(value);
}

export function isMapping(value: Document): value is DocumentMapping {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function hasProtoKey(value: unknown): boolean {
  if (Array.isArray(value)) return value.some(hasProtoKey);
  if (typeof value !== 'object' || value === null) return false;
  return Object.prototype.hasOwnProperty.call(value, '__proto__') || Object.values(value).some(hasProtoKey);
}

/**
 * Validate an already-parsed value into a Document.
 * Mappings may not carry a `__proto__` key.
 */
export function parseDocument(value: unknown): Document {
  if (hasProtoKey(value)) {
    throw new DecodeError('Value is not a document: "__proto__" cannot be used as a key');
  }
  const result = documentSchema.safeParse(value);
  if (!result.success) {
    throw new DecodeError(`Value is not a document: ${result.error.issues[0]?.message ?? 'invalid'}`);
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// Formats
// ---------------------------------------------------------------------------

export interface Format {
  readonly name: string;
  /** Path suffix, e.g. `json` in `/people/1.json`. */
  readonly extension: string;
  readonly mimeType: string;
  decode(text: string): Document;
  encode(document: Document): string;
}

export const JsonFormat: Format = {
  name: 'json',
  extension: 'json',
  mimeType: 'application/json',

  decode(text: string): Document {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      throw new DecodeError(`Malformed JSON: ${reason}`, text);
    }
    return parseDocument(parsed);
  },

  encode(document: Document): string {
    return JSON.stringify(document);
  },
};
