/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 *
 * Path Builder: element, collection and custom-method request paths.
 */

import { MissingPrefixParamError } from './errors';

export type QueryValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | QueryValue[]
  | { [key: string]: QueryValue };

export type QueryParams = Record<string, QueryValue>;

export type PrefixOptions = Record<string, string | number>;

export type ResourceId = string | number;

export interface PathOptions {
  /** Collection segment; may be a template such as `people/:person_id/addresses`. */
  collection: string;
  id?: ResourceId;
  /** Leading path, typically the site's path. Placeholders allowed. */
  prefix?: string;
  prefixOptions?: PrefixOptions;
  query?: QueryParams;
  /** Format suffix without the dot; `null` omits it. */
  extension?: string | null;
  /** Custom method segment appended after the collection (or id). */
  action?: string;
}

const PLACEHOLDER = /:([A-Za-z_][A-Za-z0-9_]*)/g;

/** Placeholder names in a path template, in order of appearance. */
export function prefixParameters(template: string): string[] {
  const names: string[] = [];
  for (const match of template.matchAll(PLACEHOLDER)) {
    if (!names.includes(match[1])) names.push(match[1]);
  }
  return names;
}

function fillTemplate(template: string, options: PrefixOptions): string {
  return template.replace(PLACEHOLDER, (_, name: string) => {
    const value = options[name];
    if (value === undefined || value === '') {
      throw new MissingPrefixParamError(name, template);
    }
    return encodeURIComponent(String(value));
  });
}

function trimSlashes(segment: string): string {
  return segment.replace(/^\/+|\/+$/g, '');
}

/** Split caller options into prefix options and query options. */
export function splitOptions(
  options: Record<string, QueryValue>,
  prefixNames: readonly string[],
): { prefixOptions: PrefixOptions; query: QueryParams } {
  const prefixOptions: PrefixOptions = {};
  const query: QueryParams = {};
  for (const [key, value] of Object.entries(options)) {
    if (prefixNames.includes(key) && (typeof value === 'string' || typeof value === 'number')) {
      prefixOptions[key] = value;
    } else {
      query[key] = value;
    }
  }
  return { prefixOptions, query };
}

function formatScalar(value: string | number | boolean | null): string {
  if (value === null) return '';
  return String(value);
}

function flattenQuery(key: string, value: QueryValue, out: [string, string][]): void {
  if (value === undefined) return;
  if (Array.isArray(value)) {
    for (const item of value) flattenQuery(`${key}[]`, item, out);
    return;
  }
  if (typeof value === 'object' && value !== null) {
    for (const [sub, item] of Object.entries(value)) flattenQuery(`${key}[${sub}]`, item, out);
    return;
  }
  out.push([key, formatScalar(value)]);
}

/** Encode query params in insertion order; empty string when there are none. */
export function toQueryString(query: QueryParams = {}): string {
  const pairs: [string, string][] = [];
  for (const [key, value] of Object.entries(query)) flattenQuery(key, value, pairs);
  if (pairs.length === 0) return '';
  return `?${new URLSearchParams(pairs).toString()}`;
}

export function buildPath(options: PathOptions): string {
  const prefixOptions = options.prefixOptions ?? {};
  const segments: string[] = [];

  const prefix = trimSlashes(options.prefix ?? '');
  if (prefix) segments.push(fillTemplate(prefix, prefixOptions));
  segments.push(fillTemplate(trimSlashes(options.collection), prefixOptions));
  if (options.id !== undefined) segments.push(encodeURIComponent(String(options.id)));
  if (options.action) segments.push(trimSlashes(options.action));

  const extension = options.extension === undefined ? 'json' : options.extension;
  const suffix = extension ? `.${extension}` : '';

  return `/${segments.join('/')}${suffix}${toQueryString(options.query)}`;
}

/**
 * Id carried by a `Location` header: the last path segment without its
 * format suffix. Numeric segments within the safe integer range become
 * numbers; larger ones stay strings.
 */
export function idFromLocation(location: string | undefined): ResourceId | undefined {
  if (!location) return undefined;
  let segment: string;
  try {
    const match = /\/([^/]+?)(\.\w+)?$/.exec(new URL(location, 'http://localhost').pathname);
    if (!match) return undefined;
    segment = decodeURIComponent(match[1]);
  } catch {
    return undefined;
  }
  return /^\d+$/.test(segment) && Number.isSafeInteger(Number(segment)) ? Number(segment) : segment;
}
