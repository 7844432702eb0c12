/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 *
 * Per-class resource configuration.
 */

import { z } from 'zod';
import { BaseAdapter } from './adapters/base';
import { HttpAdapter } from './adapters/http';
import { Format, JsonFormat } from './document';
import { ResourceConfigurationError } from './errors';
import { HookRegistry } from './hooks';
import type { ResourceClass } from './resource';

const DEFAULT_TIMEOUT = 30_000;

const formatSchema = z.custom<Format>(
  (v) => typeof v === 'object' && v !== null && 'decode' in v && 'encode' in v && 'extension' in v,
  { message: 'Expected a Format with decode, encode and extension' },
);

const optionsSchema = z.object({
  site: z.string().url().optional(),
  collectionName: z.string().min(1).optional(),
  elementName: z.string().min(1).optional(),
  primaryKey: z.string().min(1).default('id'),
  format: formatSchema.default(JsonFormat),
  extension: z.string().min(1).nullable().optional(),
  headers: z.record(z.string()).default({}),
  includeRoot: z.boolean().default(true),
  nested: z.record(z.custom<ResourceClass>((v) => typeof v === 'function', { message: 'Expected a resource class' })).default({}),
  transient: z.array(z.string()).default([]),
  timeout: z.number().int().positive().default(DEFAULT_TIMEOUT),
  user: z.string().optional(),
  password: z.string().optional(),
  adapter: z.custom<BaseAdapter>((v) => v instanceof BaseAdapter, { message: 'Expected a BaseAdapter' }).optional(),
  hooks: z.custom<HookRegistry>((v) => v instanceof HookRegistry, { message: 'Expected a HookRegistry' }).optional(),
});

export type ResourceOptions = z.input<typeof optionsSchema>;

export interface ResourceConfig {
  /** Base URL; absent for data-only resources. */
  readonly site?: string;
  /** Path of the site, rendered before the collection segment. */
  readonly sitePath: string;
  readonly collectionName?: string;
  readonly elementName?: string;
  readonly primaryKey: string;
  readonly format: Format;
  /** Path suffix; `null` when requests carry none. */
  readonly extension: string | null;
  readonly headers: Readonly<Record<string, string>>;
  readonly includeRoot: boolean;
  readonly nested: Readonly<Record<string, ResourceClass>>;
  readonly transient: readonly string[];
  readonly timeout: number;
  readonly adapter?: BaseAdapter;
  readonly hooks: HookRegistry;
}

/**
 * Validate options and freeze them into a configuration.
 *
 * ```ts
 * class Person extends Resource {
 *   static config = defineResource({ site: 'https://api.example.com' });
 * }
 * ```
 */
export function defineResource(options: ResourceOptions = {}): ResourceConfig {
  const parsed = optionsSchema.safeParse(options);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || 'options'}: ${i.message}`);
    throw new ResourceConfigurationError(`Invalid resource configuration: ${issues.join('; ')}`);
  }
  const o = parsed.data;

  const adapter = o.adapter ?? (o.site
    ? new HttpAdapter({ site: o.site, user: o.user, password: o.password, timeout: o.timeout })
    : undefined);

  return Object.freeze({
    site: o.site,
    sitePath: o.site ? new URL(o.site).pathname : '',
    collectionName: o.collectionName,
    elementName: o.elementName,
    primaryKey: o.primaryKey,
    format: o.format,
    extension: o.extension === undefined ? o.format.extension : o.extension,
    headers: Object.freeze({ ...o.headers }),
    includeRoot: o.includeRoot,
    nested: Object.freeze({ ...o.nested }),
    transient: Object.freeze([...o.transient]),
    timeout: o.timeout,
    adapter,
    hooks: o.hooks ?? new HookRegistry(),
  });
}

/** Configuration used for resources declared without one. */
export const DATA_ONLY_CONFIG: ResourceConfig = defineResource();
