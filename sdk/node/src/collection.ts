/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 *
 * Ordered result of a collection find.
 */

import type { QueryParams } from './path';

export class Collection<T> implements Iterable<T> {
  private readonly items: readonly T[];
  /** Response headers, e.g. for `Link` based pagination. */
  readonly headers: Readonly<Record<string, string>>;
  /** Params the collection was requested with. */
  readonly params: Readonly<QueryParams>;

  constructor(items: readonly T[], metadata: { headers?: Record<string, string>; params?: QueryParams } = {}) {
    this.items = [...items];
    this.headers = { ...metadata.headers };
    this.params = { ...metadata.params };
  }

  get length(): number {
    return this.items.length;
  }

  at(index: number): T | undefined {
    return this.items.at(index);
  }

  first(): T | undefined {
    return this.items[0];
  }

  map<U>(fn: (item: T, index: number) => U): U[] {
    return this.items.map(fn);
  }

  filter(fn: (item: T, index: number) => boolean): T[] {
    return this.items.filter(fn);
  }

  toArray(): T[] {
    return [...this.items];
  }

  [Symbol.iterator](): Iterator<T> {
    return this.items[Symbol.iterator]();
  }
}
