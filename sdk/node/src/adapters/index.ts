/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 *
 * Transport adapters.
 */

export { BaseAdapter } from './base';
export type { ConnectionRequest, ConnectionResponse, HttpMethod } from './base';
export { HttpAdapter } from './http';
export type { HttpAdapterOptions } from './http';
export { MockAdapter } from './mock';
export type { MockResponse } from './mock';
